import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';

import type { StaffUser } from './staff-user';

type JwtPayload = {
  sub?: string;
  name?: string;
  role?: string;
};

export function jwtSecret() {
  return (process.env.JWT_SECRET || '').trim() || 'DEV_ONLY_CHANGE_ME__KEYBOX';
}

/**
 * Verifies staff tokens issued by the campus login service (shared
 * JWT_SECRET). Badge and controller endpoints never go through this.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor() {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: jwtSecret(),
    });
  }

  validate(payload: JwtPayload): StaffUser {
    const id = String(payload?.sub ?? '').trim();
    if (!id) {
      throw new UnauthorizedException('Invalid token.');
    }

    const role = String(payload.role || '').trim().toLowerCase();
    if (role !== 'staff' && role !== 'admin') {
      throw new UnauthorizedException('Staff access only.');
    }

    return {
      id,
      name: String(payload.name || '').trim() || id,
      role,
    };
  }
}

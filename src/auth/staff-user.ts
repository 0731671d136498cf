import type { Request } from 'express';
import type { StaffRole } from '../roles/roles.decorator';

/** What JwtStrategy.validate() puts on req.user. */
export type StaffUser = {
  id: string;
  name: string;
  role: StaffRole;
};

function isStaffRole(v: unknown): v is StaffRole {
  return v === 'staff' || v === 'admin';
}

export function readStaff(req: Request): StaffUser | null {
  const user: unknown = req.user;
  if (!user || typeof user !== 'object') return null;

  const id = 'id' in user ? String(user.id ?? '').trim() : '';
  const name = 'name' in user ? String(user.name ?? '').trim() : '';
  const role = 'role' in user ? user.role : undefined;

  if (!id || !isStaffRole(role)) return null;
  return { id, name: name || id, role };
}

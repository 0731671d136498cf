import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  Post,
  Query,
} from '@nestjs/common';

import { AccessService } from './access.service';
import { isLookupFailure } from './decision';
import { SwipeEnvelope, swipeEnvelope, swipeError } from './swipe-envelope';
import { bodyFields, firstParam } from '../common/request-params';

type SwipeParams = {
  code?: unknown;
  room?: unknown;
};

/**
 * Badge swipe intake for keybox controllers. Well-formed requests always
 * get HTTP 200; firmware branches on access_granted, not on the status.
 */
@Controller('api')
export class AccessController {
  private readonly logger = new Logger(AccessController.name);

  constructor(private readonly access: AccessService) {}

  @Get('rfid-swipe')
  @HttpCode(200)
  swipeGet(@Query() query: SwipeParams) {
    return this.swipe(query, {});
  }

  @Post('rfid-swipe')
  @HttpCode(200)
  async swipePost(@Query() query: SwipeParams, @Body() body: unknown) {
    return this.swipe(query, bodyFields(body));
  }

  private async swipe(query: SwipeParams, body: Record<string, unknown>): Promise<SwipeEnvelope> {
    const code = firstParam(query.code, body.code);
    const room = firstParam(query.room, body.room);

    if (!code || !room) {
      throw new BadRequestException(
        swipeError("Missing 'code' or 'room' parameter", 'Invalid request - missing required parameters'),
      );
    }

    try {
      const decision = await this.access.decide(code, room, new Date());

      if (isLookupFailure(decision.reason)) {
        throw new NotFoundException({
          ...swipeEnvelope(decision),
          denial_reason:
            decision.reason === 'CREDENTIAL_UNKNOWN' ? 'Card UID not found in database' : decision.reasonText,
          message: decision.reason === 'CREDENTIAL_UNKNOWN' ? decision.message : 'Unknown room code',
        });
      }

      return swipeEnvelope(decision);
    } catch (err) {
      if (err instanceof HttpException) throw err;

      this.logger.error(
        `Swipe failed (code=${code}, room=${room}): ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
      throw new InternalServerErrorException(swipeError('Server error', 'Server error'));
    }
  }
}

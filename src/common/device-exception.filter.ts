import { ArgumentsHost, Catch, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import type { Request, Response } from 'express';

import { DeviceErrorEnvelope, messageOf } from './device-envelope';
import { swipeError } from '../access/swipe-envelope';

type TriggerErrorEnvelope = { has_trigger: false; action: ''; message: string };

/** Error body for controller-facing routes; null for everything else. */
export function envelopeFor(path: string, message: string) {
  if (path.startsWith('/api/rfid-swipe')) {
    return swipeError(message, 'Invalid request');
  }
  if (path.startsWith('/api/manual-trigger')) {
    const body: TriggerErrorEnvelope = { has_trigger: false, action: '', message };
    return body;
  }
  if (path.startsWith('/api/esp32/')) {
    const body: DeviceErrorEnvelope = { status: 'error', message };
    return body;
  }
  return null;
}

function isEnvelope(body: unknown) {
  return typeof body === 'object' && body !== null && ('status' in body || 'has_trigger' in body);
}

/**
 * Keeps firmware on its own JSON shapes when a request fails before or
 * outside a handler (unparsable body, unknown error). Handlers that already
 * threw an envelope are passed through; staff routes get Nest's default.
 */
@Catch()
export class DeviceExceptionFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(DeviceExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const http = host.switchToHttp();
    const req = http.getRequest<Request>();
    const res = http.getResponse<Response>();

    const isHttp = exception instanceof HttpException;
    const status = isHttp ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const fallback = envelopeFor(req.path, isHttp ? messageOf(exception) : 'Server error');

    if (!fallback) {
      super.catch(exception, host);
      return;
    }

    if (isHttp && isEnvelope(exception.getResponse())) {
      res.status(status).json(exception.getResponse());
      return;
    }

    if (!isHttp) {
      this.logger.error(
        `${req.method} ${req.path} failed: ${exception instanceof Error ? exception.message : String(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }
    res.status(status).json(fallback);
  }
}

import { HttpException, InternalServerErrorException, Logger } from '@nestjs/common';

/** Error body every controller-facing endpoint returns. */
export type DeviceErrorEnvelope = {
  status: 'error';
  message: string;
  [extra: string]: unknown;
};

export function messageOf(err: HttpException) {
  const res = err.getResponse();
  if (typeof res === 'string') return res;
  if (res && typeof res === 'object' && 'message' in res) {
    const m = res.message;
    return Array.isArray(m) ? m.join('; ') : String(m);
  }
  return err.message;
}

/**
 * Rewrites any failure into the controller envelope, keeping the HTTP
 * status of Nest exceptions and logging everything else as a 500.
 */
export function toDeviceError(
  err: unknown,
  logger: Logger,
  context: string,
  extra: Record<string, unknown> = {},
): HttpException {
  if (err instanceof HttpException) {
    const body: DeviceErrorEnvelope = { status: 'error', message: messageOf(err), ...extra };
    return new HttpException(body, err.getStatus());
  }

  logger.error(
    `${context}: ${err instanceof Error ? err.message : String(err)}`,
    err instanceof Error ? err.stack : undefined,
  );
  const body: DeviceErrorEnvelope = { status: 'error', message: 'Server error', ...extra };
  return new InternalServerErrorException(body);
}

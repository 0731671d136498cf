import { BadRequestException } from '@nestjs/common';

/** Trimmed text of a query or body value; anything that is not a scalar reads as ''. */
export function paramText(v: unknown) {
  return typeof v === 'string' || typeof v === 'number' ? String(v).trim() : '';
}

/** First non-empty value, e.g. the query parameter before the body field. */
export function firstParam(...values: unknown[]) {
  for (const v of values) {
    const s = paramText(v);
    if (s) return s;
  }
  return '';
}

export function paramFlag(v: unknown): boolean | null {
  if (typeof v === 'boolean') return v;
  const s = paramText(v).toLowerCase();
  if (s === 'true' || s === '1') return true;
  if (s === 'false' || s === '0') return false;
  return null;
}

/**
 * Request body as a field map. Firmware that posts JSON as text/plain
 * arrives here as a string and is parsed; an empty or missing body reads
 * as no fields.
 */
export function bodyFields(body: unknown): Record<string, unknown> {
  let value = body;

  if (typeof value === 'string') {
    const raw = value.trim();
    if (!raw) return {};
    try {
      value = JSON.parse(raw);
    } catch {
      throw new BadRequestException('Request body is not valid JSON');
    }
  }

  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

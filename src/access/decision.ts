import type { LedgerAction } from '../transactions/session-ledger.service';

export const DENIAL_REASONS = [
  'CREDENTIAL_UNKNOWN',
  'CREDENTIAL_INACTIVE',
  'ROOM_UNKNOWN',
  'ROOM_INACTIVE',
  'CREDENTIAL_ROOM_MISMATCH',
  'OUTSIDE_SCHEDULED_TIME',
  'NO_SCHEDULE_TODAY',
] as const;

export type DenialReason = (typeof DENIAL_REASONS)[number];

/** Denials that have no credential or room to attach a ledger row to. */
export type LookupFailure = Extract<DenialReason, 'CREDENTIAL_UNKNOWN' | 'ROOM_UNKNOWN'>;

export function isLookupFailure(reason: DenialReason | null): reason is LookupFailure {
  return reason === 'CREDENTIAL_UNKNOWN' || reason === 'ROOM_UNKNOWN';
}

export type Decision = {
  granted: boolean;
  action: LedgerAction | null;
  facultyName: string;
  message: string;
  reason: DenialReason | null;
  /** human-readable denial text, '' when granted */
  reasonText: string;
  windowId: number | null;
  /** ledger row written (or closed) for this decision; null for lookup failures */
  transactionId: number | null;
};

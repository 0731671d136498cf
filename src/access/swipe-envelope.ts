import type { Decision } from './decision';

/**
 * The one JSON shape keybox firmware parses for every swipe outcome.
 * Field names are part of the controller protocol.
 */
export type SwipeEnvelope = {
  status: 'ok' | 'error';
  access_granted: boolean;
  action: 'borrow_key' | 'return_key' | '';
  faculty: string;
  message: string;
  denial_reason: string;
  denial_code: string;
};

export function swipeEnvelope(d: Decision): SwipeEnvelope {
  return {
    status: d.granted ? 'ok' : 'error',
    access_granted: d.granted,
    action: d.action === 'borrow' ? 'borrow_key' : d.action === 'return' ? 'return_key' : '',
    faculty: d.facultyName,
    message: d.message,
    denial_reason: d.granted ? '' : d.reasonText,
    denial_code: d.reason ?? '',
  };
}

export function swipeError(message: string, denialReason: string, faculty = ''): SwipeEnvelope {
  return {
    status: 'error',
    access_granted: false,
    action: '',
    faculty,
    message,
    denial_reason: denialReason,
    denial_code: '',
  };
}

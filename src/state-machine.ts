export type CheckInState =
  | 'RECEIVED'
  | 'VALIDATING'
  | 'REJECTED'
  | 'RATE_LIMITED'
  | 'RECORDING'
  | 'SCORING'
  | 'COMPLETED'
  | 'INSUFFICIENT_DATA'
  | 'FAILED';

export type CheckInEvent =
  | { type: 'BODY_PARSED' }
  | { type: 'VALIDATION_FAILED' }
  | { type: 'RATE_LIMITED' }
  | { type: 'ADMITTED' }
  | { type: 'RECORDED' }
  | { type: 'SCORED'; insufficient: boolean }
  | { type: 'INTERNAL_ERROR' };

export function transition(current: CheckInState, event: CheckInEvent): CheckInState {
  switch (current) {
    case 'RECEIVED':
      if (event.type === 'BODY_PARSED') return 'VALIDATING';
      if (event.type === 'VALIDATION_FAILED') return 'REJECTED';
      break;
    case 'VALIDATING':
      if (event.type === 'VALIDATION_FAILED') return 'REJECTED';
      if (event.type === 'RATE_LIMITED') return 'RATE_LIMITED';
      if (event.type === 'ADMITTED') return 'RECORDING';
      break;
    case 'RECORDING':
      if (event.type === 'RECORDED') return 'SCORING';
      if (event.type === 'INTERNAL_ERROR') return 'FAILED';
      break;
    case 'SCORING':
      if (event.type === 'SCORED') return event.insufficient ? 'INSUFFICIENT_DATA' : 'COMPLETED';
      if (event.type === 'INTERNAL_ERROR') return 'FAILED';
      break;
    case 'REJECTED':
    case 'RATE_LIMITED':
    case 'COMPLETED':
    case 'INSUFFICIENT_DATA':
    case 'FAILED':
      return current;
  }
  return current;
}

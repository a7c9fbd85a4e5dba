export type WagerErrorCode =
  | 'InvalidOdds'
  | 'InvalidPrice'
  | 'EmptyLegSet'
  | 'InvalidStake'
  | 'UnexpectedInput'
  | 'IncompleteWager'
  | 'PostFailure'
  | 'SessionClosed'
  | 'LedgerConflict'
  | 'ConfigInvalid';

export class WagerError extends Error {
  constructor(public readonly code: WagerErrorCode, message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'WagerError';
  }
}

export const isWagerError = (error: unknown): error is WagerError => error instanceof WagerError;

const VALIDATION_CODES: ReadonlySet<WagerErrorCode> = new Set([
  'InvalidOdds',
  'InvalidPrice',
  'EmptyLegSet',
  'InvalidStake',
  'UnexpectedInput',
  'IncompleteWager',
  'SessionClosed',
]);

/** Validation failures are shown to the user; everything else is a fault worth logging. */
export const isValidationError = (error: unknown): error is WagerError => isWagerError(error) && VALIDATION_CODES.has(error.code);

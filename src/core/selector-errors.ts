export type SelectorErrorCode =
  | 'InvalidConfiguration'
  | 'DegenerateWeight'
  | 'NoAcceptableOption';

export class SelectorError extends Error {
  readonly code: SelectorErrorCode;
  /** Decision index the error refers to, when there is one */
  readonly decision?: number;

  constructor(code: SelectorErrorCode, message: string, decision?: number) {
    super(message);
    this.name = 'SelectorError';
    this.code = code;
    this.decision = decision;
  }
}

export function isSelectorError(value: unknown, code?: SelectorErrorCode): value is SelectorError {
  return value instanceof SelectorError && (code === undefined || value.code === code);
}

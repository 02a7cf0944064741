export type InspectErrorCode =
  | 'SCHEMA_UNAVAILABLE'
  | 'INVALID_SCHEMA'
  | 'RESOURCE_NOT_FOUND'
  | 'RESOURCE_AMBIGUOUS'
  | 'OUT_OF_ORDER'
  | 'NO_OBSERVATION_POINTS'
  | 'UNSUPPORTED_FORMAT';

export class InspectError extends Error {
  override name = 'InspectError';
  readonly code: InspectErrorCode;

  constructor(code: InspectErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

export function isInspectError(err: unknown, code?: InspectErrorCode): err is InspectError {
  return err instanceof InspectError && (code === undefined || err.code === code);
}

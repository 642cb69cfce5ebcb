export type HexGridErrorCode =
  | 'invalid_coordinate'
  | 'invalid_direction'
  | 'invalid_radius'
  | 'invalid_scale'
  | 'invalid_size'
  | 'invalid_argument'
  | 'scheme_mismatch';

export class HexGridError extends Error {
  readonly code: HexGridErrorCode;

  constructor(code: HexGridErrorCode, message: string) {
    super(message);
    this.name = 'HexGridError';
    this.code = code;
  }
}

export function isHexGridError(error: unknown): error is HexGridError {
  return error instanceof HexGridError;
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

export function assertSameScheme(a: { scheme: string }, b: { scheme: string }): void {
  if (a.scheme !== b.scheme) {
    throw new HexGridError('scheme_mismatch', `Mixed ${a.scheme} and ${b.scheme} offset coordinates`);
  }
}

export function assertNonNegativeInteger(
  value: number,
  name: string,
  code: HexGridErrorCode = 'invalid_argument'
): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new HexGridError(code, `${name} must be a non-negative integer, got ${value}`);
  }
}

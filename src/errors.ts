export type SquarifyErrorCode =
  | 'DECODE_FAILED'
  | 'INVALID_PARAMETER'
  | 'ENCODE_FAILED'
  | 'FETCH_FAILED';

export class SquarifyError extends Error {
  public readonly code: SquarifyErrorCode;

  public constructor(code: SquarifyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SquarifyError';
    this.code = code;
  }
}

export class DecodeError extends SquarifyError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE_FAILED', message, options);
    this.name = 'DecodeError';
  }
}

export class InvalidParameterError extends SquarifyError {
  public constructor(message: string) {
    super('INVALID_PARAMETER', message);
    this.name = 'InvalidParameterError';
  }
}

export class EncodeError extends SquarifyError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('ENCODE_FAILED', message, options);
    this.name = 'EncodeError';
  }
}

export class FetchError extends SquarifyError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('FETCH_FAILED', message, options);
    this.name = 'FetchError';
  }
}

const CATEGORY_LABELS: Record<SquarifyErrorCode, string> = {
  DECODE_FAILED: 'Could not decode image',
  INVALID_PARAMETER: 'Invalid parameter',
  ENCODE_FAILED: 'Could not encode image',
  FETCH_FAILED: 'Could not load image',
};

// Message for whatever surface shows the failure to a user
export function describeError(error: unknown): string {
  if (error instanceof SquarifyError) {
    return `${CATEGORY_LABELS[error.code]}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

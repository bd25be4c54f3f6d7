export type PrCommentsErrorKind =
  | 'InvalidReference'
  | 'MissingRepository'
  | 'ApiError'
  | 'RenderError';

export class PrCommentsError extends Error {
  readonly kind: PrCommentsErrorKind;
  /** HTTP status of the failed request, when the failure came from one. */
  readonly status?: number;

  constructor(
    kind: PrCommentsErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'PrCommentsError';
    this.kind = kind;
    this.status = options.status;
  }
}

export function isPrCommentsError(error: unknown): error is PrCommentsError {
  return error instanceof PrCommentsError;
}

export function invalidReference(message: string): PrCommentsError {
  return new PrCommentsError('InvalidReference', message);
}

export function missingRepository(message: string, cause?: unknown): PrCommentsError {
  return new PrCommentsError('MissingRepository', message, { cause });
}

/**
 * Collapse any thrown value into a single line for stderr.
 */
export function formatError(error: unknown): string {
  let message: string;
  if (isPrCommentsError(error)) {
    message = `${error.kind}: ${error.message}`;
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = String(error);
  }
  return message.replace(/\s*\n\s*/g, ' ').trim();
}

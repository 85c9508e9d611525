export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class DocumentError extends HttpError {
  constructor(message: string, status = 400) {
    super(message, status);
  }
}

/**
 * Raised when duplicate candidates cannot be ordered deterministically.
 * The engine does not pick a canonical item in that case.
 */
export class AmbiguousDuplicateError extends HttpError {
  constructor(readonly conflictingIndices: number[]) {
    super(
      `Cannot choose a canonical item among duplicates at indices ${conflictingIndices.join(', ')}`,
      422
    );
  }
}

export class VisionRequestError extends HttpError {
  constructor(
    message: string,
    readonly upstreamStatus: number | null,
    readonly retryable: boolean
  ) {
    super(message, 502);
  }
}

export class VisionResponseError extends HttpError {
  constructor(message: string) {
    super(message, 502);
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(message: string) {
    super(message, 503);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(message, 404);
  }
}

export type SlackErrorCode =
  | 'CONFIG_ERROR'
  | 'TRANSPORT_ERROR'
  | 'PROTOCOL_ERROR'
  | 'API_ERROR'
  | 'DATA_ERROR'
  | 'UPLOAD_ERROR';

export class SlackTaskError extends Error {
  constructor(
    message: string,
    public readonly code: SlackErrorCode,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'SlackTaskError';
  }
}

/** Missing domain for a legacy token, invalid color, missing channel. */
export class SlackConfigError extends SlackTaskError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'SlackConfigError';
  }
}

/** Non-200 status, or the request never got a response (status -1). */
export class SlackTransportError extends SlackTaskError {
  constructor(
    message: string,
    public readonly status: number,
    cause?: unknown,
  ) {
    super(message, 'TRANSPORT_ERROR', cause);
    this.name = 'SlackTransportError';
  }
}

export class SlackProtocolError extends SlackTaskError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PROTOCOL_ERROR', cause);
    this.name = 'SlackProtocolError';
  }
}

/** The WebAPI answered `ok: false`. */
export class SlackApiError extends SlackTaskError {
  constructor(
    message: string,
    public readonly apiError?: string,
  ) {
    super(message, 'API_ERROR');
    this.name = 'SlackApiError';
  }
}

export class SlackDataError extends SlackTaskError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DATA_ERROR', cause);
    this.name = 'SlackDataError';
  }
}

export class SlackUploadError extends SlackTaskError {
  constructor(message: string, cause?: unknown) {
    super(message, 'UPLOAD_ERROR', cause);
    this.name = 'SlackUploadError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

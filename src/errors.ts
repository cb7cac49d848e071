export type RelayErrorCode =
  | "configuration"
  | "upstream"
  | "client_input"
  | "stream_protocol";

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or invalid credential. Never retried. */
export class ConfigurationError extends RelayError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/** Network failure, non-success status or malformed upstream payload. */
export class UpstreamError extends RelayError {
  readonly status: number | undefined;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super("upstream", message, { cause: options.cause });
    this.status = options.status;
  }
}

/** Rejected before any upstream call is attempted. */
export class ClientInputError extends RelayError {
  constructor(message: string) {
    super("client_input", message);
  }
}

/** A relay output record the consumer could not parse. */
export class StreamProtocolError extends RelayError {
  readonly line: string;

  constructor(message: string, line: string) {
    super("stream_protocol", message);
    this.line = line;
  }
}

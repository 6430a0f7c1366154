/**
 * Error types raised by the sync engine and its collaborators
 *
 * Nothing here is allowed to take the process down: the orchestrator,
 * the control server and the CLI catch these and report them through
 * the log and the status endpoint.
 */

export type ErrorCode = "MAPPING" | "TRANSPORT" | "TRANSPORT_TRANSIENT" | "CONFIG";

export class MirrorwatchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MirrorwatchError";
    this.code = code;
  }
}

/**
 * No mapping rule matches a local path. The file is skipped.
 */
export class MappingError extends MirrorwatchError {
  readonly sourcePath: string;

  constructor(sourcePath: string) {
    super("MAPPING", `No mapping rule matches '${sourcePath}'`);
    this.name = "MappingError";
    this.sourcePath = sourcePath;
  }
}

/**
 * The repository rejected a request and retrying will not help
 * (bad credentials, missing project, malformed path).
 */
export class TransportError extends MirrorwatchError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super("TRANSPORT", message, { cause: options.cause });
    this.name = "TransportError";
    this.status = options.status;
  }
}

/**
 * Network failure, rate limit or server error. The intent stays queued.
 */
export class TransientTransportError extends MirrorwatchError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super("TRANSPORT_TRANSIENT", message, { cause: options.cause });
    this.name = "TransientTransportError";
    this.status = options.status;
  }
}

/**
 * Configuration could not be loaded or is invalid. Monitoring halts.
 */
export class FatalConfigError extends MirrorwatchError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIG", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "FatalConfigError";
    this.issues = issues;
  }
}

/**
 * Transient transport failures and unexpected errors (I/O) are retried;
 * classified rejections are not
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof TransientTransportError || !(error instanceof MirrorwatchError);
}

/**
 * Render an unknown thrown value as a single line
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

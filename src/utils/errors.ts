export type HassLinkErrorCode =
  | 'NOT_FOUND'
  | 'MISSING_CREDENTIAL'
  | 'MISCONFIGURED'
  | 'HTTP_ERROR'
  | 'PROCESS_ERROR';

/**
 * Base class for every error this package throws on purpose.
 */
export class HassLinkError extends Error {
  readonly code: HassLinkErrorCode;

  constructor(code: HassLinkErrorCode, message: string) {
    super(message);
    this.name = 'HassLinkError';
    this.code = code;
  }
}

/**
 * Missing config/secrets file, unknown server name, or a missing secrets section.
 */
export class NotFoundError extends HassLinkError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class MissingCredentialError extends HassLinkError {
  constructor(message: string) {
    super('MISSING_CREDENTIAL', message);
    this.name = 'MissingCredentialError';
  }
}

export class MisconfiguredError extends HassLinkError {
  constructor(message: string) {
    super('MISCONFIGURED', message);
    this.name = 'MisconfiguredError';
  }
}

/**
 * Non-2xx response from the automation hub.
 */
export class HttpError extends HassLinkError {
  readonly status: number;
  readonly statusText: string;
  readonly body: string;
  readonly url: string;

  constructor(url: string, status: number, statusText: string, body: string) {
    super('HTTP_ERROR', `${status} ${statusText} for ${url}${body ? `: ${body}` : ''}`);
    this.name = 'HttpError';
    this.url = url;
    this.status = status;
    this.statusText = statusText;
    this.body = body;
  }
}

/**
 * The ssh client could not be launched, exited early, or timed out while launching.
 */
export class ProcessError extends HassLinkError {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, exitCode: number | null = null, stderr = '') {
    super('PROCESS_ERROR', message);
    this.name = 'ProcessError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

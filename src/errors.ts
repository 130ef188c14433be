export type SheetErrorKind =
  | 'AuthenticationFailure'
  | 'NotFound'
  | 'InvalidAddress'
  | 'InvalidValue'
  | 'AlreadyExists'
  | 'RemoteFailure';

export interface SheetErrorDetails {
  operation: string;
  target?: string;
  status?: number;
  cause?: unknown;
}

export class SheetError extends Error {
  readonly kind: SheetErrorKind;
  readonly operation: string;
  readonly target?: string;
  readonly status?: number;

  constructor(kind: SheetErrorKind, detail: string, details: SheetErrorDetails) {
    const where = details.target ? ` for ${details.target}` : '';
    super(`${details.operation} failed${where}: ${detail}`, { cause: details.cause });
    this.name = 'SheetError';
    this.kind = kind;
    this.operation = details.operation;
    this.target = details.target;
    this.status = details.status;
  }
}

export function isSheetError(error: unknown): error is SheetError {
  return error instanceof SheetError;
}

const AUTH_ERROR_CODES = new Set(['invalid_grant', 'unauthorized_client', 'invalid_client']);
const INVALID_RANGE_PATTERN = /unable to parse range|exceeds grid limits/i;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function responseOf(error: unknown): Record<string, unknown> | undefined {
  if (!isRecord(error)) return undefined;
  return isRecord(error.response) ? error.response : undefined;
}

/**
 * HTTP status of an axios or gaxios error, if it carries one.
 */
export function remoteStatus(error: unknown): number | undefined {
  const response = responseOf(error);
  if (response && typeof response.status === 'number') return response.status;
  if (isRecord(error) && typeof error.status === 'number') return error.status;
  return undefined;
}

/**
 * The most specific message the remote failure offers: the Sheets API
 * `error.message` body, an OAuth `error_description`, or the error's own message.
 */
export function remoteMessage(error: unknown): string {
  const data = responseOf(error)?.data;
  if (isRecord(data)) {
    if (isRecord(data.error) && typeof data.error.message === 'string') {
      return data.error.message;
    }
    if (typeof data.error_description === 'string') return data.error_description;
    if (typeof data.error === 'string') return data.error;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

function oauthErrorCode(error: unknown): string | undefined {
  const data = responseOf(error)?.data;
  if (isRecord(data) && typeof data.error === 'string') return data.error;
  return undefined;
}

export function classifyRemoteError(error: unknown): SheetErrorKind {
  const status = remoteStatus(error);
  const code = oauthErrorCode(error);

  if (status === 401 || status === 403) return 'AuthenticationFailure';
  if (code !== undefined && AUTH_ERROR_CODES.has(code)) return 'AuthenticationFailure';
  if (status === 404) return 'NotFound';
  if (status === 400 && INVALID_RANGE_PATTERN.test(remoteMessage(error))) return 'InvalidAddress';
  return 'RemoteFailure';
}

/**
 * Wraps any failure in a SheetError attributed to the operation and target.
 * A SheetError passes through unchanged.
 */
export function toSheetError(error: unknown, operation: string, target?: string): SheetError {
  if (error instanceof SheetError) return error;

  return new SheetError(classifyRemoteError(error), remoteMessage(error), {
    operation,
    target,
    status: remoteStatus(error),
    cause: error
  });
}

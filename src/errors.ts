/**
 * Error factories for the failure kinds the server reports.
 *
 * Every factory returns an `McpError` so the SDK serialises it straight
 * into a JSON-RPC error object.  `data.kind` names the failure so callers
 * can tell a missing token from an upstream rejection without parsing
 * message text.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export type ErrorKind =
  | 'NotAuthenticated'
  | 'InvalidParams'
  | 'UnknownTool'
  | 'RemoteAPIError'
  | 'DuplicateTool';

export interface ErrorData {
  kind: ErrorKind;
  [key: string]: unknown;
}

function kindError(
  code: ErrorCode,
  kind: ErrorKind,
  message: string,
  extra: Record<string, unknown> = {}
): McpError {
  const data: ErrorData = { kind, ...extra };
  return new McpError(code, message, data);
}

export function notAuthenticatedError(): McpError {
  return kindError(
    ErrorCode.InvalidRequest,
    'NotAuthenticated',
    'Not authenticated. Call get_auth_url, authorize in the browser, ' +
      'then call exchange_auth_code with the code from the callback.'
  );
}

export function invalidParamsError(message: string): McpError {
  return kindError(ErrorCode.InvalidParams, 'InvalidParams', message);
}

export function missingRequiredError(keys: string[]): McpError {
  return kindError(
    ErrorCode.InvalidParams,
    'InvalidParams',
    `Missing required argument(s): ${keys.join(', ')}`,
    { missing: keys }
  );
}

export function unknownToolError(name: string): McpError {
  return kindError(ErrorCode.MethodNotFound, 'UnknownTool', `Unknown tool: ${name}`);
}

export function duplicateToolError(name: string): McpError {
  return kindError(
    ErrorCode.InternalError,
    'DuplicateTool',
    `Tool already registered: ${name}`
  );
}

/**
 * Upstream failure.  `status` is null when no HTTP response arrived.
 * A 401 means the token was rejected or has expired; the message says how
 * to re-authenticate because tokens are never refreshed.
 */
export function remoteApiError(status: number | null, detail: string): McpError {
  const prefix = status === null ? 'Miro API request failed' : `Miro API error ${status}`;
  const hint =
    status === 401
      ? ' (token rejected or expired; run get_auth_url and exchange_auth_code again)'
      : '';
  return kindError(ErrorCode.InternalError, 'RemoteAPIError', `${prefix}: ${detail}${hint}`, {
    status,
  });
}

function isErrorData(value: unknown): value is ErrorData {
  return typeof value === 'object' && value !== null && 'kind' in value;
}

/** The kind carried by an error raised through this module, if any. */
export function errorKind(error: unknown): ErrorKind | undefined {
  if (error instanceof McpError && isErrorData(error.data)) {
    return error.data.kind;
  }
  return undefined;
}

import type { ErrorCode, ErrorKind, ErrorResponse } from './types.ts';

export class HttpError extends Error {
  constructor(
    public status: number,
    public code: ErrorCode,
    public title: string,
    message: string,
  ) {
    super(message);
  }
}

export const ERROR_KIND: Record<ErrorCode, ErrorKind> = {
  E_INVALID_JSON: 'validation',
  E_VALIDATION: 'validation',
  E_BAD_REQUEST: 'validation',
  E_RATE_LIMITED: 'rate-limit',
  E_CONSENT_NOT_FOUND: 'not-found',
  E_NOT_FOUND: 'not-found',
  E_METHOD_NOT_ALLOWED: 'method-not-allowed',
  E_PAYLOAD_TOO_LARGE: 'payload-too-large',
  E_INTERNAL: 'internal',
};

export const errorTypeUrl = (docsBaseUrl: string, kind: ErrorKind): string => `${docsBaseUrl}/errors/${kind}`;

/** E_CONSENT_NOT_FOUND links to `#consent_not_found` on the troubleshooting page. */
export const helpUrl = (docsBaseUrl: string, code: ErrorCode): string =>
  `${docsBaseUrl}/troubleshooting#${code.slice(2).toLowerCase()}`;

export function errorBody(
  error: HttpError,
  docsBaseUrl: string,
  requestId: string,
  extra: { state?: string; details?: unknown } = {},
): ErrorResponse {
  const body: ErrorResponse = {
    status: 'error',
    error: {
      code: error.code,
      type: errorTypeUrl(docsBaseUrl, ERROR_KIND[error.code]),
      title: error.title,
      detail: error.message,
      help_url: helpUrl(docsBaseUrl, error.code),
    },
    meta: { request_id: requestId, timestamp: new Date().toISOString() },
  };
  if (extra.state) body.state = extra.state;
  if (extra.details !== undefined) body.details = extra.details;
  return body;
}

export function jsonResponse(
  body: object,
  status: number,
  requestId: string,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      'content-type': 'application/json',
      'cache-control': 'no-store',
      'x-content-type-options': 'nosniff',
      'content-security-policy': "default-src 'none'; frame-ancestors 'none'",
      'x-request-id': requestId,
      ...headers,
    },
  });
}

import { randomUUID } from 'node:crypto';
import http from 'node:http';
import { HttpError, errorBody, jsonResponse } from './errors.ts';
import type { Handler } from './handler.ts';
import type { Logger } from './logger.ts';

export type ServerOptions = {
  port: number;
  host: string;
  maxBodyBytes: number;
  docsBaseUrl: string;
  logger: Logger;
};

// Routing only looks at the path, so the Host header never feeds the URL.
const URL_BASE = 'http://localhost';

export function headersFromIncoming(raw: http.IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    for (const item of Array.isArray(value) ? value : [value]) {
      headers.append(name, item);
    }
  }
  return headers;
}

export function toFetchRequest(req: http.IncomingMessage, body: Buffer): Request {
  const method = req.method ?? 'GET';
  let url: URL;
  try {
    url = new URL(req.url ?? '/', URL_BASE);
  } catch {
    throw new HttpError(400, 'E_BAD_REQUEST', 'Bad Request', 'Request target is not a valid path');
  }
  return new Request(url, {
    method,
    headers: headersFromIncoming(req.headers),
    body: method === 'GET' || method === 'HEAD' || body.length === 0 ? undefined : body.toString('utf8'),
  });
}

/**
 * Collects a request body. Past `maxBytes` the rest is drained unbuffered so
 * the connection survives to carry the 413.
 */
export async function readBody(source: AsyncIterable<Buffer | string>, maxBytes: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of source) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    total += buffer.length;
    if (total <= maxBytes) chunks.push(buffer);
  }
  if (total > maxBytes) {
    throw new HttpError(413, 'E_PAYLOAD_TOO_LARGE', 'Payload Too Large', `Request body exceeds ${maxBytes} bytes`);
  }
  return Buffer.concat(chunks);
}

/** Answers requests refused before they reach the handler. */
export function rejectionResponse(error: HttpError, docsBaseUrl: string): Response {
  const requestId = randomUUID();
  return jsonResponse(errorBody(error, docsBaseUrl, requestId), error.status, requestId);
}

async function writeResponse(res: http.ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  res.end(Buffer.from(await response.arrayBuffer()));
}

/** Serves a Fetch-style handler over node:http; resolves once listening. */
export function startServer(handler: Handler, options: ServerOptions): Promise<http.Server> {
  const { logger } = options;

  const server = http.createServer((req, res) => {
    readBody(req, options.maxBodyBytes)
      .then((body) => toFetchRequest(req, body))
      .then(
        (request) => handler(request, { remoteAddress: req.socket.remoteAddress }),
        (error: unknown) => {
          if (!(error instanceof HttpError)) throw error;
          logger.warn('request_rejected', { code: error.code, status: error.status, method: req.method });
          return rejectionResponse(error, options.docsBaseUrl);
        },
      )
      .then((response) => writeResponse(res, response))
      .catch((error: unknown) => {
        logger.error('response_failed', { error });
        res.destroy(error instanceof Error ? error : new Error(String(error)));
      });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Logger } from 'pino';
import { serializeError } from '@trawl/search';
import { RequestError, httpStatusFor, toErrorPayload } from '../errors.js';
import { formatResult } from '../format.js';
import type { Dispatch, MethodName } from '../handlers.js';

const HEALTH_PATH = '/healthz';
const CONTENT_TYPE_JSON = 'application/json; charset=utf-8';
const CONTENT_TYPE_TEXT = 'text/plain; charset=utf-8';
const MAX_BODY_BYTES = 1024 * 1024;

const ROUTES: Record<string, { method: 'GET' | 'POST'; rpc: MethodName }> = {
  '/search': { method: 'POST', rpc: 'search_jobs' },
  '/details': { method: 'POST', rpc: 'get_job_details' },
  '/sessions': { method: 'GET', rpc: 'list_sessions' },
};

export interface HttpServerOptions {
  dispatch: Dispatch;
  logger: Logger;
}

export interface HttpServerHandle {
  port: number;
  close: () => Promise<void>;
}

function resolveUrl(request: IncomingMessage): URL {
  try {
    return new URL(request.url ?? '/', 'http://localhost');
  } catch {
    return new URL('/', 'http://localhost');
  }
}

function writeText(response: ServerResponse, statusCode: number, contentType: string, body: string): void {
  response.statusCode = statusCode;
  response.setHeader('Content-Type', contentType);
  response.end(body);
}

function writeJson(response: ServerResponse, statusCode: number, body: unknown): void {
  writeText(response, statusCode, CONTENT_TYPE_JSON, `${JSON.stringify(body)}\n`);
}

function parseJsonBody(chunks: Buffer[]): unknown {
  const raw = Buffer.concat(chunks).toString('utf-8').trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RequestError(`Request body is not valid JSON: ${message}`);
  }
}

/**
 * Oversized bodies are read to the end and then rejected with `PayloadTooLarge`.
 */
function readJsonBody(request: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    request.on('data', (chunk: Buffer | string) => {
      size += Buffer.byteLength(chunk);
      if (size <= MAX_BODY_BYTES) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
    });
    request.once('error', reject);
    request.once('end', () => {
      if (size > MAX_BODY_BYTES) {
        reject(new RequestError('Request body too large', { limitBytes: MAX_BODY_BYTES }, 'PayloadTooLarge'));
        return;
      }

      try {
        resolve(parseJsonBody(chunks));
      } catch (error) {
        reject(error);
      }
    });
  });
}

export function createHttpServer(options: HttpServerOptions): Server {
  const { dispatch, logger } = options;

  return createServer((request, response) => {
    void (async () => {
      const url = resolveUrl(request);

      if (url.pathname === HEALTH_PATH) {
        writeText(response, 200, CONTENT_TYPE_TEXT, 'ok\n');
        return;
      }

      const route = ROUTES[url.pathname];
      if (!route) {
        writeJson(response, 404, { error: { code: 'NotFound', message: 'not found', details: {} } });
        return;
      }

      if (request.method !== route.method) {
        response.setHeader('Allow', route.method);
        writeJson(response, 405, { error: { code: 'MethodNotAllowed', message: `Use ${route.method}`, details: {} } });
        return;
      }

      const asText = url.searchParams.get('format') === 'text';

      try {
        const params = route.method === 'POST' ? await readJsonBody(request) : {};
        const outcome = await dispatch(route.rpc, params);

        if (asText) {
          writeText(response, 200, CONTENT_TYPE_TEXT, `${formatResult(outcome)}\n`);
        } else {
          writeJson(response, 200, { result: outcome.result });
        }
      } catch (error) {
        const payload = toErrorPayload(error);
        const status = httpStatusFor(payload.code);
        const log = status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
        log({ event: 'request_failed', path: url.pathname, status, error: serializeError(error) }, 'Request failed');

        if (asText) {
          writeText(response, status, CONTENT_TYPE_TEXT, `Error: ${payload.message}\n`);
        } else {
          writeJson(response, status, { error: payload });
        }
      }
    })();
  });
}

export async function startHttpServer(options: HttpServerOptions & { host: string; port: number }): Promise<HttpServerHandle> {
  const server = createHttpServer(options);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address() as AddressInfo | null;
  const port = address?.port ?? options.port;
  options.logger.info({ event: 'http_server_started', host: options.host, port }, 'HTTP server started');

  return {
    port,
    close: async () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }

          resolve();
        });
      }),
  };
}

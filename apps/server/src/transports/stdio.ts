import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from 'pino';
import { z } from 'zod';
import { serializeError } from '@trawl/search';
import { RequestError, toErrorPayload } from '../errors.js';
import type { Dispatch } from '../handlers.js';

const requestSchema = z.object({
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

type RequestId = string | number | null;

export interface StdioTransportOptions {
  dispatch: Dispatch;
  logger: Logger;
  input: Readable;
  output: Writable;
}

export interface StdioTransportHandle {
  /** Resolves once input has ended and every pending request has been answered. */
  closed: Promise<void>;
  close: () => Promise<void>;
}

function readId(raw: unknown): RequestId {
  if (typeof raw !== 'object' || raw === null || !('id' in raw)) return null;
  return typeof raw.id === 'string' || typeof raw.id === 'number' ? raw.id : null;
}

function parseLine(line: string): { id: RequestId; method: string; params: unknown } {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RequestError(`Request is not valid JSON: ${message}`);
  }

  const parsed = requestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RequestError('Request must be an object with a string "method"', {
      id: readId(raw),
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }

  return { id: parsed.data.id ?? null, method: parsed.data.method, params: parsed.data.params };
}

/**
 * One JSON request per input line, one JSON response per output line.
 * Requests run concurrently; responses carry the request id.
 */
export function startStdioTransport(options: StdioTransportOptions): StdioTransportHandle {
  const { dispatch, logger, input, output } = options;
  const rl = createInterface({ input, crlfDelay: Infinity });
  const pending = new Set<Promise<void>>();

  const write = (message: unknown) => {
    output.write(`${JSON.stringify(message)}\n`);
  };

  const handleLine = async (line: string): Promise<void> => {
    let id: RequestId = null;

    try {
      const request = parseLine(line);
      id = request.id;
      const outcome = await dispatch(request.method, request.params);
      write({ id, result: outcome.result });
    } catch (error) {
      if (error instanceof RequestError && id === null) {
        id = readId(error.details);
      }
      logger.warn({ event: 'request_failed', id, error: serializeError(error) }, 'Request failed');
      write({ id, error: toErrorPayload(error) });
    }
  };

  rl.on('line', (line) => {
    if (!line.trim()) return;

    const task = handleLine(line)
      .catch((error: unknown) => {
        logger.error({ event: 'response_write_failed', error: serializeError(error) }, 'Failed to write response');
      })
      .finally(() => pending.delete(task));
    pending.add(task);
  });

  const closed = new Promise<void>((resolve) => {
    rl.once('close', () => {
      void Promise.allSettled([...pending]).then(() => resolve());
    });
  });

  logger.info({ event: 'stdio_transport_started' }, 'stdio transport started');

  return {
    closed,
    close: async () => {
      rl.close();
      await closed;
    },
  };
}

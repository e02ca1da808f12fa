import { once } from 'node:events';
import { PassThrough } from 'node:stream';
import { describe, it, expect, vi } from 'vitest';
import { SessionExpiredError } from '@trawl/search';
import type { Dispatch, MethodResult } from '../../src/handlers.js';
import { createLogger } from '../../src/observability/logger.js';
import { startStdioTransport } from '../../src/transports/stdio.js';

const sessionsResult: MethodResult = { method: 'list_sessions', result: [] };

async function exchange(dispatch: Dispatch, lines: string[]): Promise<unknown[]> {
  const input = new PassThrough();
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf-8')));

  const transport = startStdioTransport({ dispatch, logger: createLogger({ level: 'silent' }), input, output });
  input.end(lines.map((line) => `${line}\n`).join(''));
  await transport.closed;
  output.end();
  await once(output, 'end');

  return chunks
    .join('')
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => JSON.parse(line) as unknown);
}

describe('stdio transport', () => {
  it('answers each request line with its id', async () => {
    const dispatch = vi.fn<Dispatch>().mockResolvedValue(sessionsResult);

    const responses = await exchange(dispatch, ['{"id":1,"method":"list_sessions"}', '', '{"id":"b","method":"list_sessions","params":{}}']);

    expect(dispatch).toHaveBeenCalledTimes(2);
    expect(dispatch).toHaveBeenNthCalledWith(1, 'list_sessions', undefined);
    expect(responses).toEqual(expect.arrayContaining([{ id: 1, result: [] }, { id: 'b', result: [] }]));
    expect(responses).toHaveLength(2);
  });

  it('reports domain errors with code and details', async () => {
    const dispatch = vi.fn<Dispatch>().mockRejectedValue(new SessionExpiredError('s1'));

    const responses = await exchange(dispatch, ['{"id":7,"method":"get_job_details","params":{"session_id":"s1","job_index":1}}']);

    expect(responses).toEqual([
      {
        id: 7,
        error: {
          code: 'SessionExpired',
          message: 'Search session s1 has expired, run a new search',
          details: { sessionId: 's1' },
        },
      },
    ]);
  });

  it('rejects malformed lines without dispatching', async () => {
    const dispatch = vi.fn<Dispatch>();

    const responses = await exchange(dispatch, ['not json', '{"id":3}']);

    expect(dispatch).not.toHaveBeenCalled();
    expect(responses).toEqual([
      { id: null, error: expect.objectContaining({ code: 'InvalidRequest' }) },
      { id: 3, error: expect.objectContaining({ code: 'InvalidRequest' }) },
    ]);
  });
});

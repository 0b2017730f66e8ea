import type { Server } from 'node:http';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { isJsonObject } from '../src/api/jsonValues';
import { createApp } from '../src/app';
import { loadCodecConfig } from '../src/config/codecConfig';

let server: Server;
let baseUrl = '';

interface Reply {
  status: number;
  body: unknown;
}

async function request(method: 'GET' | 'POST', path: string, body?: string): Promise<Reply> {
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'content-type': 'application/json' },
    body,
  });
  return { status: res.status, body: await res.json() };
}

const post = (path: string, body: unknown): Promise<Reply> => request('POST', path, JSON.stringify(body));

async function waitForJob(jobId: string): Promise<unknown> {
  for (let attempt = 0; attempt < 100; attempt++) {
    const { body } = await request('GET', `/api/status/${jobId}`);
    if (isJsonObject(body) && isJsonObject(body.job) && (body.job.status === 'completed' || body.job.status === 'failed')) {
      return body.job;
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error(`job ${jobId} did not finish`);
}

function jobIdOf(body: unknown): string {
  if (isJsonObject(body) && typeof body.jobId === 'string') return body.jobId;
  throw new Error('no jobId in response');
}

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  const app = createApp({ config: loadCodecConfig({}) });
  await new Promise<void>((resolve) => {
    server = app.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  vi.restoreAllMocks();
});

describe('GET /health', () => {
  it('reports an idle queue', async () => {
    expect(await request('GET', '/health')).toEqual({
      status: 200,
      body: { status: 'ok', queue: { length: 0, running: 0, idle: true } },
    });
  });
});

describe('POST /api/from_csv', () => {
  it('decodes records and passes nulls through', async () => {
    const reply = await post('/api/from_csv', { schema: 'a INT, b DOUBLE', values: ['1,0.8', null] });
    expect(reply).toEqual({
      status: 200,
      body: { success: true, schema: 'STRUCT<a: INT, b: DOUBLE>', rows: [{ a: 1, b: 0.8 }, null] },
    });
  });

  it('reads timestamps in the requested zone', async () => {
    const reply = await post('/api/from_csv', {
      schema: 't TIMESTAMP',
      values: ['2015-08-26 12:00:00'],
      timeZone: 'Asia/Tokyo',
    });
    expect(reply.body).toMatchObject({ rows: [{ t: '2015-08-26T03:00:00.000Z' }] });
  });

  it('keeps malformed records in the corrupt column', async () => {
    const reply = await post('/api/from_csv', {
      schema: 'a INT, _corrupt_record STRING',
      values: ['x'],
    });
    expect(reply.body).toMatchObject({ rows: [{ a: null, _corrupt_record: 'x' }] });
  });

  it('answers 422 for a malformed record under FAILFAST', async () => {
    const reply = await post('/api/from_csv', { schema: 'a INT', values: ['x'], options: { mode: 'FAILFAST' } });
    expect(reply.status).toBe(422);
    expect(reply.body).toMatchObject({ success: false, errorClass: 'MALFORMED_RECORD_IN_PARSING' });
  });

  it('answers 400 for an unsupported mode', async () => {
    const reply = await post('/api/from_csv', { schema: 'a INT', values: [], options: { mode: 'DROPMALFORMED' } });
    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({ errorClass: 'UNSUPPORTED_PARSE_MODE' });
  });

  it('answers 400 for a missing schema', async () => {
    const reply = await post('/api/from_csv', { values: [] });
    expect(reply).toEqual({
      status: 400,
      body: {
        success: false,
        error: '$.schema: expected a string',
        errorClass: 'INVALID_INPUT',
        messageParameters: { path: '$.schema' },
      },
    });
  });

  it('answers 400 for a body that is not JSON', async () => {
    const reply = await request('POST', '/api/from_csv', '{"schema":');
    expect(reply.status).toBe(400);
  });
});

describe('POST /api/to_csv', () => {
  it('encodes rows given by name or by position', async () => {
    const reply = await post('/api/to_csv', {
      schema: 'a INT, b STRING',
      rows: [{ a: 1, b: 'x' }, [2, 'y,z'], null],
    });
    expect(reply).toEqual({ status: 200, body: { success: true, records: ['1,x', '2,"y,z"', null] } });
  });

  it('answers 400 for invalid options even without rows', async () => {
    const reply = await post('/api/to_csv', { schema: 'a INT', rows: [], options: { quote: 'ab' } });
    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({ errorClass: 'INVALID_OPTION' });
  });

  it('answers 400 for a value of the wrong type', async () => {
    const reply = await post('/api/to_csv', { schema: 'a INT', rows: [{ a: 'one' }] });
    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({ error: '$.rows[0].a: expected INT, got "one"' });
  });
});

describe('POST /api/schema_of_csv', () => {
  it('infers a schema', async () => {
    expect(await post('/api/schema_of_csv', { csv: '1,abc' })).toEqual({
      status: 200,
      body: { success: true, schema: 'STRUCT<_c0: INT, _c1: STRING>' },
    });
  });

  it('answers 400 for a null sample', async () => {
    const reply = await post('/api/schema_of_csv', { csv: null });
    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({ errorClass: 'DATATYPE_MISMATCH.UNEXPECTED_NULL' });
  });
});

describe('jobs', () => {
  it('decodes partitions in the background', async () => {
    const queued = await post('/api/jobs', { schema: 'a INT', partitions: [['1', '2'], ['x']] });
    expect(queued.status).toBe(202);
    expect(queued.body).toMatchObject({ success: true, status: 'queued', totalPartitions: 2 });
    const jobId = jobIdOf(queued.body);

    expect(await waitForJob(jobId)).toMatchObject({ status: 'completed', progress: 100, completedPartitions: 2 });
    expect(await request('GET', `/api/result/${jobId}`)).toEqual({
      status: 200,
      body: { success: true, result: { partitions: [[{ a: 1 }, { a: 2 }], [{ a: null }]] } },
    });
  });

  it('records a failed job', async () => {
    const queued = await post('/api/jobs', { schema: 'a INT', partitions: [['x']], options: { mode: 'FAILFAST' } });
    const jobId = jobIdOf(queued.body);
    expect(await waitForJob(jobId)).toMatchObject({ status: 'failed', errorClass: 'MALFORMED_RECORD_IN_PARSING' });
    expect((await request('GET', `/api/result/${jobId}`)).status).toBe(400);
  });

  it('rejects a job with a bad schema up front', async () => {
    const reply = await post('/api/jobs', { schema: 'a FOO', partitions: [] });
    expect(reply.status).toBe(400);
  });

  it('answers 404 for unknown jobs', async () => {
    expect((await request('GET', '/api/status/job-missing')).status).toBe(404);
    expect((await request('GET', '/api/result/job-missing')).status).toBe(404);
  });
});

import { describe, test, expect } from 'vitest';
import { ApiError, createApiClient } from './index';

interface Call {
  url: string;
  method: string;
  body: string | null;
  contentType: string | null;
}

function fakeFetch(response: () => Response) {
  const calls: Call[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method ?? 'GET',
      body: typeof init?.body === 'string' ? init.body : null,
      contentType: new Headers(init?.headers).get('Content-Type'),
    });
    return response();
  };
  return { fetchImpl, calls };
}

describe('createApiClient', () => {
  test('submits a run as JSON', async () => {
    const { fetchImpl, calls } = fakeFetch(() => Response.json({ id: 'job-1' }, { status: 202 }));
    const client = createApiClient({ baseUrl: 'http://localhost:3001', fetchImpl });

    const result = await client.jobs.submit({
      image: 'mhubai/lungmask:latest',
      inputPath: '/data/in',
      outputPath: '/data/out',
      gpus: [],
      args: [],
    });

    expect(result).toEqual({ id: 'job-1' });
    expect(calls).toEqual([
      {
        url: 'http://localhost:3001/api/jobs',
        method: 'POST',
        body: '{"image":"mhubai/lungmask:latest","inputPath":"/data/in","outputPath":"/data/out","gpus":[],"args":[]}',
        contentType: 'application/json',
      },
    ]);
  });

  test('encodes ids and queries', async () => {
    const { fetchImpl, calls } = fakeFetch(() => Response.json({ models: [], fetchedAt: null }));
    const client = createApiClient({ baseUrl: '', fetchImpl });

    await client.models.list('lung ct');
    await client.models.get('a/b');

    expect(calls.map((c) => c.url)).toEqual(['/api/models?q=lung%20ct', '/api/models/a%2Fb']);
  });

  test('raises ApiError with the backend error kind', async () => {
    const { fetchImpl } = fakeFetch(() =>
      Response.json({ error: { message: 'Job not found: x', statusCode: 404, kind: 'NotFound' } }, { status: 404 })
    );
    const client = createApiClient({ baseUrl: '', fetchImpl });

    const error = await client.jobs.get('x').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ statusCode: 404, kind: 'NotFound', message: 'Job not found: x' });
  });

  test('falls back to the status text when the body is not JSON', async () => {
    const { fetchImpl } = fakeFetch(() => new Response('<html>', { status: 502, statusText: 'Bad Gateway' }));
    const client = createApiClient({ baseUrl: '', fetchImpl });

    await expect(client.health.check()).rejects.toMatchObject({
      statusCode: 502,
      message: 'Request failed with status 502: Bad Gateway',
    });
  });

  test('builds the log stream url', () => {
    const { fetchImpl } = fakeFetch(() => Response.json({}));
    const client = createApiClient({ baseUrl: 'http://localhost:3001', fetchImpl });

    expect(client.jobs.logStreamUrl('job-1', { replay: true })).toBe(
      'http://localhost:3001/api/jobs/job-1/logs/stream?replay=true'
    );
  });
});

import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { FailureKind, classifyFailure } from '../resilience/error-classification';
import { CancellationError, RemoteCallError } from '../resilience/resilience.errors';
import { RemoteHttp } from './remote-http';

describe('RemoteHttp', () => {
  const makeHttp = (
    adapter: (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>,
    overrides: { timeoutMs?: number; maxConcurrent?: number; maxQueue?: number } = {},
  ) =>
    new RemoteHttp(axios.create({ baseURL: 'http://remote.test', adapter }), {
      dependency: 'agent-api',
      timeoutMs: overrides.timeoutMs ?? 1000,
      maxConcurrent: overrides.maxConcurrent ?? 10,
      maxQueue: overrides.maxQueue ?? 10,
    });

  const reply =
    (status: number, data: unknown = {}, headers: Record<string, string> = {}) =>
    async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => ({
      data,
      status,
      statusText: '',
      headers,
      config,
    });

  const failure = (promise: Promise<unknown>): Promise<unknown> =>
    promise.then(
      () => undefined,
      (error: unknown) => error,
    );

  it('returns responses with an expected status', async () => {
    const http = makeHttp(reply(201, { run_id: 'r1' }));

    const response = await http.request({ method: 'post', url: '/runs' }, [201]);

    expect(response.status).toBe(201);
    expect(response.data).toEqual({ run_id: 'r1' });
  });

  it('turns unexpected statuses into classified RemoteCallErrors', async () => {
    const http = makeHttp(reply(503, { error: 'overloaded' }));

    const error = await failure(http.request({ method: 'post', url: '/runs' }, [201]));

    expect(error).toBeInstanceOf(RemoteCallError);
    expect(error).toMatchObject({
      dependency: 'agent-api',
      statusCode: 503,
      responseBody: { error: 'overloaded' },
      message: 'agent-api responded 503 to POST /runs',
    });
    expect(classifyFailure(error)).toBe(FailureKind.TRANSIENT);
  });

  it('reads Retry-After from rate-limited responses', async () => {
    const http = makeHttp(reply(429, {}, { 'retry-after': '12' }));

    await expect(http.request({ url: '/runs' }, [200])).rejects.toMatchObject({
      statusCode: 429,
      retryAfterMs: 12000,
    });
  });

  it('translates network errors', async () => {
    const http = makeHttp(async (config) => {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:80', 'ECONNREFUSED', config);
    });

    const error = await failure(http.request({ url: '/runs' }, [200]));

    expect(error).toBeInstanceOf(RemoteCallError);
    expect(error).toMatchObject({ code: 'ECONNREFUSED', statusCode: undefined });
    expect(classifyFailure(error)).toBe(FailureKind.TRANSIENT);
  });

  it('times out slow calls', async () => {
    const http = makeHttp(() => new Promise<AxiosResponse>(() => undefined), { timeoutMs: 20 });

    await expect(http.request({ url: '/slow' }, [200])).rejects.toMatchObject({
      code: 'ETIMEDOUT',
      message: 'agent-api timed out after 20ms on GET /slow',
    });
  });

  it('rejects calls beyond the concurrency limit', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const http = makeHttp(
      async (config) => {
        await gate;
        return { data: {}, status: 200, statusText: '', headers: {}, config };
      },
      { maxConcurrent: 1, maxQueue: 0 },
    );

    const first = http.request({ url: '/a' }, [200]);
    await expect(http.request({ url: '/b' }, [200])).rejects.toMatchObject({ code: 'EBULKHEAD' });

    release();
    await expect(first).resolves.toMatchObject({ status: 200 });
  });

  it('reports caller cancellation as CancellationError', async () => {
    const controller = new AbortController();
    controller.abort();
    const http = makeHttp(reply(200));

    await expect(http.request({ url: '/runs' }, [200], controller.signal)).rejects.toBeInstanceOf(
      CancellationError,
    );
  });
});

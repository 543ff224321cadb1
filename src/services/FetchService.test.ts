import https from 'node:https';
import { describe, expect, it, vi } from 'vitest';
import { FetchError } from '../types/errors.js';
import { buildPageParams, FetchService, type HttpGet, type Sleep } from './FetchService.js';

const OPTIONS = {
  baseUrl: 'https://radio.example/log.asp',
  retries: 3,
  retryDelayMs: 10,
  encoding: 'utf-8',
};

describe('buildPageParams', () => {
  it('should leave out the day offset for today', () => {
    expect(buildPageParams({ page: 1, daysAgo: 0 })).toEqual({ p: '1' });
  });

  it('should send the day offset for earlier days', () => {
    expect(buildPageParams({ page: 3, daysAgo: 2 })).toEqual({ p: '3', dt: '2' });
  });
});

describe('FetchService', () => {
  it('should request the page and decode the body', async () => {
    const httpGet = vi.fn<HttpGet>().mockResolvedValue({
      status: 200,
      data: Buffer.from('<html>曲目</html>', 'utf8'),
    });
    const sleep = vi.fn<Sleep>().mockResolvedValue(undefined);
    const service = new FetchService(OPTIONS, httpGet, sleep);

    await expect(service.fetchPage({ page: 2, daysAgo: 1 })).resolves.toBe('<html>曲目</html>');
    expect(httpGet).toHaveBeenCalledWith(
      'https://radio.example/log.asp',
      expect.objectContaining({ params: { p: '2', dt: '1' }, responseType: 'arraybuffer' })
    );
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry with growing delays until a response has a body', async () => {
    const httpGet = vi
      .fn<HttpGet>()
      .mockResolvedValueOnce({ status: 503, data: Buffer.alloc(0) })
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce({ status: 200, data: Buffer.from('ok') });
    const sleep = vi.fn<Sleep>().mockResolvedValue(undefined);
    const service = new FetchService(OPTIONS, httpGet, sleep);

    await expect(service.fetchPage({ page: 1, daysAgo: 0 })).resolves.toBe('ok');
    expect(httpGet).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[10], [20]]);
  });

  it('should treat an empty 200 response as a failure', async () => {
    const httpGet = vi
      .fn<HttpGet>()
      .mockResolvedValueOnce({ status: 200, data: Buffer.alloc(0) })
      .mockResolvedValueOnce({ status: 200, data: Buffer.from('ok') });
    const sleep = vi.fn<Sleep>().mockResolvedValue(undefined);

    await expect(new FetchService(OPTIONS, httpGet, sleep).fetchPage({ page: 1, daysAgo: 0 })).resolves.toBe(
      'ok'
    );
    expect(httpGet).toHaveBeenCalledTimes(2);
  });

  it('should give up after the last attempt with the last failure', async () => {
    const httpGet = vi.fn<HttpGet>().mockResolvedValue({ status: 500, data: Buffer.from('error') });
    const sleep = vi.fn<Sleep>().mockResolvedValue(undefined);
    const service = new FetchService(OPTIONS, httpGet, sleep);

    const error = await service.fetchPage({ page: 1, daysAgo: 0 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    if (error instanceof FetchError) {
      expect(error.context).toEqual({ params: { p: '1' }, lastError: 'HTTP 500', attempts: 3 });
    }
    expect(httpGet).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should decode with the configured encoding', async () => {
    const bytes = Buffer.from('中天好', 'utf8');
    const httpGet = vi.fn<HttpGet>().mockResolvedValue({ status: 200, data: bytes });
    const sleep = vi.fn<Sleep>().mockResolvedValue(undefined);
    const service = new FetchService({ ...OPTIONS, encoding: 'latin1' }, httpGet, sleep);

    await expect(service.fetchPage({ page: 1, daysAgo: 0 })).resolves.toBe(bytes.toString('latin1'));
  });

  it('should reuse one HTTPS agent built from the certificate setting', async () => {
    const httpGet = vi
      .fn<HttpGet>()
      .mockResolvedValueOnce({ status: 503, data: Buffer.alloc(0) })
      .mockResolvedValueOnce({ status: 200, data: Buffer.from('ok') });
    const sleep = vi.fn<Sleep>().mockResolvedValue(undefined);
    const service = new FetchService({ ...OPTIONS, verifySsl: false }, httpGet, sleep);

    await service.fetchPage({ page: 1, daysAgo: 0 });

    const [first, second] = httpGet.mock.calls.map(([, requestConfig]) => requestConfig.httpsAgent);
    expect(first).toBe(second);
    expect(first).toBeInstanceOf(https.Agent);
    if (first instanceof https.Agent) {
      expect(first.options.rejectUnauthorized).toBe(false);
    }
  });
});

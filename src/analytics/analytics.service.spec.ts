import { Logger } from '@nestjs/common';
import { AnalyticsService, PLAUSIBLE_EVENTS_URL } from './analytics.service';

describe('AnalyticsService', () => {
  let fetchMock: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch').mockResolvedValue(new Response(null, { status: 202 }));
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('does nothing without a domain', async () => {
    const service = new AnalyticsService({});

    await service.pageview({ url: '/abcde.txt' });

    expect(service.enabled).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts a pageview with the client headers', async () => {
    const service = new AnalyticsService({ domain: 'files.example.com' });

    await service.pageview({ url: '/abcde.txt', userAgent: 'curl/8.0', clientIp: '203.0.113.7' });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(PLAUSIBLE_EVENTS_URL);
    expect(init).toMatchObject({
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'curl/8.0',
        'X-Forwarded-For': '203.0.113.7'
      },
      body: '{"name":"pageview","domain":"files.example.com","url":"/abcde.txt"}'
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('leaves out headers it does not know', async () => {
    const service = new AnalyticsService({ domain: 'files.example.com', endpoint: 'http://localhost:8000/api/event' });

    await service.pageview({ url: '/abcde.png' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:8000/api/event');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('logs rejected events without failing', async () => {
    fetchMock.mockResolvedValue(new Response('bad request', { status: 400 }));
    const service = new AnalyticsService({ domain: 'files.example.com' });

    await expect(service.pageview({ url: '/abcde.txt' })).resolves.toBeUndefined();
    expect(Logger.prototype.warn).toHaveBeenCalledWith('Plausible rejected event with HTTP 400');
  });

  it('swallows network failures after logging them', async () => {
    fetchMock.mockRejectedValue(new Error('getaddrinfo ENOTFOUND plausible.io'));
    const service = new AnalyticsService({ domain: 'files.example.com' });

    await expect(service.pageview({ url: '/abcde.txt' })).resolves.toBeUndefined();
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      'Failed to send Plausible event: getaddrinfo ENOTFOUND plausible.io'
    );
  });
});

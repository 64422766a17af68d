import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HttpDiscoveryService } from './discovery.js';
import { silenceConsole } from '../test/fixtures.js';

describe('HttpDiscoveryService', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    silenceConsole();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('posts to the reinitialization endpoint', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 200 }));

    await new HttpDiscoveryService('http://discovery.test/reinit').reinitialize();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('http://discovery.test/reinit');
    expect(fetchMock.mock.calls[0][1]?.method).toBe('POST');
  });

  it('logs an unavailable service as a warning', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 503, statusText: 'Service Unavailable' }));

    await expect(new HttpDiscoveryService('http://discovery.test/reinit').reinitialize()).resolves.toBeUndefined();
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Discovery reinitialization failed: 503 Service Unavailable'));
  });

  it('does not raise on network errors', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(new HttpDiscoveryService('http://discovery.test/reinit').reinitialize()).resolves.toBeUndefined();
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('fetch failed'));
  });
});

import { describe, it, expect, vi, afterEach } from 'vitest';
import { downloadImage, createDownloader } from '../src/ingestion/download.js';

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe('downloadImage', () => {
  it('returns the response bytes', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(new Uint8Array([1, 2, 3]), { status: 200 }));
    const result = await downloadImage('https://i.example.com/a.png');
    expect(result).toEqual({ ok: true, value: Buffer.from([1, 2, 3]) });
  });

  it('fails on a non-2xx status', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('gone', { status: 404, statusText: 'Not Found' }));
    const result = await downloadImage('https://i.example.com/a.png');
    expect(result).toEqual({ ok: false, reason: 'HTTP 404 Not Found' });
  });

  it('fails when the request throws', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('getaddrinfo ENOTFOUND i.example.com'));
    const result = await downloadImage('https://i.example.com/a.png');
    expect(result).toEqual({ ok: false, reason: 'getaddrinfo ENOTFOUND i.example.com' });
  });

  it('passes headers and an abort signal', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(new Uint8Array([0])));
    globalThis.fetch = fetchMock;
    await createDownloader({ timeoutMs: 50, headers: { 'User-Agent': 'test-agent' } })('https://i.example.com/a.png');
    const [url, init] = fetchMock.mock.calls[0]!;
    expect(url).toBe('https://i.example.com/a.png');
    expect(init.headers).toEqual({ 'User-Agent': 'test-agent' });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });
});

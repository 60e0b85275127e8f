import { describe, it, expect, vi, afterEach } from 'vitest';
import { RedditFeedSource, toCandidate } from '../src/ingestion/adapters/reddit-feed.js';

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

function post(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    title: '  When the build passes  ',
    url: 'https://i.example.com/abc.jpg',
    permalink: '/r/memes/comments/abc/when_the_build_passes/',
    author: 'test-user',
    ups: 1234,
    stickied: false,
    over_18: false,
    ...overrides,
  };
}

function listing(...posts: Record<string, unknown>[]) {
  return { kind: 'Listing', data: { children: posts.map((data) => ({ kind: 't3', data })) } };
}

describe('toCandidate', () => {
  it('maps an image post', () => {
    expect(toCandidate(post())).toEqual({
      title: 'When the build passes',
      imageUrl: 'https://i.example.com/abc.jpg',
      sourceUrl: 'https://www.reddit.com/r/memes/comments/abc/when_the_build_passes/',
      author: 'test-user',
      score: 1234,
    });
  });

  it.each([
    ['stickied', { stickied: true }],
    ['pinned', { pinned: true }],
    ['over_18', { over_18: true }],
    ['gifv', { url: 'https://i.example.com/abc.gifv' }],
    ['mp4', { url: 'https://v.example.com/abc.MP4' }],
    ['non-image link', { url: 'https://example.com/article' }],
    ['missing url', { url: undefined }],
  ])('skips %s posts', (_name, overrides) => {
    expect(toCandidate(post(overrides))).toBeNull();
  });

  it('accepts upper-case image extensions', () => {
    expect(toCandidate(post({ url: 'https://i.example.com/abc.PNG' }))?.imageUrl).toBe('https://i.example.com/abc.PNG');
  });

  it('prefers url_overridden_by_dest', () => {
    const candidate = toCandidate(post({ url: 'https://example.com/x', url_overridden_by_dest: 'https://i.example.com/y.gif' }));
    expect(candidate?.imageUrl).toBe('https://i.example.com/y.gif');
  });

  it('defaults missing author, permalink and score', () => {
    const candidate = toCandidate(post({ author: undefined, permalink: undefined, ups: undefined }));
    expect(candidate).toMatchObject({ author: null, sourceUrl: '', score: 0 });
  });
});

describe('RedditFeedSource', () => {
  it('fetches top posts of the day and filters them', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify(listing(post(), post({ stickied: true }), post({ url: 'https://i.example.com/2.png' })))),
    );
    globalThis.fetch = fetchMock;

    const feed = new RedditFeedSource({ userAgent: 'test-agent/1.0', log: vi.fn() });
    const candidates = await feed.fetchCandidates('memes', 10);

    expect(candidates.map((c) => c.imageUrl)).toEqual(['https://i.example.com/abc.jpg', 'https://i.example.com/2.png']);
    const [url, init] = fetchMock.mock.calls[0]!;
    expect(url).toBe('https://www.reddit.com/r/memes/top.json?t=day&limit=10');
    expect(init.headers).toEqual({ 'User-Agent': 'test-agent/1.0' });
  });

  it('uses the configured base URL', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(JSON.stringify(listing(post()))));
    globalThis.fetch = fetchMock;

    const feed = new RedditFeedSource({ userAgent: 'test-agent', baseUrl: 'http://mirror.local/', log: vi.fn() });
    const [candidate] = await feed.fetchCandidates('funny', 5);

    expect(fetchMock.mock.calls[0]![0]).toBe('http://mirror.local/r/funny/top.json?t=day&limit=5');
    expect(candidate?.sourceUrl).toBe('http://mirror.local/r/memes/comments/abc/when_the_build_passes/');
  });

  it('returns no candidates and logs on HTTP failure', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('busy', { status: 429 }));
    const log = vi.fn();
    const feed = new RedditFeedSource({ userAgent: 'test-agent', log });
    expect(await feed.fetchCandidates('memes', 25)).toEqual([]);
    expect(log).toHaveBeenCalledWith('WARN', 'Failed to fetch posts from r/memes: HTTP 429');
  });

  it('returns no candidates when the request throws', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('socket hang up'));
    const log = vi.fn();
    const feed = new RedditFeedSource({ userAgent: 'test-agent', log });
    expect(await feed.fetchCandidates('memes', 25)).toEqual([]);
    expect(log).toHaveBeenCalledWith('WARN', 'Failed to fetch posts from r/memes: socket hang up');
  });

  it('tolerates a malformed listing', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(JSON.stringify({ data: { children: 'nope' } })));
    const feed = new RedditFeedSource({ userAgent: 'test-agent', log: vi.fn() });
    expect(await feed.fetchCandidates('memes', 25)).toEqual([]);
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TautulliClient, buildCoverUrl, downloadBytes } from '../../src/clients/tautulli.js';
import type { Log } from '../../src/utils/logger.js';

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function apiResponse(data: unknown, result: string = 'success') {
  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    json: async () => ({ response: { result, message: null, data } }),
  };
}

describe('TautulliClient', () => {
  let client: TautulliClient;
  let log: Log;

  beforeEach(() => {
    mockFetch.mockReset();
    log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    client = new TautulliClient('http://tautulli:8181/', 'test-api-key', {
      plexUrl: 'http://plex:32400',
      plexToken: 'test-token',
      log,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('request', () => {
    it('calls api/v2 with the key, command and parameters', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse([]));

      await client.getRecentlyAdded('season', 100);

      expect(mockFetch).toHaveBeenCalledWith(
        'http://tautulli:8181/api/v2?apikey=test-api-key&cmd=get_recently_added&media_type=season&count=100',
        expect.objectContaining({ signal: expect.any(AbortSignal) })
      );
    });

    it('does not call the API without a URL or key', async () => {
      const unconfigured = new TautulliClient('', '', { log });

      expect(await unconfigured.getRecentlyAdded('season', 100)).toEqual([]);
      expect(mockFetch).not.toHaveBeenCalled();
      expect(log.error).toHaveBeenCalledWith('[TAUTULLI] TAUTULLI_URL or TAUTULLI_APIKEY not set');
    });

    it('treats an API error result as no data', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse(null, 'error'));

      expect(await client.getMetadata('100')).toBeNull();
      expect(log.error).toHaveBeenCalledTimes(1);
    });

    it('treats an HTTP error as no data', async () => {
      mockFetch.mockResolvedValueOnce({ ok: false, status: 401, statusText: 'Unauthorized' });

      expect(await client.getRecentlyAdded('season', 100)).toEqual([]);
      expect(log.error).toHaveBeenCalledWith('[TAUTULLI] HTTP Error: 401 Unauthorized');
    });

    it('treats a network failure as no data', async () => {
      mockFetch.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      expect(await client.getChildrenMetadata('11')).toEqual([]);
    });

    it('treats a malformed body as no data', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: true,
        status: 200,
        json: async () => {
          throw new SyntaxError('Unexpected token < in JSON');
        },
      });

      expect(await client.getMetadata('100')).toBeNull();
    });
  });

  describe('getRecentlyAdded', () => {
    it('normalizes items from a list response', async () => {
      mockFetch.mockResolvedValueOnce(
        apiResponse([
          {
            rating_key: 11,
            media_type: 'season',
            title: 'Season 3',
            parent_title: 'Breaking Bad',
            grandparent_rating_key: '100',
            parent_index: '3',
            added_at: '1771502400',
            library_name: 'TV Shows',
          },
        ])
      );

      const items = await client.getRecentlyAdded('season', 100);

      expect(items).toEqual([
        {
          rating_key: '11',
          media_type: 'season',
          title: 'Season 3',
          parent_title: 'Breaking Bad',
          grandparent_rating_key: '100',
          parent_index: '3',
          added_at: '1771502400',
        },
      ]);
    });

    it('reads the recently_added list from an object response', async () => {
      mockFetch.mockResolvedValueOnce(
        apiResponse({ recently_added: [{ rating_key: '11', media_type: 'season' }] })
      );

      const items = await client.getRecentlyAdded('season', 100);

      expect(items).toHaveLength(1);
      expect(items[0].rating_key).toBe('11');
    });

    it('returns an empty list for any other response shape', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse('unexpected'));

      expect(await client.getRecentlyAdded('season', 100)).toEqual([]);
    });
  });

  describe('getMetadata', () => {
    it('returns show metadata', async () => {
      mockFetch.mockResolvedValueOnce(
        apiResponse({ rating_key: '100', title: 'Breaking Bad', added_at: '1600000000', thumb: '/library/metadata/100/thumb/1' })
      );

      expect(await client.getMetadata('100')).toEqual({
        rating_key: '100',
        title: 'Breaking Bad',
        added_at: '1600000000',
        thumb: '/library/metadata/100/thumb/1',
        art: undefined,
        poster_thumb: undefined,
      });
    });

    it('returns null when the data is not an object', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse([]));

      expect(await client.getMetadata('100')).toBeNull();
    });
  });

  describe('getChildrenMetadata', () => {
    it('drops children without a rating key and reads the file path', async () => {
      mockFetch.mockResolvedValueOnce(
        apiResponse([
          { rating_key: '111', media_type: 'episode', media_info: { parts: { file: '/tv/S03E01.mkv' } } },
          { media_type: 'episode', media_info: { parts: { file: '/tv/S03E02.mkv' } } },
          { rating_key: '113', media_type: 'episode' },
        ])
      );

      const children = await client.getChildrenMetadata('11');

      expect(children).toEqual([
        { rating_key: '111', media_type: 'episode', title: undefined, file: '/tv/S03E01.mkv' },
        { rating_key: '113', media_type: 'episode', title: undefined, file: undefined },
      ]);
    });

    it('reads list-shaped media_info from a children_list response', async () => {
      mockFetch.mockResolvedValueOnce(
        apiResponse({
          children_count: 1,
          children_list: [
            { rating_key: '111', media_type: 'episode', media_info: [{ parts: [{ file: '/tv/S03E01.strm' }] }] },
          ],
        })
      );

      const children = await client.getChildrenMetadata('11');

      expect(children[0].file).toBe('/tv/S03E01.strm');
    });
  });

  describe('getShowCover', () => {
    it('builds a cover URL from the thumb', async () => {
      mockFetch.mockResolvedValueOnce(
        apiResponse({ thumb: '/library/metadata/100/thumb/1', art: '/library/metadata/100/art/1' })
      );

      expect(await client.getShowCover('100')).toBe(
        'http://plex:32400/library/metadata/100/thumb/1?X-Plex-Token=test-token'
      );
    });

    it('falls back to art, then poster_thumb', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse({ art: '/library/metadata/100/art/1' }));
      mockFetch.mockResolvedValueOnce(apiResponse({ poster_thumb: '/library/metadata/100/poster/1' }));

      expect(await client.getShowCover('100')).toBe(
        'http://plex:32400/library/metadata/100/art/1?X-Plex-Token=test-token'
      );
      expect(await client.getShowCover('100')).toBe(
        'http://plex:32400/library/metadata/100/poster/1?X-Plex-Token=test-token'
      );
    });

    it('returns null when the show has no image', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse({ title: 'Breaking Bad' }));

      expect(await client.getShowCover('100')).toBeNull();
    });

    it('returns null when the metadata cannot be fetched', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse(null, 'error'));

      expect(await client.getShowCover('100')).toBeNull();
    });

    it('returns null without Plex settings', async () => {
      const noPlex = new TautulliClient('http://tautulli:8181', 'test-api-key', { log });
      mockFetch.mockResolvedValueOnce(apiResponse({ thumb: '/library/metadata/100/thumb/1' }));

      expect(await noPlex.getShowCover('100')).toBeNull();
    });
  });
});

describe('buildCoverUrl', () => {
  const log: Log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  it('joins a relative path onto the Plex URL', () => {
    expect(buildCoverUrl('/library/metadata/1/thumb/2', 'http://plex:32400/', 'test-token', log)).toBe(
      'http://plex:32400/library/metadata/1/thumb/2?X-Plex-Token=test-token'
    );
  });

  it('keeps a base path on the Plex URL', () => {
    expect(buildCoverUrl('library/metadata/1/thumb/2', 'http://proxy/plex', 'test-token', log)).toBe(
      'http://proxy/plex/library/metadata/1/thumb/2?X-Plex-Token=test-token'
    );
  });

  it('appends the token with & when the path has a query', () => {
    expect(buildCoverUrl('/photo/:/transcode?width=300', 'http://plex:32400', 'test-token', log)).toBe(
      'http://plex:32400/photo/:/transcode?width=300&X-Plex-Token=test-token'
    );
  });

  it('uses an absolute image URL as is', () => {
    expect(buildCoverUrl('http://images.local/cover.jpg', 'http://plex:32400', 'test-token', log)).toBe(
      'http://images.local/cover.jpg?X-Plex-Token=test-token'
    );
  });

  it('returns null without a path, URL or token', () => {
    expect(buildCoverUrl(undefined, 'http://plex:32400', 'test-token', log)).toBeNull();
    expect(buildCoverUrl('/library/metadata/1/thumb/2', '', 'test-token', log)).toBeNull();
    expect(buildCoverUrl('/library/metadata/1/thumb/2', 'http://plex:32400', '', log)).toBeNull();
  });
});

describe('downloadBytes', () => {
  const log: Log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('returns the body as a buffer', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      arrayBuffer: async () => new TextEncoder().encode('image-bytes').buffer,
    });

    const data = await downloadBytes('http://plex:32400/cover.jpg', log);

    expect(data?.toString()).toBe('image-bytes');
  });

  it('returns null on an HTTP error', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 404, statusText: 'Not Found' });

    expect(await downloadBytes('http://plex:32400/cover.jpg', log)).toBeNull();
  });

  it('returns null when the request fails', async () => {
    mockFetch.mockRejectedValueOnce(new Error('timeout'));

    expect(await downloadBytes('http://plex:32400/cover.jpg', log)).toBeNull();
  });
});

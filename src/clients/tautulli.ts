import type {
  ChildItem,
  MediaType,
  RecentItem,
  SeasonSource,
  ShowMetadata,
} from '../types/index.js';
import { logger, type Log } from '../utils/logger.js';

export const REQUEST_TIMEOUT_MS = 30_000;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function asTimestamp(value: unknown): string | number | undefined {
  return typeof value === 'number' ? value : asString(value);
}

// Tautulli returns some nested objects as single-element lists
function firstRecord(value: unknown): JsonRecord | undefined {
  if (Array.isArray(value)) {
    return value.find(isRecord);
  }
  return isRecord(value) ? value : undefined;
}

function listFrom(data: unknown, key: string): unknown[] {
  if (Array.isArray(data)) return data;
  if (isRecord(data)) {
    const nested = data[key];
    if (Array.isArray(nested)) return nested;
  }
  return [];
}

function toRecentItem(raw: JsonRecord): RecentItem {
  return {
    rating_key: asString(raw['rating_key']),
    media_type: asString(raw['media_type']),
    title: asString(raw['title']),
    parent_title: asString(raw['parent_title']),
    grandparent_rating_key: asString(raw['grandparent_rating_key']),
    parent_index: asTimestamp(raw['parent_index']),
    added_at: asTimestamp(raw['added_at']),
  };
}

function toShowMetadata(raw: JsonRecord): ShowMetadata {
  return {
    rating_key: asString(raw['rating_key']),
    title: asString(raw['title']),
    added_at: asTimestamp(raw['added_at']),
    thumb: asString(raw['thumb']),
    art: asString(raw['art']),
    poster_thumb: asString(raw['poster_thumb']),
  };
}

function toChildItem(raw: JsonRecord): ChildItem | null {
  const ratingKey = asString(raw['rating_key']);
  if (!ratingKey) return null;

  const part = firstRecord(firstRecord(raw['media_info'])?.['parts']);
  return {
    rating_key: ratingKey,
    media_type: asString(raw['media_type']),
    title: asString(raw['title']),
    file: asString(part?.['file']),
  };
}

/**
 * Join a Plex image path onto the Plex base URL and append the auth token.
 * Returns null when any of the three is missing.
 */
export function buildCoverUrl(
  thumbPath: string | undefined,
  plexUrl: string,
  plexToken: string,
  log: Log = logger
): string | null {
  if (!thumbPath) {
    return null;
  }

  if (!plexUrl || !plexToken) {
    log.debug('[PLEX] PLEX_URL or PLEX_TOKEN not set, cannot build cover URL');
    return null;
  }

  let fullUrl: string;
  try {
    fullUrl = new URL(thumbPath.replace(/^\/+/, ''), plexUrl.replace(/\/+$/, '') + '/').href;
  } catch (error) {
    log.warn(`[PLEX] Cannot build cover URL from "${plexUrl}" and "${thumbPath}":`, error);
    return null;
  }

  const separator = fullUrl.includes('?') ? '&' : '?';
  return `${fullUrl}${separator}X-Plex-Token=${encodeURIComponent(plexToken)}`;
}

/**
 * Best-effort binary download (cover images)
 */
export async function downloadBytes(url: string, log: Log = logger): Promise<Buffer | null> {
  if (!url) return null;

  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    if (!response.ok) {
      log.warn(`[DOWNLOAD] ${url} returned ${response.status} ${response.statusText}`);
      return null;
    }
    return Buffer.from(await response.arrayBuffer());
  } catch (error) {
    log.warn(`[DOWNLOAD] Failed to download ${url}:`, error);
    return null;
  }
}

export interface TautulliClientOptions {
  plexUrl?: string;
  plexToken?: string;
  log?: Log;
}

export class TautulliClient implements SeasonSource {
  private baseUrl: string;
  private apiKey: string;
  private plexUrl: string;
  private plexToken: string;
  private log: Log;

  constructor(baseUrl: string, apiKey: string, options: TautulliClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.apiKey = apiKey;
    this.plexUrl = options.plexUrl ?? '';
    this.plexToken = options.plexToken ?? '';
    this.log = options.log ?? logger;
  }

  /**
   * Call an api/v2 command. Any failure is logged and comes back as null.
   */
  private async request(cmd: string, params: Record<string, string | number> = {}): Promise<unknown> {
    if (!this.baseUrl || !this.apiKey) {
      this.log.error('[TAUTULLI] TAUTULLI_URL or TAUTULLI_APIKEY not set');
      return null;
    }

    const query = new URLSearchParams({ apikey: this.apiKey, cmd });
    for (const [key, value] of Object.entries(params)) {
      query.set(key, String(value));
    }
    const url = `${this.baseUrl}/api/v2?${query.toString()}`;

    try {
      this.log.debug(`[TAUTULLI] Making request: ${cmd}`);
      const response = await fetch(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });

      if (!response.ok) {
        this.log.error(`[TAUTULLI] HTTP Error: ${response.status} ${response.statusText}`);
        return null;
      }

      const body: unknown = await response.json();
      const envelope = isRecord(body) ? firstRecord(body['response']) : undefined;
      if (!envelope || envelope['result'] !== 'success') {
        this.log.error(`[TAUTULLI] API error for ${cmd}:`, JSON.stringify(body));
        return null;
      }

      return envelope['data'] ?? null;
    } catch (error) {
      this.log.error(`[TAUTULLI] Request ${cmd} failed:`, error);
      return null;
    }
  }

  /**
   * Recently added items, newest first
   */
  async getRecentlyAdded(mediaType: MediaType = 'show', count: number = 100): Promise<RecentItem[]> {
    const data = await this.request('get_recently_added', { media_type: mediaType, count });
    return listFrom(data, 'recently_added').filter(isRecord).map(toRecentItem);
  }

  async getMetadata(ratingKey: string): Promise<ShowMetadata | null> {
    const data = await this.request('get_metadata', { rating_key: ratingKey });
    return isRecord(data) ? toShowMetadata(data) : null;
  }

  /**
   * Children (seasons or episodes) of an item. Entries without a rating key are dropped.
   */
  async getChildrenMetadata(ratingKey: string): Promise<ChildItem[]> {
    const data = await this.request('get_children_metadata', { rating_key: ratingKey });
    const children: ChildItem[] = [];
    for (const raw of listFrom(data, 'children_list')) {
      const child = isRecord(raw) ? toChildItem(raw) : null;
      if (child) {
        children.push(child);
      }
    }
    return children;
  }

  /**
   * Cover URL for a show, from its thumb, art or poster_thumb (first one set)
   */
  async getShowCover(showRatingKey: string): Promise<string | null> {
    const metadata = await this.getMetadata(showRatingKey);
    if (!metadata) {
      return null;
    }

    const thumb = metadata.thumb || metadata.art || metadata.poster_thumb;
    return buildCoverUrl(thumb, this.plexUrl, this.plexToken, this.log);
  }

  async downloadBytes(url: string): Promise<Buffer | null> {
    return downloadBytes(url, this.log);
  }
}

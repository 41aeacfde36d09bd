// Tautulli types
export type MediaType = 'show' | 'season' | 'episode' | 'movie';

export interface RecentItem {
  rating_key?: string;
  media_type?: string;
  title?: string;
  parent_title?: string;
  grandparent_rating_key?: string;
  parent_index?: string | number;
  added_at?: string | number;
}

export interface ShowMetadata {
  rating_key?: string;
  title?: string;
  added_at?: string | number;
  thumb?: string;
  art?: string;
  poster_thumb?: string;
}

export interface ChildItem {
  rating_key: string;
  media_type?: string;
  title?: string;
  /** Path of the backing file, taken from `media_info.parts.file` */
  file?: string;
}

/**
 * Metadata lookups needed to classify seasons. Implementations never throw:
 * failures come back as empty lists or null.
 */
export interface SeasonSource {
  getRecentlyAdded(mediaType: MediaType, count: number): Promise<RecentItem[]>;
  getMetadata(ratingKey: string): Promise<ShowMetadata | null>;
  getChildrenMetadata(ratingKey: string): Promise<ChildItem[]>;
  getShowCover(showRatingKey: string): Promise<string | null>;
}

export type DownloadFn = (url: string) => Promise<Buffer | null>;

// Internal types
// A type alias rather than an interface so it stays assignable to JsonObject
export type NewFinishedSeason = {
  show: string;
  season: number;
  season_title: string;
  added_at: string;
  episode_count: number;
  rating_key: string;
  cover_url: string | null;
};

export type WebhookMode = 'default' | 'custom' | 'signal-cli';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface ProviderConfig {
  lookbackDays: number;
  onEmpty: boolean;
  messageTemplate: string;
  payloadTemplate: string;
  signalNumber: string;
  signalRecipients: string;
  signalTextMode: string;
  signalIncludeCovers: boolean;
}

export interface Config {
  tautulli: {
    url: string;
    apiKey: string;
  };
  plex: {
    url: string;
    token: string;
  };
  webhook: {
    url: string;
    mode: string;
    messageTemplate: string;
    payloadTemplate: string;
    onEmpty: boolean;
  };
  signal: {
    number: string;
    recipients: string;
    textMode: string;
    includeCovers: boolean;
  };
  schedule: {
    cron: string;
  };
  lookbackDays: number;
  runMode: 'once' | 'daemon';
  runOnStartup: boolean;
  debug: boolean;
  logLevel: string;
}

import type { ChildItem, NewFinishedSeason, SeasonSource } from '../types/index.js';
import {
  fromUnixTimestamp,
  getCutoffDate,
  parseUnixTimestamp,
  toLocalIsoString,
} from '../utils/dateUtils.js';
import { logger, type Log } from '../utils/logger.js';

export const RECENTLY_ADDED_COUNT = 100;

// Placeholder files for media that is not actually on disk
const STUB_EXTENSION = '.strm';

/**
 * A show whose own added_at falls inside the window is a new show, so its
 * seasons are not "new seasons". Unknown metadata counts as not new.
 */
export async function isNewShow(
  showRatingKey: string,
  cutoff: Date,
  source: Pick<SeasonSource, 'getMetadata'>,
  log: Log = logger
): Promise<boolean> {
  const metadata = await source.getMetadata(showRatingKey);
  if (!metadata) {
    log.warn(`[SEASONS] Could not get metadata for show ${showRatingKey}`);
    return false;
  }

  if (metadata.added_at === undefined || metadata.added_at === '' || metadata.added_at === 0) {
    return false;
  }

  const addedAt = parseUnixTimestamp(metadata.added_at);
  if (addedAt === null) {
    log.warn(`[SEASONS] Invalid added_at for show ${showRatingKey}: ${metadata.added_at}`);
    return false;
  }

  const showDate = fromUnixTimestamp(addedAt);
  if (showDate.getTime() >= cutoff.getTime()) {
    log.debug(`[SEASONS] Show ${showRatingKey} added at ${toLocalIsoString(showDate)} - this is a NEW SHOW`);
    return true;
  }

  return false;
}

function hasMaterializedFile(child: ChildItem): boolean {
  return Boolean(child.file) && !child.file?.endsWith(STUB_EXTENSION);
}

/**
 * A season is finished once at least one episode has a real file behind it
 */
export function isSeasonFinished(episodes: ChildItem[], log: Log = logger): boolean {
  if (episodes.length === 0) {
    return false;
  }

  const available = episodes.filter(
    (ep) => ep.media_type === 'episode' && hasMaterializedFile(ep)
  ).length;

  log.debug(`[SEASONS] Season has ${available}/${episodes.length} episodes available`);
  return available > 0;
}

export function countEpisodes(children: ChildItem[]): number {
  return children.filter((child) => child.media_type === 'episode').length;
}

function parseSeasonIndex(value: string | number | undefined): number {
  const index = typeof value === 'number' ? Math.trunc(value) : parseInt(value ?? '', 10);
  return Number.isFinite(index) ? index : 0;
}

/**
 * Seasons added within the last `lookbackDays` that belong to an existing show
 * and have at least one materialized episode. Candidates are checked one at a
 * time, in the order Tautulli returns them.
 */
export async function findNewFinishedSeasons(
  lookbackDays: number,
  source: SeasonSource,
  log: Log = logger
): Promise<NewFinishedSeason[]> {
  const cutoff = getCutoffDate(lookbackDays);
  log.info(`[SEASONS] Looking for seasons added since ${toLocalIsoString(cutoff)}`);

  const recentlyAdded = await source.getRecentlyAdded('season', RECENTLY_ADDED_COUNT);
  if (recentlyAdded.length === 0) {
    log.info('[SEASONS] No recently added items found');
    return [];
  }

  const seasons: NewFinishedSeason[] = [];

  for (const item of recentlyAdded) {
    if (item.media_type !== 'season') {
      continue;
    }

    const title = item.title ?? 'Unknown';
    const showTitle = item.parent_title ?? 'Unknown';
    const seasonIndex = parseSeasonIndex(item.parent_index);

    if (item.added_at === undefined || item.added_at === '' || item.added_at === 0) {
      log.debug(`[SKIP] ${title} - no added_at timestamp`);
      continue;
    }

    const addedAtSeconds = parseUnixTimestamp(item.added_at);
    if (addedAtSeconds === null) {
      log.warn(`[SKIP] ${title} - invalid added_at: ${item.added_at}`);
      continue;
    }

    const addedAt = fromUnixTimestamp(addedAtSeconds);
    if (addedAt.getTime() < cutoff.getTime()) {
      log.debug(`[SKIP] ${title} - added at ${toLocalIsoString(addedAt)} (before cutoff)`);
      continue;
    }

    log.info(`[SEASONS] Processing: ${showTitle} - Season ${seasonIndex} (added ${toLocalIsoString(addedAt)})`);

    const showKey = item.grandparent_rating_key;
    if (!showKey) {
      log.debug(`[SKIP] ${title} - no grandparent_rating_key`);
      continue;
    }

    if (await isNewShow(showKey, cutoff, source, log)) {
      log.info(`[SKIP] ${showTitle} - this is a NEW SHOW, not a new season`);
      continue;
    }

    const ratingKey = item.rating_key;
    if (!ratingKey) {
      log.debug(`[SKIP] ${title} - no rating_key`);
      continue;
    }

    const children = await source.getChildrenMetadata(ratingKey);
    if (!isSeasonFinished(children, log)) {
      log.info(`[SKIP] ${showTitle} Season ${seasonIndex} - season not finished`);
      continue;
    }

    const coverUrl = await source.getShowCover(showKey);

    log.debug(`[KEEP] ${showTitle} Season ${seasonIndex}`);
    seasons.push({
      show: showTitle,
      season: seasonIndex,
      season_title: title,
      added_at: toLocalIsoString(addedAt),
      episode_count: countEpisodes(children),
      rating_key: ratingKey,
      cover_url: coverUrl,
    });
  }

  return seasons;
}

import type { SeenSetStore } from '@dealwatch/store';
import type { DealAlertsOutcome, DealAlertsStats, DealAlertsStatus, OfferRecord } from '@dealwatch/shared';

import { systemClock, type Clock } from '../clock.js';
import type { DealAlertsConfig } from '../config.js';
import { filterMatches, prefilterMatches } from '../ingestion/keywords.js';
import { createLogger, type Logger } from '../log.js';
import type { Notifier } from '../notify/channels.js';
import { renderDealAlert } from '../notify/render.js';
import type { FetchLike } from '../woot/client.js';
import { fetchDetails } from '../woot/details.js';
import { fetchFeed } from '../woot/feed.js';

export type DealAlertsDeps = {
  config: DealAlertsConfig;
  store: SeenSetStore;
  notifier: Notifier;
  fetchImpl?: FetchLike;
  clock?: Clock;
  logger?: Logger;
};

function emptyStats(): DealAlertsStats {
  return { seenBefore: 0, feedItems: 0, candidates: 0, enriched: 0, abandoned: 0, matches: 0, committed: 0 };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function outcome(status: DealAlertsStatus, summary: string, stats: DealAlertsStats): DealAlertsOutcome {
  const ok = status === 'no_feed' || status === 'no_matches' || status === 'notified';
  return { ok, status, summary, stats };
}

function deferredNote(stats: DealAlertsStats): string {
  return stats.abandoned ? ` (${stats.abandoned} offer(s) deferred to the next run)` : '';
}

/**
 * One pass of the deal-discovery pipeline:
 * load seen ids → fetch feed → prefilter → enrich → match → notify → commit.
 *
 * The seen set is written at most once, and only after a successful
 * notification (or when nothing matched). A failed notification leaves the
 * persisted set untouched so the same matches come back next run.
 * Never throws; every failure resolves to an outcome.
 */
export async function runDealAlerts(deps: DealAlertsDeps): Promise<DealAlertsOutcome> {
  const log = deps.logger ?? createLogger('deal-alerts');
  const stats = emptyStats();
  try {
    return await runStages(deps, log, stats);
  } catch (e) {
    log.error('run_failed', { error: errorMessage(e) });
    return outcome('error', `Deal alert run failed: ${errorMessage(e)}`, stats);
  }
}

async function runStages(deps: DealAlertsDeps, log: Logger, stats: DealAlertsStats): Promise<DealAlertsOutcome> {
  const { config, store, notifier } = deps;
  const fetchImpl = deps.fetchImpl ?? fetch;
  const clock = deps.clock ?? systemClock;

  // load_seen
  let loaded: string[] = [];
  let loadError: string | null = null;
  try {
    loaded = await store.load();
  } catch (e) {
    loadError = errorMessage(e);
    log.error('seen_load_failed', { store: store.describe(), error: loadError });
  }
  const seen = new Set(loaded);
  stats.seenBefore = seen.size;

  async function commit(ids: Iterable<string>): Promise<{ ok: true } | { ok: false; reason: string }> {
    if (loadError) return { ok: false, reason: `seen set not saved, load failed: ${loadError}` };
    const next = [...loaded];
    const known = new Set(loaded);
    for (const id of ids) {
      if (!id || known.has(id)) continue;
      known.add(id);
      next.push(id);
    }
    stats.committed = next.length - loaded.length;
    if (stats.committed === 0) {
      log.debug('seen_unchanged', { size: next.length });
      return { ok: true };
    }
    try {
      await store.save(next);
    } catch (e) {
      stats.committed = 0;
      log.error('seen_save_failed', { store: store.describe(), error: errorMessage(e) });
      return { ok: false, reason: `seen set not saved: ${errorMessage(e)}` };
    }
    log.info('seen_saved', { added: stats.committed, size: next.length });
    return { ok: true };
  }

  // fetch_feed
  const feed = await fetchFeed(config.woot, { fetchImpl, logger: log.child('feed') });
  stats.feedItems = feed.length;
  if (!feed.length) {
    log.info('no_feed_items');
    return outcome('no_feed', 'No feed items found', stats);
  }

  // prefilter
  const unseen = feed.filter((o) => !seen.has(o.id));
  const candidates: OfferRecord[] = [];
  const rejectedIds: string[] = [];
  for (const offer of unseen) {
    if (prefilterMatches(offer, config.keywords)) candidates.push(offer);
    else rejectedIds.push(offer.id);
  }
  stats.candidates = candidates.length;
  log.info('prefiltered', { feed: feed.length, unseen: unseen.length, candidates: candidates.length });

  if (!candidates.length) {
    const saved = await commit(rejectedIds);
    if (!saved.ok) return outcome('commit_failed', `No new matching deals found; ${saved.reason}`, stats);
    return outcome('no_matches', 'No new matching deals found', stats);
  }

  // enrich + match
  const details = await fetchDetails(
    candidates.map((c) => c.id),
    config,
    { fetchImpl, clock, logger: log.child('details') },
  );
  stats.enriched = details.records.length;
  stats.abandoned = details.abandonedIds.length;

  const matches = filterMatches(details.records, seen, config.keywords);
  stats.matches = matches.length;
  const inspectedIds = [...details.records.map((r) => r.id), ...rejectedIds];

  if (!matches.length) {
    const saved = await commit(inspectedIds);
    if (!saved.ok) return outcome('commit_failed', `No new matching deals found; ${saved.reason}`, stats);
    return outcome('no_matches', `No new matching deals found${deferredNote(stats)}`, stats);
  }

  // notify, then commit
  log.info('matches_found', { matches: matches.map((m) => ({ id: m.id, title: m.title })) });
  try {
    await notifier.send(renderDealAlert(matches));
  } catch (e) {
    log.error('notify_failed', { channel: notifier.name, error: errorMessage(e) });
    return outcome(
      'notify_failed',
      `Notification failed for ${matches.length} new deal(s); seen set left unchanged`,
      stats,
    );
  }
  log.info('notified', { channel: notifier.name, deals: matches.length });

  const saved = await commit([...matches.map((m) => m.id), ...inspectedIds]);
  if (!saved.ok) {
    return outcome('commit_failed', `Notified about ${matches.length} new deal(s) but ${saved.reason}`, stats);
  }
  return outcome('notified', `Found and notified about ${matches.length} new deal(s)${deferredNote(stats)}`, stats);
}

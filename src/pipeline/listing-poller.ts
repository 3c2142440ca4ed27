import { getLogger } from '../lib/logger.js';
import { MonitorContext } from '../monitor/context.js';
import { notifyListing, type PipelineDeps } from './notification-pipeline.js';
import type { CompleteListing, ListingRecord, SubscriberConfig, WorkItem } from '../monitor/types.js';

export interface PollResult {
  item: WorkItem;
  status: 'completed' | 'failed';
  fetched: number;
  malformed: number;
  seeded: number;
  alreadySeen: number;
  notified: number;
  error?: string;
}

function isComplete(record: ListingRecord): record is CompleteListing {
  return record.link !== null && record.price !== null && record.title !== null;
}

/**
 * Poll one work item. The first successful poll only seeds the seen set;
 * later polls hand each unseen listing to the notification pipeline.
 * Errors stay inside this item.
 */
export async function pollWorkItem(
  item: WorkItem,
  subscribers: SubscriberConfig[],
  ctx: MonitorContext,
  deps: PipelineDeps,
): Promise<PollResult> {
  const logger = getLogger();
  const result: PollResult = {
    item,
    status: 'completed',
    fetched: 0,
    malformed: 0,
    seeded: 0,
    alreadySeen: 0,
    notified: 0,
  };

  try {
    const records = await deps.source.searchListings(item.keyword, item.location);
    result.fetched = records.length;

    const firstRun = ctx.isFirstRun(item);

    for (const record of records) {
      if (!isComplete(record)) {
        result.malformed++;
        continue;
      }

      if (firstRun) {
        ctx.seenListings.add(record.link);
        result.seeded++;
        logger.debug({ ...item, title: record.title, price: record.price }, 'First run, stored listing');
        continue;
      }

      if (!ctx.markSeen(record.link)) {
        result.alreadySeen++;
        continue;
      }

      await notifyListing(record, subscribers, deps);
      result.notified++;
    }

    ctx.completeFirstRun(item);
  } catch (err) {
    result.status = 'failed';
    result.error = err instanceof Error ? err.message : String(err);
    logger.error({ err, ...item }, 'Error checking pair');
  }

  return result;
}

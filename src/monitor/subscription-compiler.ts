import { DateTime } from 'luxon';
import { isMonitoringActive, type MonitoringCheck } from '../schedule/schedule-engine.js';
import { getLogger } from '../lib/logger.js';
import { MonitorContext, workItemKey, locationKey } from './context.js';
import type { SubscriberConfig, UserRecord, WorkItem } from './types.js';

export interface CompiledSubscriptions {
  /** Every distinct (keyword, location) pair, in first-seen order. */
  allItems: WorkItem[];
  /** Items whose location is currently inside its monitoring hours. */
  activeItems: WorkItem[];
  /** workItemKey → subscribers in user order. */
  subscribers: Map<string, SubscriberConfig[]>;
  /** Lowercased location → schedule check used for this compile. */
  checks: Map<string, MonitoringCheck>;
}

export type EligibilityResult =
  | { eligible: true }
  | { eligible: false; reason: 'inactive' | 'expired' | 'invalid_expiry' };

/**
 * A user is skipped when deactivated, expired (calendar date strictly before
 * today), or when the expiry date does not parse as yyyy-MM-dd.
 */
export function checkEligibility(user: UserRecord, now: Date = new Date()): EligibilityResult {
  if (!user.activationStatus) return { eligible: false, reason: 'inactive' };

  const expiry = DateTime.fromFormat(user.expiryDate, 'yyyy-MM-dd');
  if (!expiry.isValid) return { eligible: false, reason: 'invalid_expiry' };

  const today = DateTime.fromJSDate(now).startOf('day');
  if (expiry < today) return { eligible: false, reason: 'expired' };

  return { eligible: true };
}

export function compileSubscriptions(
  users: UserRecord[],
  ctx: MonitorContext,
  now: Date = new Date(),
): CompiledSubscriptions {
  const logger = getLogger();

  const items = new Map<string, WorkItem>();
  const subscribers = new Map<string, SubscriberConfig[]>();

  ctx.resetLocationUsers();

  for (const user of users) {
    const eligibility = checkEligibility(user, now);
    if (!eligibility.eligible) {
      const meta = { chatId: user.chatId, reason: eligibility.reason, expiryDate: user.expiryDate };
      if (eligibility.reason === 'invalid_expiry') {
        logger.warn(meta, 'Skipping user: expiry date is not yyyy-MM-dd');
      } else {
        logger.info(meta, 'Skipping user due to inactive status or expired subscription');
      }
      continue;
    }

    ctx.addLocationUser(user.location, user.chatId);

    // Repeated keyword rows collapse to one subscription
    for (const keyword of new Set(user.keywords)) {
      const item: WorkItem = { keyword, location: user.location };
      const key = workItemKey(item);

      if (!items.has(key)) {
        items.set(key, item);
        subscribers.set(key, []);
      }

      subscribers.get(key)?.push({
        chatId: user.chatId,
        excludedWords: user.excludedWords,
        fixedLat: user.fixedLat,
        fixedLon: user.fixedLon,
        modes: user.modes,
      });
    }
  }

  const allItems = [...items.values()];
  const checks = new Map<string, MonitoringCheck>();

  for (const item of allItems) {
    const key = locationKey(item.location);
    if (!checks.has(key)) {
      checks.set(key, isMonitoringActive(item.location, now));
    }
  }

  const activeItems = allItems.filter((item) => checks.get(locationKey(item.location))?.isActive === true);

  logger.debug(
    { pairs: allItems.length, active: activeItems.length, locations: checks.size },
    'Subscriptions compiled',
  );

  return { allItems, activeItems, subscribers, checks };
}

/** `keyword - location [ACTIVE|PAUSED] - reason`, one line per item. */
export function formatPairsLog(compiled: CompiledSubscriptions): string {
  return compiled.allItems
    .map((item) => {
      const check = compiled.checks.get(locationKey(item.location));
      const status = check?.isActive ? 'ACTIVE' : 'PAUSED';
      return `${item.keyword} - ${item.location} [${status}] - ${check?.reason ?? ''}\n`;
    })
    .join('');
}

import { isMonitoringActive, formatLocalTime } from '../schedule/schedule-engine.js';
import { getComponentLogger, getLogger } from '../lib/logger.js';
import { MonitorContext, locationKey } from './context.js';
import { writeStatusSnapshot } from './status-store.js';
import type { LocationStatus, Messenger, WorkItem } from './types.js';

export interface StatusTransition {
  location: string;
  status: LocationStatus;
}

export interface StatusTrackerDeps {
  messenger: Messenger;
  snapshotPath: string;
}

function titleCase(value: string): string {
  return value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export function formatStatusMessage(
  location: string,
  status: { isActive: boolean; reason: string; nextChange: Date | null },
): string {
  const name = titleCase(location);
  const at = status.nextChange ? formatLocalTime(status.nextChange, location) : 'Unknown';

  return status.isActive
    ? `📢 Monitoring has been resumed for ${name}.\nReason: ${status.reason}\nWill stop at: ${at}`
    : `🛑 Monitoring has been paused for ${name}.\nReason: ${status.reason}\nWill resume at: ${at}`;
}

function toLocationStatus(location: string, now: Date): LocationStatus {
  const check = isMonitoringActive(location, now);
  return {
    isActive: check.isActive,
    reason: check.reason,
    nextChange: check.nextChange,
    nextStatus: check.isActive ? 'inactive' : 'active',
  };
}

/**
 * Send to every subscriber of the location. A rejected send is logged and
 * does not stop the others.
 */
async function broadcast(ctx: MonitorContext, messenger: Messenger, location: string, text: string): Promise<void> {
  const chatIds = ctx.usersForLocation(location);
  if (chatIds.length === 0) return;

  const results = await Promise.allSettled(chatIds.map((chatId) => messenger.sendMessage(text, chatId)));
  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      getLogger().error({ err: result.reason, chatId: chatIds[i], location }, 'Status broadcast failed');
    }
  });
}

/**
 * Recompute every distinct location's status and broadcast real flips.
 * A location seen for the first time is recorded without notifying.
 */
export async function trackLocationStatus(
  items: WorkItem[],
  ctx: MonitorContext,
  deps: StatusTrackerDeps,
  now: Date = new Date(),
): Promise<StatusTransition[]> {
  const scheduleLog = getComponentLogger('schedule');
  const transitions: StatusTransition[] = [];
  const visited = new Set<string>();

  for (const item of items) {
    const key = locationKey(item.location);
    if (visited.has(key)) continue;
    visited.add(key);

    const current = toLocationStatus(item.location, now);
    const previous = ctx.locationStatus.get(key);

    // Check and update without a suspension point in between
    ctx.locationStatus.set(key, current);

    if (!previous) {
      scheduleLog.info({ location: key, isActive: current.isActive }, 'Location status recorded');
      continue;
    }
    if (previous.isActive === current.isActive) continue;

    transitions.push({ location: key, status: current });
  }

  for (const { location, status } of transitions) {
    await broadcast(ctx, deps.messenger, location, formatStatusMessage(location, status));
    scheduleLog.info(
      { location, isActive: status.isActive, reason: status.reason },
      `Status change for ${location}: ${status.isActive ? 'Active' : 'Inactive'}`,
    );
  }

  if (transitions.length > 0) {
    try {
      await writeStatusSnapshot(ctx.locationStatus, deps.snapshotPath, now);
      getLogger().info({ count: transitions.length }, 'Updated monitoring status for changed locations');
    } catch (err) {
      getLogger().error({ err, path: deps.snapshotPath }, 'Failed to write monitoring status');
    }
  }

  return transitions;
}

/**
 * Start-up broadcast of every tracked location's current status.
 */
export async function announceInitialStatus(ctx: MonitorContext, messenger: Messenger): Promise<void> {
  for (const [location, status] of ctx.locationStatus) {
    const reason = `Initial monitoring status: ${status.isActive ? 'Active' : 'Inactive'}`;
    await broadcast(ctx, messenger, location, formatStatusMessage(location, { ...status, reason }));
  }
}

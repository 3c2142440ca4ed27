import { writeFile } from 'node:fs/promises';
import { getLogger } from '../lib/logger.js';
import type { LocationStatus, NextStatus } from './types.js';

export interface LocationSnapshot {
  is_active: boolean;
  last_updated: string;
  next_change: string;
  next_status: NextStatus;
}

export interface StatusSnapshot {
  locations: Record<string, LocationSnapshot>;
  updated_at: string;
}

export function buildStatusSnapshot(statuses: Map<string, LocationStatus>, now: Date = new Date()): StatusSnapshot {
  const stamp = now.toISOString();
  const locations: Record<string, LocationSnapshot> = {};

  for (const [location, status] of statuses) {
    locations[location] = {
      is_active: status.isActive,
      last_updated: stamp,
      next_change: status.nextChange.toISOString(),
      next_status: status.nextStatus,
    };
  }

  return { locations, updated_at: stamp };
}

/**
 * Rewrite the snapshot file wholesale.
 */
export async function writeStatusSnapshot(
  statuses: Map<string, LocationStatus>,
  path: string,
  now: Date = new Date(),
): Promise<void> {
  const snapshot = buildStatusSnapshot(statuses, now);
  await writeFile(path, JSON.stringify(snapshot, null, 4), 'utf-8');
  getLogger().debug({ path, locations: statuses.size }, 'Monitoring status saved');
}

export async function writePairsLog(contents: string, path: string): Promise<void> {
  await writeFile(path, contents, 'utf-8');
}

import type { LocationStatus, WorkItem } from './types.js';

export function workItemKey(item: WorkItem): string {
  return `${item.keyword}\u0000${item.location}`;
}

export function locationKey(location: string): string {
  return location.toLowerCase();
}

/**
 * Process-wide monitor state, passed explicitly into every cycle.
 *
 * Mutated from concurrently running work-item tasks without locks. That is
 * sound only because every read-then-write below completes synchronously;
 * callers must not await between checking and updating.
 */
export class MonitorContext {
  /** Every listing link observed under any work item. Never pruned. */
  readonly seenListings = new Set<string>();

  /** Last-known status per lowercased location. */
  readonly locationStatus = new Map<string, LocationStatus>();

  /** Lowercased location → subscriber chat ids, rebuilt every cycle. */
  readonly locationUsers = new Map<string, Set<number>>();

  private readonly polledItems = new Set<string>();

  isFirstRun(item: WorkItem): boolean {
    return !this.polledItems.has(workItemKey(item));
  }

  completeFirstRun(item: WorkItem): void {
    this.polledItems.add(workItemKey(item));
  }

  /**
   * Record a link as seen. Returns false when it was already known.
   */
  markSeen(link: string): boolean {
    if (this.seenListings.has(link)) return false;
    this.seenListings.add(link);
    return true;
  }

  resetLocationUsers(): void {
    this.locationUsers.clear();
  }

  addLocationUser(location: string, chatId: number): void {
    const key = locationKey(location);
    const chats = this.locationUsers.get(key);
    if (chats) chats.add(chatId);
    else this.locationUsers.set(key, new Set([chatId]));
  }

  usersForLocation(location: string): number[] {
    return [...(this.locationUsers.get(locationKey(location)) ?? [])];
  }
}

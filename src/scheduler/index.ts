import { getEnv } from '../config/env.js';
import { getLogger } from '../lib/logger.js';
import { randomBetween } from '../lib/retry.js';
import { MonitorContext, workItemKey } from '../monitor/context.js';
import { compileSubscriptions, formatPairsLog } from '../monitor/subscription-compiler.js';
import { announceInitialStatus, trackLocationStatus, type StatusTransition } from '../monitor/status-tracker.js';
import { writePairsLog, writeStatusSnapshot } from '../monitor/status-store.js';
import { pollWorkItem, type PollResult } from '../pipeline/listing-poller.js';
import type { PipelineDeps } from '../pipeline/notification-pipeline.js';
import type { UserSource } from '../monitor/types.js';

export interface SchedulerDeps extends PipelineDeps {
  users: UserSource;
  context?: MonitorContext;
  /** Override the artifact paths from the environment. */
  pairsLogPath?: string;
  statusSnapshotPath?: string;
}

export interface CycleResult {
  pairs: number;
  activePairs: number;
  transitions: StatusTransition[];
  polls: PollResult[];
  durationMs: number;
}

export interface SchedulerState {
  isRunning: boolean;
  cycleRunning: boolean;
  cyclesCompleted: number;
  lastCycleEnd: Date | null;
  lastCycle: Omit<CycleResult, 'polls' | 'transitions'> | null;
}

/**
 * Sleep that `wake()` can cut short, so stop() does not wait out the
 * inter-cycle delay.
 */
function createWakeableSleep() {
  let pending: { timer: NodeJS.Timeout; resolve: () => void } | null = null;

  return {
    sleep(ms: number): Promise<void> {
      return new Promise((resolve) => {
        const timer = setTimeout(() => {
          pending = null;
          resolve();
        }, ms);
        pending = { timer, resolve };
      });
    },
    wake(): void {
      if (!pending) return;
      clearTimeout(pending.timer);
      pending.resolve();
      pending = null;
    },
  };
}

export function createScheduler(deps: SchedulerDeps) {
  const logger = getLogger();
  const env = getEnv();
  const ctx = deps.context ?? new MonitorContext();
  const sleeper = createWakeableSleep();
  const pairsLogPath = deps.pairsLogPath ?? env.PAIRS_LOG_PATH;
  const snapshotPath = deps.statusSnapshotPath ?? env.STATUS_SNAPSHOT_PATH;

  const state: SchedulerState = {
    isRunning: false,
    cycleRunning: false,
    cyclesCompleted: 0,
    lastCycleEnd: null,
    lastCycle: null,
  };

  let loopPromise: Promise<void> | null = null;

  // Pairs log and snapshot failures are logged, never thrown
  async function writeArtifact(path: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (err) {
      logger.error({ err, path }, 'Failed to write monitor artifact');
    }
  }

  /**
   * One polling cycle: compile → log pairs → track status → snapshot →
   * poll every active item concurrently and wait for all of them.
   */
  async function runCycle(now: Date = new Date()): Promise<CycleResult> {
    const startedAt = Date.now();

    const users = await deps.users.fetchUsers();
    const compiled = compileSubscriptions(users, ctx, now);

    await writeArtifact(pairsLogPath, () => writePairsLog(formatPairsLog(compiled), pairsLogPath));

    const transitions = await trackLocationStatus(
      compiled.allItems,
      ctx,
      { messenger: deps.messenger, snapshotPath },
      now,
    );
    await writeArtifact(snapshotPath, () => writeStatusSnapshot(ctx.locationStatus, snapshotPath, now));

    const polls = await Promise.all(
      compiled.activeItems.map((item) =>
        pollWorkItem(item, compiled.subscribers.get(workItemKey(item)) ?? [], ctx, deps),
      ),
    );

    return {
      pairs: compiled.allItems.length,
      activePairs: compiled.activeItems.length,
      transitions,
      polls,
      durationMs: Date.now() - startedAt,
    };
  }

  async function runLoop(): Promise<void> {
    while (state.isRunning) {
      let activePairs = 0;
      state.cycleRunning = true;

      try {
        const result = await runCycle();
        activePairs = result.activePairs;
        state.cyclesCompleted++;
        state.lastCycleEnd = new Date();
        state.lastCycle = {
          pairs: result.pairs,
          activePairs: result.activePairs,
          durationMs: result.durationMs,
        };

        logger.info(
          {
            pairs: result.pairs,
            activePairs: result.activePairs,
            transitions: result.transitions.length,
            failed: result.polls.filter((p) => p.status === 'failed').length,
            notified: result.polls.reduce((sum, p) => sum + p.notified, 0),
            durationMs: result.durationMs,
          },
          'Cycle completed',
        );
      } catch (err) {
        logger.error({ err }, 'Cycle failed');
      } finally {
        state.cycleRunning = false;
      }

      if (!state.isRunning) break;

      const delaySec =
        activePairs > 0
          ? randomBetween(env.CYCLE_DELAY_MIN_SEC, env.CYCLE_DELAY_MAX_SEC)
          : randomBetween(env.IDLE_DELAY_MIN_SEC, env.IDLE_DELAY_MAX_SEC);

      logger.info(
        { activePairs, delaySec: Number(delaySec.toFixed(2)) },
        activePairs > 0 ? 'Round done, waiting' : 'All pairs are inactive, waiting',
      );
      await sleeper.sleep(delaySec * 1000);
    }
  }

  /**
   * Record every location's status and broadcast it once, before the loop.
   */
  async function announceStartupStatus(): Promise<void> {
    const compiled = compileSubscriptions(await deps.users.fetchUsers(), ctx);
    await trackLocationStatus(compiled.allItems, ctx, { messenger: deps.messenger, snapshotPath });
    await writeArtifact(snapshotPath, () => writeStatusSnapshot(ctx.locationStatus, snapshotPath));
    await announceInitialStatus(ctx, deps.messenger);
  }

  return {
    async start(): Promise<void> {
      if (state.isRunning) return;
      state.isRunning = true;

      if (env.NOTIFY_INITIAL_STATUS) {
        try {
          await announceStartupStatus();
        } catch (err) {
          logger.warn({ err }, 'Initial status announcement failed');
        }
      }

      logger.info('Starting monitor loop');
      loopPromise = runLoop();
    },

    async stop(): Promise<void> {
      state.isRunning = false;
      logger.info('Scheduler stopping, waiting for the active cycle to complete');
      sleeper.wake();
      if (loopPromise) {
        await loopPromise;
        loopPromise = null;
      }
      logger.info('Scheduler stopped');
    },

    runCycle,

    getState(): SchedulerState {
      return { ...state };
    },

    context: ctx,
  };
}

export type Scheduler = ReturnType<typeof createScheduler>;

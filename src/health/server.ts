import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import { getEnv } from '../config/env.js';
import { getLogger } from '../lib/logger.js';
import { buildStatusSnapshot } from '../monitor/status-store.js';
import type { LocationStatus } from '../monitor/types.js';
import type { SchedulerState } from '../scheduler/index.js';

let _server: FastifyInstance | null = null;

const MIN_STALE_THRESHOLD_MS = 15 * 60 * 1000;

export interface HealthSource {
  getState(): SchedulerState;
  context: { locationStatus: Map<string, LocationStatus> };
}

/**
 * A cycle older than three idle delays (or 15 minutes) means the loop is stuck.
 */
export function staleThresholdMs(): number {
  return Math.max(3 * getEnv().IDLE_DELAY_MAX_SEC * 1000, MIN_STALE_THRESHOLD_MS);
}

export function buildHealthServer(source: HealthSource): FastifyInstance {
  const server = Fastify({ logger: false });

  server.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const state = source.getState();
      const now = Date.now();

      const isStale = state.lastCycleEnd ? now - state.lastCycleEnd.getTime() > staleThresholdMs() : false;
      const status = !state.isRunning ? 'stopped' : isStale ? 'degraded' : state.lastCycleEnd ? 'healthy' : 'starting';
      const healthy = status === 'healthy' || status === 'starting';

      return reply.code(healthy ? 200 : 503).send({
        status,
        timestamp: new Date(now).toISOString(),
        cyclesCompleted: state.cyclesCompleted,
        lastCycleEnd: state.lastCycleEnd?.toISOString() ?? null,
        lastCycle: state.lastCycle,
      });
    } catch (err) {
      getLogger().error({ err }, 'Health check error');
      return reply.code(503).send({
        status: 'error',
        error: err instanceof Error ? err.message : 'Unknown error',
      });
    }
  });

  // Simple liveness probe
  server.get('/live', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ status: 'alive' });
  });

  // Same shape as the status snapshot file
  server.get('/status', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send(buildStatusSnapshot(source.context.locationStatus));
  });

  return server;
}

export async function startHealthServer(port: number, source: HealthSource): Promise<void> {
  _server = buildHealthServer(source);
  await _server.listen({ port, host: '0.0.0.0' });
}

export async function stopHealthServer(): Promise<void> {
  if (_server) {
    await _server.close();
    _server = null;
  }
}

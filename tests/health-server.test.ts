import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildHealthServer, type HealthSource } from '../src/health/server.js';
import type { LocationStatus } from '../src/monitor/types.js';
import type { SchedulerState } from '../src/scheduler/index.js';

function source(state: Partial<SchedulerState>, statuses = new Map<string, LocationStatus>()): HealthSource {
  const full: SchedulerState = {
    isRunning: true,
    cycleRunning: false,
    cyclesCompleted: 0,
    lastCycleEnd: null,
    lastCycle: null,
    ...state,
  };
  return { getState: () => full, context: { locationStatus: statuses } };
}

describe('health server', () => {
  let server: FastifyInstance | null = null;

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  it('answers the liveness probe', async () => {
    server = buildHealthServer(source({}));
    const response = await server.inject({ method: 'GET', url: '/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'alive' });
  });

  it('reports starting before the first cycle completes', async () => {
    server = buildHealthServer(source({}));
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'starting', cyclesCompleted: 0, lastCycleEnd: null });
  });

  it('reports healthy after a recent cycle', async () => {
    const lastCycleEnd = new Date();
    server = buildHealthServer(
      source({ cyclesCompleted: 3, lastCycleEnd, lastCycle: { pairs: 2, activePairs: 1, durationMs: 40 } }),
    );
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      status: 'healthy',
      cyclesCompleted: 3,
      lastCycleEnd: lastCycleEnd.toISOString(),
      lastCycle: { pairs: 2, activePairs: 1, durationMs: 40 },
    });
  });

  it('reports degraded when the last cycle is stale', async () => {
    server = buildHealthServer(source({ cyclesCompleted: 1, lastCycleEnd: new Date(Date.now() - 20 * 60 * 1000) }));
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({ status: 'degraded' });
  });

  it('reports stopped when the scheduler is not running', async () => {
    server = buildHealthServer(source({ isRunning: false }));
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({ status: 'stopped' });
  });

  it('serves the location status snapshot', async () => {
    const statuses = new Map<string, LocationStatus>([
      [
        'melbourne',
        {
          isActive: false,
          reason: 'Nighttime hours in melbourne (local time: 23:00). Resuming at 06:30',
          nextChange: new Date('2026-06-15T20:30:00Z'),
          nextStatus: 'active',
        },
      ],
    ]);
    server = buildHealthServer(source({}, statuses));
    const response = await server.inject({ method: 'GET', url: '/status' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      locations: {
        melbourne: { is_active: false, next_change: '2026-06-15T20:30:00.000Z', next_status: 'active' },
      },
    });
  });
});

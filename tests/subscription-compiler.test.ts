import { describe, it, expect } from 'vitest';
import { MonitorContext, workItemKey } from '../src/monitor/context.js';
import { checkEligibility, compileSubscriptions, formatPairsLog } from '../src/monitor/subscription-compiler.js';
import { makeUser } from './helpers/fakes.js';

// 12:00 in Melbourne, 02:00 UTC
const NOW = new Date('2026-06-15T02:00:00Z');

describe('checkEligibility', () => {
  it('accepts an active user whose expiry is today or later', () => {
    expect(checkEligibility(makeUser({ expiryDate: '2026-06-15' }), NOW)).toEqual({ eligible: true });
  });

  it('rejects deactivated users', () => {
    expect(checkEligibility(makeUser({ activationStatus: false }), NOW)).toEqual({
      eligible: false,
      reason: 'inactive',
    });
  });

  it('rejects expired subscriptions', () => {
    expect(checkEligibility(makeUser({ expiryDate: '2026-06-01' }), NOW)).toEqual({
      eligible: false,
      reason: 'expired',
    });
  });

  it('rejects expiry dates that are not yyyy-MM-dd', () => {
    expect(checkEligibility(makeUser({ expiryDate: '15/06/2026' }), NOW)).toEqual({
      eligible: false,
      reason: 'invalid_expiry',
    });
  });
});

describe('compileSubscriptions', () => {
  const users = [
    makeUser({ chatId: 1, keywords: ['bike', 'desk'] }),
    makeUser({ chatId: 2, keywords: ['bike'], excludedWords: ['kids'] }),
    makeUser({ chatId: 3, location: 'perth', activationStatus: false }),
    makeUser({ chatId: 4, location: 'perth', expiryDate: 'not-a-date' }),
    makeUser({ chatId: 5, location: 'springfield', keywords: ['lamp'] }),
  ];

  it('deduplicates work items and groups subscribers in user order', () => {
    const ctx = new MonitorContext();
    const compiled = compileSubscriptions(users, ctx, NOW);

    expect(compiled.allItems).toEqual([
      { keyword: 'bike', location: 'melbourne' },
      { keyword: 'desk', location: 'melbourne' },
      { keyword: 'lamp', location: 'springfield' },
    ]);

    const bikeSubscribers = compiled.subscribers.get(workItemKey({ keyword: 'bike', location: 'melbourne' })) ?? [];
    expect(bikeSubscribers.map((s) => s.chatId)).toEqual([1, 2]);
    expect(bikeSubscribers[1].excludedWords).toEqual(['kids']);
  });

  it('keeps only items whose location is inside monitoring hours', () => {
    const compiled = compileSubscriptions(users, new MonitorContext(), NOW);

    expect(compiled.activeItems).toEqual([
      { keyword: 'bike', location: 'melbourne' },
      { keyword: 'desk', location: 'melbourne' },
    ]);
  });

  it('rebuilds the location index from eligible users only', () => {
    const ctx = new MonitorContext();
    compileSubscriptions(users, ctx, NOW);

    expect(ctx.usersForLocation('Melbourne')).toEqual([1, 2]);
    expect(ctx.usersForLocation('springfield')).toEqual([5]);
    expect(ctx.usersForLocation('perth')).toEqual([]);

    compileSubscriptions([users[4]], ctx, NOW);
    expect(ctx.usersForLocation('melbourne')).toEqual([]);
  });

  it('subscribes a user once when a keyword repeats', () => {
    const compiled = compileSubscriptions(
      [makeUser({ chatId: 1, keywords: ['bike', 'desk', 'bike'] })],
      new MonitorContext(),
      NOW,
    );

    expect(compiled.allItems).toEqual([
      { keyword: 'bike', location: 'melbourne' },
      { keyword: 'desk', location: 'melbourne' },
    ]);
    const bikeSubscribers = compiled.subscribers.get(workItemKey({ keyword: 'bike', location: 'melbourne' })) ?? [];
    expect(bikeSubscribers.map((s) => s.chatId)).toEqual([1]);
  });

  it('does not touch recorded location status', () => {
    const ctx = new MonitorContext();
    compileSubscriptions(users, ctx, NOW);

    expect(ctx.locationStatus.size).toBe(0);
  });
});

describe('formatPairsLog', () => {
  it('writes one line per work item with its status and reason', () => {
    const compiled = compileSubscriptions(
      [makeUser({ chatId: 1, keywords: ['bike'] }), makeUser({ chatId: 5, location: 'springfield', keywords: ['lamp'] })],
      new MonitorContext(),
      NOW,
    );

    expect(formatPairsLog(compiled)).toBe(
      'bike - melbourne [ACTIVE] - Daytime hours in melbourne (local time: 12:00)\n' +
        'lamp - springfield [PAUSED] - Nighttime hours in springfield (local time: 02:00). Resuming at 06:30\n',
    );
  });
});

/**
 * Reward Engine - Test Suite
 *
 * Award pipeline (fit, evaluate, prior awards, apply), error mapping,
 * collectives, definition loading and computed reward runs.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MongoError } from 'mongodb';
import { subscribeToLogs, type LogEntry } from 'core-service';
import {
  ComputedReward,
  EvalContext,
  HandlebarsTemplates,
  insertAwardThenEnqueue,
  RewardEngine,
  sessionFromUser,
  type FailedCondition,
  type RewardDefinition,
} from '../src/index.js';
import { createMemoryConnections, type MemoryConnections } from './helpers/memory-stores.js';
import { FakeCelebrations, makeDefinition, makeUser } from './helpers/fakes.js';

const receiver = makeUser(1, { groups: ['sales'], programs: ['core'], birthday: '1990-03-14' });
const giver = makeUser(2, { groups: ['managers'], displayName: 'Grace Giver' });
const outsider = makeUser(3);

let connections: MemoryConnections;
let celebrations: FakeCelebrations;
let engine: RewardEngine;

function define(...definitions: RewardDefinition[]) {
  for (const definition of definitions) {
    connections.rewards.definitions.set(definition.rewardId, definition);
  }
}

const fromGiver = (args: Record<string, unknown> = {}) => new EvalContext(receiver, sessionFromUser(giver), args);
const at = (iso: string) => ({ now: new Date(iso) });

beforeEach(() => {
  connections = createMemoryConnections([receiver, giver, outsider]);
  celebrations = new FakeCelebrations();
  engine = new RewardEngine({ connections, celebrations, templates: new HandlebarsTemplates() });
});

// ═══════════════════════════════════════════════════════════════════
// AWARDING
// ═══════════════════════════════════════════════════════════════════

describe('RewardEngine.award', () => {
  it('should award a manual reward from the acting session', async () => {
    define(makeDefinition(1, { message: 'Nice work {{user.displayName}}, from {{session.displayName}}', emoji: '🎯' }));

    const outcome = await engine.award(1, fromGiver(), at('2025-03-14T10:00:00Z'));

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.award).toMatchObject({
      rewardId: 1,
      reward: 'Reward 1',
      receiverUser: 1,
      receiverEmail: 'user1@example.com',
      receiverName: 'User 1',
      giverUser: 2,
      giverEmail: 'user2@example.com',
      giverName: 'Grace Giver',
      points: 10,
      rewardType: 'manual',
      message: 'Nice work User 1, from Grace Giver',
      timeframeBucket: 'once',
      awardedAt: new Date('2025-03-14T10:00:00Z'),
    });
    expect(connections.rewards.awards).toHaveLength(1);
  });

  it('should enqueue the award notification with the award', async () => {
    define(makeDefinition(1, { emoji: '🎯', icon: 'https://example.com/icon.png' }));

    await engine.award(1, fromGiver(), at('2025-03-14T10:00:00Z'));

    const [message] = connections.outbox.messages;
    expect(message.status).toBe('pending');
    expect(message.attempts).toBe(0);
    expect(message.nextAttemptAt).toEqual(new Date('2025-03-14T10:00:00Z'));
    expect(message.payload).toMatchObject({
      reward: 'Reward 1',
      emoji: '🎯',
      icon: 'https://example.com/icon.png',
      message: "Congratulations! You've received a Badge!",
      receiverEmail: 'user1@example.com',
      giverName: 'Grace Giver',
    });
  });

  it('should use an override message as-is', async () => {
    define(makeDefinition(1));
    const outcome = await engine.award(1, fromGiver(), { overrides: { message: 'Thanks for the demo' } });
    expect(outcome.success && outcome.award.message).toBe('Thanks for the demo');
  });

  it('should report unknown rewards', async () => {
    expect(await engine.award(99, fromGiver())).toEqual({
      success: false,
      error: 'Reward not found',
      code: 'MSRewardsRewardNotFound',
    });
  });

  it('should refuse disabled rewards', async () => {
    define(makeDefinition(1, { isEnabled: false }));
    expect(await engine.award(1, fromGiver())).toEqual({
      success: false,
      error: 'Reward is disabled',
      code: 'MSRewardsRewardNotEligible',
    });
  });

  it('should refuse a second single award', async () => {
    define(makeDefinition(1));
    await engine.award(1, fromGiver(), at('2025-03-14T10:00:00Z'));
    expect(await engine.award(1, fromGiver(), at('2025-04-01T10:00:00Z'))).toEqual({
      success: false,
      error: 'Reward already awarded',
      code: 'MSRewardsAlreadyAwarded',
    });
  });

  it('should refuse rewarding yourself', async () => {
    define(makeDefinition(1));
    expect(await engine.award(1, fromGiver(), { overrides: { giverUser: 1 } })).toEqual({
      success: false,
      error: 'Cannot reward yourself.',
      code: 'MSRewardsCannotRewardYourself',
      details: 'MSRewardsCannotRewardYourself',
    });
  });

  it('should reject award payloads that do not validate', async () => {
    define(makeDefinition(1));
    const ctx = new EvalContext(makeUser(5, { email: 'not-an-email' }), sessionFromUser(giver));
    const outcome = await engine.award(1, ctx);
    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error).toBe('Error Validating Reward Payload');
    expect(outcome.code).toBe('MSRewardsInvalidAwardPayload');
  });
});

// ═══════════════════════════════════════════════════════════════════
// ELIGIBILITY
// ═══════════════════════════════════════════════════════════════════

describe('Eligibility checks', () => {
  const failedOf = async (rewardId: number, ctx: EvalContext, now = '2025-03-14T10:00:00Z') => {
    const outcome = await engine.award(rewardId, ctx, at(now));
    if (outcome.success) throw new Error('expected the award to be refused');
    expect(outcome.error).toBe('User is not eligible for this reward');
    expect(outcome.code).toBe('MSRewardsRewardNotEligible');
    return outcome.failed;
  };

  it('should check the availability window', async () => {
    define(makeDefinition(1, { availabilityRule: { startTime: '09:00', endTime: '17:00' } }));
    expect(await failedOf(1, fromGiver(), '2025-03-14T18:00:00Z')).toEqual([{ check: 'environment' }]);
  });

  it('should check program membership', async () => {
    define(makeDefinition(1, { programs: ['emerging-leaders'] }));
    expect(await failedOf(1, fromGiver())).toEqual([{ check: 'programs' }]);
  });

  it('should require at least one condition key', async () => {
    define(makeDefinition(1, { conditions: { orderId: true } }));
    expect(await failedOf(1, fromGiver())).toEqual([{ check: 'context' }]);

    const outcome = await engine.award(1, fromGiver({ orderId: 'A-17' }));
    expect(outcome.success).toBe(true);
  });

  it('should match assigners by id, email or audience', async () => {
    define(
      makeDefinition(1, { assigner: [99] }),
      makeDefinition(2, { assigner: ['USER2@example.com'] }),
      makeDefinition(3, { assigner: ['{"groups":["managers"]}'] }),
      makeDefinition(4, { assigner: [{ jobCode: ['MGR'] }] })
    );

    expect(await failedOf(1, fromGiver())).toEqual([{ check: 'assigner' }]);
    expect((await engine.award(2, fromGiver())).success).toBe(true);
    expect((await engine.award(3, fromGiver())).success).toBe(true);
    expect(await failedOf(4, fromGiver())).toEqual([{ check: 'assigner' }]);
  });

  it('should check the receiving user against awardee filters', async () => {
    define(makeDefinition(1, { awardee: [{ groups: ['support'] }] }), makeDefinition(2, { awardee: [{ groups: ['sales'] }] }));
    expect(await failedOf(1, fromGiver())).toEqual([{ check: 'awardee' }]);
    expect((await engine.award(2, fromGiver())).success).toBe(true);
  });

  it('should name the rule that does not fit', async () => {
    define(makeDefinition(1, { rules: [{ type: 'early_bird' }] }));
    expect(await failedOf(1, fromGiver())).toEqual([{ check: 'rule', rule: 'early_bird' }, { check: 'rules' }]);
  });

  it('should keep failed conditions apart for concurrent awards', async () => {
    define(makeDefinition(1, { awardee: [{ groups: ['sales'] }], rules: [{ type: 'birthday' }] }));
    const colleague = makeUser(5, { groups: ['support'], birthday: '1991-06-01' });

    const [notAwardee, notBirthday] = await Promise.all([
      engine.award(1, new EvalContext(colleague, sessionFromUser(giver)), at('2025-06-01T10:00:00Z')),
      engine.award(1, fromGiver(), at('2025-06-01T10:00:00Z')),
    ]);

    expect(!notAwardee.success && notAwardee.failed).toEqual([{ check: 'awardee' }]);
    expect(!notBirthday.success && notBirthday.failed).toEqual([{ check: 'rule', rule: 'birthday' }]);
  });

  it('should collect failed checks in the list the caller passes', () => {
    const reward = engine.build(makeDefinition(1, { programs: ['emerging-leaders'] }));
    const env = engine.environment(new Date('2025-03-14T10:00:00Z'));
    const first: FailedCondition[] = [];
    const second: FailedCondition[] = [];

    expect(reward.fits(fromGiver(), env, first)).toBe(false);
    expect(reward.fits(fromGiver(), env, second)).toBe(false);
    expect(first).toEqual([{ check: 'programs' }]);
    expect(second).toEqual([{ check: 'programs' }]);
  });

  it('should name the rule that does not evaluate', async () => {
    define(makeDefinition(1, { rules: [{ type: 'birthday' }] }));
    expect(await failedOf(1, fromGiver(), '2025-06-01T10:00:00Z')).toEqual([{ check: 'rule', rule: 'birthday' }]);
    expect((await engine.award(1, fromGiver(), at('2025-03-14T10:00:00Z'))).success).toBe(true);
  });
});

// ═══════════════════════════════════════════════════════════════════
// MULTIPLICITY
// ═══════════════════════════════════════════════════════════════════

describe('Repeat awards', () => {
  it('should allow one award per timeframe bucket', async () => {
    define(makeDefinition(1, { multiple: true, timeframe: 'daily' }));

    const first = await engine.award(1, fromGiver(), at('2025-03-14T09:00:00Z'));
    const sameDay = await engine.award(1, fromGiver(), at('2025-03-14T15:00:00Z'));
    const nextDay = await engine.award(1, fromGiver(), at('2025-03-15T09:00:00Z'));

    expect(first.success && first.award.timeframeBucket).toBe('daily:2025-03-14');
    expect(sameDay).toEqual({ success: false, error: 'Reward already awarded', code: 'MSRewardsAlreadyAwarded' });
    expect(nextDay.success && nextDay.award.timeframeBucket).toBe('daily:2025-03-15');
  });

  it('should wait out the cooldown', async () => {
    define(makeDefinition(1, { multiple: true, cooldownMinutes: 60 }));

    expect((await engine.award(1, fromGiver(), at('2025-03-14T10:00:00Z'))).success).toBe(true);
    expect((await engine.award(1, fromGiver(), at('2025-03-14T10:59:00Z'))).success).toBe(false);
    expect((await engine.award(1, fromGiver(), at('2025-03-14T11:00:00Z'))).success).toBe(true);
    expect(connections.rewards.awards).toHaveLength(2);
  });

  it('should match weekly awards by ISO week across a month boundary', async () => {
    define(makeDefinition(1, { multiple: true, timeframe: 'weekly' }));
    await engine.award(1, fromGiver(), at('2025-03-31T09:00:00Z'));
    const reward = engine.build(makeDefinition(1, { multiple: true, timeframe: 'weekly' }));

    expect(await reward.hasAwarded(receiver, engine.environment(new Date('2025-04-02T09:00:00Z')))).toBe(true);
    expect(await reward.hasAwarded(receiver, engine.environment(new Date('2025-04-07T09:00:00Z')))).toBe(false);
  });

  it('should report a prior award only inside the cooldown window', async () => {
    define(makeDefinition(1, { multiple: true, cooldownMinutes: 30 }));
    await engine.award(1, fromGiver(), at('2025-03-14T10:00:00Z'));
    const reward = engine.build(makeDefinition(1, { multiple: true, cooldownMinutes: 30 }));

    expect(await reward.hasAwarded(receiver, engine.environment(new Date('2025-03-14T10:29:00Z')))).toBe(true);
    expect(await reward.hasAwarded(receiver, engine.environment(new Date('2025-03-14T10:31:00Z')))).toBe(false);
  });

  it('should throw on an unknown timeframe', async () => {
    define(makeDefinition(1, { multiple: true, timeframe: 'yearly' }));
    await expect(engine.award(1, fromGiver())).rejects.toThrow('MSRewardsInvalidTimeframe');
  });

  it('should refuse a duplicate bucket at insert time', async () => {
    const reward = engine.build(makeDefinition(1, { multiple: true, timeframe: 'hourly' }));
    const env = engine.environment(new Date('2025-03-14T10:15:00Z'));

    expect((await reward.apply(fromGiver(), env)).ok).toBe(true);
    expect(await reward.apply(fromGiver(), env)).toEqual({
      ok: false,
      error: { message: 'Reward already awarded for this timeframe', error: 'MSRewardsAlreadyAwarded' },
    });
  });
});

// ═══════════════════════════════════════════════════════════════════
// STORE FAILURES
// ═══════════════════════════════════════════════════════════════════

describe('Insert failures', () => {
  it('should map database errors', async () => {
    define(makeDefinition(1));
    connections.rewards.failNextInsert = new MongoError('connection closed');
    expect(await engine.award(1, fromGiver())).toEqual({
      success: false,
      error: 'Error on Rewards Database',
      code: 'MSRewardsRewardsDatabaseError',
      details: 'connection closed',
    });
  });

  it('should map any other error', async () => {
    define(makeDefinition(1));
    connections.rewards.failNextInsert = new Error('disk full');
    expect(await engine.award(1, fromGiver())).toEqual({
      success: false,
      error: 'Error Creating Reward',
      code: 'MSRewardsAwardCreationFailed',
      details: 'disk full',
    });
    expect(connections.outbox.messages).toHaveLength(0);
  });

  it('should keep the award when its notification cannot be queued', async () => {
    define(makeDefinition(1));
    connections.outbox.failNextEnqueue = new MongoError('outbox unavailable');
    const logged: LogEntry[] = [];
    const unsubscribe = subscribeToLogs(entry => logged.push(entry));

    const outcome = await engine.award(1, fromGiver(), at('2025-03-14T10:00:00Z'));
    unsubscribe();

    expect(outcome.success).toBe(true);
    expect(connections.rewards.awards).toHaveLength(1);
    expect(connections.outbox.messages).toHaveLength(0);
    const failure = logged.find(entry => entry.message === 'Failed to enqueue award notification');
    expect(failure?.level).toBe('error');
    expect(failure?.data).toMatchObject({ rewardId: 1, userId: 1, error: 'outbox unavailable' });
  });

  it('should report a duplicate insert without queueing a notification', async () => {
    let enqueued = 0;
    const outcome = await insertAwardThenEnqueue(
      { awardId: 'a-1', rewardId: 1, receiverUser: 1 },
      async () => {
        throw new MongoError('E11000 duplicate key error collection: user_rewards');
      },
      async () => {
        enqueued++;
      }
    );

    expect(outcome).toBe('duplicate');
    expect(enqueued).toBe(0);
  });

  it('should rethrow an award insert failure before queueing', async () => {
    let enqueued = 0;
    const insert = insertAwardThenEnqueue(
      { awardId: 'a-1', rewardId: 1, receiverUser: 1 },
      async () => {
        throw new MongoError('connection closed');
      },
      async () => {
        enqueued++;
      }
    );

    await expect(insert).rejects.toThrow('connection closed');
    expect(enqueued).toBe(0);
  });
});

// ═══════════════════════════════════════════════════════════════════
// COLLECTIVES
// ═══════════════════════════════════════════════════════════════════

describe('Collectives', () => {
  it('should unlock a collective once every member reward is held', async () => {
    define(makeDefinition(1), makeDefinition(2), makeDefinition(3));
    connections.rewards.collectives.push({ collectiveId: 7, name: 'Full Set', rewardIds: [1, 2] });

    await engine.award(1, fromGiver(), at('2025-03-14T10:00:00Z'));
    expect(connections.rewards.unlocks).toEqual([]);

    await engine.award(2, fromGiver(), at('2025-03-15T10:00:00Z'));
    await engine.award(3, fromGiver(), at('2025-03-16T10:00:00Z'));
    expect(connections.rewards.unlocks).toEqual([
      { collectiveId: 7, userId: 1, unlockedAt: new Date('2025-03-15T10:00:00Z') },
    ]);
  });

  it('should not unlock the same collective twice', async () => {
    const reward = engine.build(makeDefinition(1));
    connections.rewards.collectives.push({ collectiveId: 7, name: 'Single', rewardIds: [1] });
    define(makeDefinition(1));
    await engine.award(1, fromGiver());

    const env = engine.environment();
    expect(await reward.checkCollectives(1, 1, env)).toEqual([]);
    expect(connections.rewards.unlocks).toHaveLength(1);
  });
});

// ═══════════════════════════════════════════════════════════════════
// DEFINITIONS
// ═══════════════════════════════════════════════════════════════════

describe('Definition loading', () => {
  it('should load enabled definitions and skip broken ones', async () => {
    define(
      makeDefinition(1),
      makeDefinition(2, { isEnabled: false }),
      makeDefinition(3, { rules: [{ type: 'moon_phase' }] }),
      makeDefinition(4, { rewardType: 'computed', rules: [{ type: 'birthday' }] })
    );

    expect(await engine.load()).toBe(2);
    expect(engine.list().map(reward => reward.rewardId)).toEqual([1, 4]);
    expect(engine.computedRewards().map(reward => reward.rewardId)).toEqual([4]);
    expect(engine.get(4)).toBeInstanceOf(ComputedReward);
  });

  it('should find rewards bound to an event', async () => {
    define(
      makeDefinition(1, { events: [{ 'deal.closed': { minAmount: 1000 } }] }),
      makeDefinition(2, { events: [{ 'ticket.resolved': true }] })
    );
    await engine.load();

    const bound = engine.rewardsForEvent('deal.closed');
    expect(bound.map(entry => entry.reward.rewardId)).toEqual([1]);
    expect(bound[0].binding).toEqual({ minAmount: 1000 });
    expect(engine.rewardsForEvent('unknown.event')).toEqual([]);
  });
});

// ═══════════════════════════════════════════════════════════════════
// COMPUTED REWARDS
// ═══════════════════════════════════════════════════════════════════

describe('Computed rewards', () => {
  const birthdayReward = makeDefinition(10, {
    rewardType: 'computed',
    rules: [{ type: 'birthday' }],
    notificationKind: 'birthday',
    teamsWebhook: 'https://example.com/webhook',
    icon: 'https://example.com/cake.png',
  });

  it('should award every candidate and celebrate once', async () => {
    define(birthdayReward);
    await engine.load();

    const summaries = await engine.runComputed(new Date('2025-03-14T08:00:00Z'));

    expect(summaries).toEqual([
      {
        rewardId: 10,
        candidates: 1,
        awarded: [{ displayName: 'User 1', email: 'user1@example.com' }],
        skipped: 0,
        errors: 0,
        notified: true,
      },
    ]);
    expect(celebrations.calls).toEqual([
      {
        url: 'https://example.com/webhook',
        kind: 'birthday',
        users: [{ displayName: 'User 1', email: 'user1@example.com' }],
        reward: { name: 'Reward 10', icon: 'https://example.com/cake.png' },
      },
    ]);
    expect(connections.rewards.awards[0]).toMatchObject({ receiverUser: 1, rewardType: 'computed' });
    expect(connections.rewards.awards[0].giverUser).toBeUndefined();
  });

  it('should skip users already awarded and stay quiet', async () => {
    define({ ...birthdayReward, multiple: true, timeframe: 'daily' });
    await engine.load();

    await engine.runComputed(new Date('2025-03-14T08:00:00Z'));
    const [second] = await engine.runComputed(new Date('2025-03-14T09:00:00Z'));

    expect(second).toMatchObject({ candidates: 1, awarded: [], skipped: 1, notified: false });
    expect(celebrations.calls).toHaveLength(1);
  });

  it('should carry years employed for anniversaries', async () => {
    connections.users.users.push(makeUser(4, { startDate: new Date('2015-03-14T00:00:00Z') }));
    define(
      makeDefinition(11, {
        rewardType: 'computed',
        rules: [{ type: 'work_anniversary' }],
        notificationKind: 'anniversary',
        attributes: { teams_webhook: 'https://example.com/anniversaries' },
      })
    );
    await engine.load();

    const summary = await engine.runComputedReward(11, new Date('2025-03-14T08:00:00Z'));

    expect(summary?.awarded).toEqual([{ displayName: 'User 4', email: 'user4@example.com', yearsEmployed: 10 }]);
    expect(celebrations.calls[0].url).toBe('https://example.com/anniversaries');
  });

  it('should keep awards when the celebration fails', async () => {
    define(birthdayReward);
    await engine.load();
    celebrations.result = { status: 'failed', error: 'Teams webhook failed: 500 - oops' };

    const summary = await engine.runComputedReward(10, new Date('2025-03-14T08:00:00Z'));

    expect(summary?.notified).toBe(false);
    expect(summary?.awarded).toHaveLength(1);
  });

  it('should not celebrate without a webhook', async () => {
    define({ ...birthdayReward, teamsWebhook: undefined });
    await engine.load();

    const summary = await engine.runComputedReward(10, new Date('2025-03-14T08:00:00Z'));
    expect(summary?.notified).toBe(false);
    expect(celebrations.calls).toEqual([]);
  });

  it('should only run loaded computed rewards', async () => {
    define(birthdayReward, makeDefinition(1));
    await engine.load();

    expect(await engine.runComputedReward(1)).toBeNull();
    expect(await engine.runComputedReward(99)).toBeNull();
    expect(await engine.runComputed(new Date('2025-03-14T08:00:00Z'), reward => reward.rewardId !== 10)).toEqual([]);
  });
});

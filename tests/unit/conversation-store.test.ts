import { Conversation, PendingEffect } from '../../src/config/types';
import Redis from 'ioredis';
import {
  InMemoryConversationStore,
  RedisConversationStore,
  applyDelta,
  newConversation,
} from '../../src/memory/conversation-store';
import { ConversationSeed } from '../../src/memory/types';
import { VersionConflict } from '../../src/resilience/errors';
import { NOW, must } from '../helpers/fakes';

const SEED: ConversationSeed = { tenantId: 'default', channel: 'whatsapp', defaultAgent: 'SALES' };
const KEY = 'whatsapp:5215550000001';

function userMessage(text: string) {
  return { role: 'user' as const, text, timestamp: NOW, agentAtTime: 'SALES' as const };
}

function reply(effectId: string, text: string): PendingEffect {
  return { kind: 'send_reply', effectId, text };
}

describe('InMemoryConversationStore', () => {
  let store: InMemoryConversationStore;

  beforeEach(() => {
    store = new InMemoryConversationStore(() => NOW);
  });

  it('should hand out a fresh version 0 without persisting it', async () => {
    const snapshot = await store.load(KEY, SEED);

    expect(snapshot).toEqual(newConversation(KEY, SEED, NOW));
    expect(await store.peek(KEY)).toBeNull();
    expect(await store.listPendingKeys()).toEqual([]);
  });

  it('should bump the version by one on each commit', async () => {
    const first = await store.commit(KEY, 0, () => ({ appendMessages: [userMessage('hola')] }), SEED);
    const second = await store.commit(KEY, 1, () => ({ appendMessages: [userMessage('sigo aquí')] }), SEED);

    if (second instanceof VersionConflict || first instanceof VersionConflict) throw new Error('unexpected conflict');
    expect(first.version).toBe(1);
    expect(second.version).toBe(2);
    expect(second.messages.map((m) => m.text)).toEqual(['hola', 'sigo aquí']);
  });

  it('should reject a stale commit without applying it', async () => {
    await store.commit(KEY, 0, () => ({ appendMessages: [userMessage('hola')] }), SEED);
    const mutator = jest.fn(() => ({ appendMessages: [userMessage('tarde')] }));

    const result = await store.commit(KEY, 0, mutator, SEED);

    expect(result).toBeInstanceOf(VersionConflict);
    if (!(result instanceof VersionConflict)) return;
    expect(result.expectedVersion).toBe(0);
    expect(result.actualVersion).toBe(1);
    expect(mutator).not.toHaveBeenCalled();
    expect(must(await store.peek(KEY)).messages).toHaveLength(1);
  });

  it('should let exactly one of two racing commits win', async () => {
    const results = await Promise.all([
      store.commit(KEY, 0, () => ({ appendMessages: [userMessage('a')] }), SEED),
      store.commit(KEY, 0, () => ({ appendMessages: [userMessage('b')] }), SEED),
    ]);

    expect(results.filter((r) => r instanceof VersionConflict)).toHaveLength(1);
    expect(must(await store.peek(KEY)).version).toBe(1);
  });

  it('should return deep-frozen snapshots', async () => {
    await store.commit(KEY, 0, () => ({ appendMessages: [userMessage('hola')], state: { turnCount: 1 } }), SEED);
    const snapshot = must(await store.peek(KEY));

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.messages)).toBe(true);
    expect(Object.isFrozen(snapshot.messages[0])).toBe(true);
    expect(Object.isFrozen(snapshot.state)).toBe(true);
  });

  it('should track and acknowledge pending effects without changing the version', async () => {
    await store.commit(
      KEY,
      0,
      () => ({ appendMessages: [userMessage('hola')], effects: [reply(`${KEY}#1:reply`, 'Hola!')] }),
      SEED,
    );
    expect(await store.listPendingKeys()).toEqual([KEY]);

    await store.acknowledgeEffects(KEY, [`${KEY}#1:reply`]);

    const stored = must(await store.peek(KEY));
    expect(stored.pendingEffects).toEqual([]);
    expect(stored.version).toBe(1);
    expect(await store.listPendingKeys()).toEqual([]);
  });

  it('should ignore acknowledgements for unknown conversations', async () => {
    await expect(store.acknowledgeEffects('web:missing', ['x'])).resolves.toBeUndefined();
  });
});

/** Hashes and sets in memory; `eval` applies the commit script's rev check */
class ScriptedRedis {
  readonly hashes = new Map<string, Map<string, string>>();
  readonly sets = new Map<string, Set<string>>();
  /** Runs once, just before the next script executes */
  beforeNextEval?: () => Promise<void>;

  async hmget(key: string, ...fields: string[]): Promise<(string | null)[]> {
    const hash = this.hashes.get(key);
    return fields.map((f) => hash?.get(f) ?? null);
  }

  async smembers(key: string): Promise<string[]> {
    return [...(this.sets.get(key) ?? [])];
  }

  async eval(_script: string, _numKeys: number, ...args: string[]): Promise<number> {
    const hook = this.beforeNextEval;
    this.beforeNextEval = undefined;
    if (hook) await hook();

    const [hashKey, setKey, expectedRev, version, doc, , pending, member] = args;
    const hash = this.hashes.get(hashKey) ?? new Map<string, string>();
    const rev = hash.get('rev') ?? '0';
    if (rev !== expectedRev) return Number(rev);
    hash.set('rev', String(Number(rev) + 1));
    hash.set('version', version);
    hash.set('doc', doc);
    this.hashes.set(hashKey, hash);
    const set = this.sets.get(setKey) ?? new Set<string>();
    if (pending === '1') set.add(member);
    else set.delete(member);
    this.sets.set(setKey, set);
    return -1;
  }
}

describe('RedisConversationStore', () => {
  let redis: ScriptedRedis;
  let store: RedisConversationStore;

  beforeEach(async () => {
    redis = new ScriptedRedis();
    store = new RedisConversationStore(redis as unknown as Redis, 0, () => NOW);
    await store.commit(
      KEY,
      0,
      () => ({ appendMessages: [userMessage('hola')], effects: [reply('e1', 'uno'), reply('e2', 'dos')] }),
      SEED,
    );
  });

  it('should not resurrect an effect acknowledged between a commit read and its write', async () => {
    redis.beforeNextEval = () => store.acknowledgeEffects(KEY, ['e1']);

    const result = await store.commit(
      KEY,
      1,
      () => ({ appendMessages: [userMessage('otra')], effects: [reply('e3', 'tres')] }),
      SEED,
    );

    if (result instanceof VersionConflict) throw new Error('unexpected conflict');
    expect(result.version).toBe(2);
    expect(result.pendingEffects.map((e) => e.effectId)).toEqual(['e2', 'e3']);
    expect(must(await store.peek(KEY)).pendingEffects.map((e) => e.effectId)).toEqual(['e2', 'e3']);
  });

  it('should not drop a commit that lands while an acknowledgement is in flight', async () => {
    redis.beforeNextEval = async () => {
      await store.commit(KEY, 1, () => ({ appendMessages: [userMessage('otra')], effects: [reply('e3', 'tres')] }), SEED);
    };

    await store.acknowledgeEffects(KEY, ['e1', 'e2']);

    const stored = must(await store.peek(KEY));
    expect(stored.version).toBe(2);
    expect(stored.messages.map((m) => m.text)).toEqual(['hola', 'otra']);
    expect(stored.pendingEffects.map((e) => e.effectId)).toEqual(['e3']);
  });

  it('should still report a conflict when the version moved', async () => {
    await store.commit(KEY, 1, () => ({ appendMessages: [userMessage('otra')] }), SEED);

    const result = await store.commit(KEY, 1, () => ({ appendMessages: [userMessage('tarde')] }), SEED);

    expect(result).toBeInstanceOf(VersionConflict);
    expect(await store.listPendingKeys()).toEqual([KEY]);
  });
});

describe('applyDelta', () => {
  const base: Conversation = newConversation(KEY, SEED, NOW);

  it('should record a transition when the agent changes', () => {
    const next = applyDelta(base, { appendMessages: [], nextAgent: { agent: 'SUPPORT', reason: 'intent_switch' } }, NOW + 5);

    expect(next.currentAgent).toBe('SUPPORT');
    expect(next.agentHistory).toEqual([
      { from: 'SALES', to: 'SUPPORT', reason: 'intent_switch', atVersion: 1, timestamp: NOW + 5 },
    ]);
    expect(next.updatedAt).toBe(NOW + 5);
  });

  it('should not record a transition to the same agent', () => {
    const next = applyDelta(base, { appendMessages: [], nextAgent: { agent: 'SALES', reason: 'intent_switch' } }, NOW);

    expect(next.agentHistory).toEqual([]);
  });

  it('should keep the scratch state when the delta carries none', () => {
    const withState: Conversation = { ...base, state: { turnCount: 3 } };

    expect(applyDelta(withState, { appendMessages: [] }, NOW).state).toEqual({ turnCount: 3 });
  });

  it('should append effects to those still pending', () => {
    const pending: Conversation = { ...base, pendingEffects: [reply('a', 'uno')] };

    const next = applyDelta(pending, { appendMessages: [], effects: [reply('b', 'dos')] }, NOW);

    expect(next.pendingEffects.map((e) => e.effectId)).toEqual(['a', 'b']);
  });
});

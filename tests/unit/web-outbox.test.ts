import { WebOutbox } from '../../src/channels/web-outbox';

const MINUTE = 60_000;

describe('WebOutbox', () => {
  let clock: number;
  let outbox: WebOutbox;

  beforeEach(() => {
    clock = 0;
    outbox = new WebOutbox(() => clock);
  });

  it('should hand queued replies over once', async () => {
    await outbox.sendMessage('web:s1', 'Hola', 'web');
    await outbox.sendMessage('web:s1', '¿En qué te ayudo?', 'web');

    expect(outbox.collect('web:s1').map((r) => r.text)).toEqual(['Hola', '¿En qué te ayudo?']);
    expect(outbox.collect('web:s1')).toEqual([]);
  });

  it('should keep only the newest replies past the per-session cap', async () => {
    for (let i = 0; i < 52; i++) await outbox.sendMessage('web:s1', `m${i}`, 'web');

    const replies = outbox.collect('web:s1');
    expect(replies).toHaveLength(50);
    expect(replies[0].text).toBe('m2');
  });

  it('should drop sessions that stayed silent past the TTL', async () => {
    await outbox.sendMessage('web:s1', 'nadie recoge esto', 'web');
    clock = 30 * MINUTE;
    await outbox.sendMessage('web:s2', 'uno', 'web');
    clock = 61 * MINUTE;
    await outbox.sendMessage('web:s2', 'dos', 'web');

    expect(outbox.pending('web:s1')).toBe(0);
    expect(outbox.pending('web:s2')).toBe(2);
  });

  it('should count a new reply as activity for its session', async () => {
    await outbox.sendMessage('web:s1', 'uno', 'web');
    await outbox.sendMessage('web:s2', 'uno', 'web');
    clock = 50 * MINUTE;
    await outbox.sendMessage('web:s1', 'dos', 'web');
    clock = 70 * MINUTE;
    await outbox.sendMessage('web:s3', 'uno', 'web');

    expect(outbox.pending('web:s1')).toBe(2);
    expect(outbox.pending('web:s2')).toBe(0);
  });
});

import type { Redis } from 'ioredis';
import { parseDueCacheEntry, RedisDueCacheRepository } from '../RedisDueCacheRepository';

type ExecResult = Array<[Error | null, unknown]>;

type PipelineMock = {
  set: (key: string, value: string, mode: 'EX', ttl: number) => PipelineMock;
  sadd: (key: string, member: string) => PipelineMock;
  expire: (key: string, ttl: number) => PipelineMock;
  exec: () => Promise<ExecResult | null>;
};

function buildRedisMock() {
  const values = new Map<string, string>();
  const sets = new Map<string, Set<string>>();
  const expiries = new Map<string, number>();

  const commands = {
    get: jest.fn(async (key: string) => values.get(key) ?? null),
    set: jest.fn(async (key: string, value: string, _mode: 'EX', ttl: number) => {
      values.set(key, value);
      expiries.set(key, ttl);
      return 'OK';
    }),
    del: jest.fn(async (...keys: string[]) =>
      keys.filter((key) => values.delete(key) || sets.delete(key)).length,
    ),
    sadd: jest.fn(async (key: string, member: string) => {
      const members = sets.get(key) ?? new Set<string>();
      const added = members.has(member) ? 0 : 1;
      members.add(member);
      sets.set(key, members);
      return added;
    }),
    expire: jest.fn(async (key: string, ttl: number) => {
      expiries.set(key, ttl);
      return 1;
    }),
    smembers: jest.fn(async (key: string) => Array.from(sets.get(key) ?? [])),
  };

  const multi = jest.fn((): PipelineMock => {
    const queued: Array<() => Promise<unknown>> = [];
    const pipeline: PipelineMock = {
      set: (key, value, mode, ttl) => {
        queued.push(() => commands.set(key, value, mode, ttl));
        return pipeline;
      },
      sadd: (key, member) => {
        queued.push(() => commands.sadd(key, member));
        return pipeline;
      },
      expire: (key, ttl) => {
        queued.push(() => commands.expire(key, ttl));
        return pipeline;
      },
      exec: async () => {
        const results: ExecResult = [];
        for (const command of queued) {
          try {
            results.push([null, await command()]);
          } catch (error) {
            results.push([error instanceof Error ? error : new Error(String(error)), null]);
          }
        }
        return results;
      },
    };
    return pipeline;
  });

  const redis = { ...commands, multi };

  return { redis, client: redis as unknown as Redis, values, sets, expiries };
}

describe('RedisDueCacheRepository', () => {
  it('stores an entry and tracks its key in one transaction', async () => {
    const harness = buildRedisMock();
    const repository = new RedisDueCacheRepository(harness.client);
    const entry = { nextOccurrence: '2025-03-10T21:00:00.000Z', description: 'Take 500mg of Paracetamol', stepId: 'step-1' };

    await repository.setTracked('schedule:note-1:patient-1', entry, 'schedule:note-1:keys', 86400);
    await repository.setTracked('schedule:note-1:patient-1', entry, 'schedule:note-1:keys', 86400);

    expect(harness.redis.multi).toHaveBeenCalledTimes(2);
    expect(harness.redis.set).toHaveBeenCalledWith('schedule:note-1:patient-1', JSON.stringify(entry), 'EX', 86400);
    expect(harness.redis.sadd).toHaveBeenCalledWith('schedule:note-1:keys', 'schedule:note-1:patient-1');
    expect(harness.expiries.get('schedule:note-1:patient-1')).toBe(86400);
    expect(harness.expiries.get('schedule:note-1:keys')).toBe(86400);
    await expect(repository.get('schedule:note-1:patient-1')).resolves.toEqual(entry);
    await expect(repository.get('schedule:note-2:patient-1')).resolves.toBeNull();
    await expect(repository.listTrackedKeys('schedule:note-1:keys')).resolves.toEqual(['schedule:note-1:patient-1']);
  });

  it('fails the write when a queued command fails', async () => {
    const harness = buildRedisMock();
    const repository = new RedisDueCacheRepository(harness.client);
    harness.redis.sadd.mockRejectedValueOnce(new Error('WRONGTYPE Operation against a key holding the wrong kind of value'));

    await expect(
      repository.setTracked(
        'schedule:note-1:patient-1',
        { nextOccurrence: '2025-03-10T21:00:00.000Z', description: 'Walk', stepId: null },
        'schedule:note-1:keys',
        86400,
      ),
    ).rejects.toThrow('WRONGTYPE Operation against a key holding the wrong kind of value');
  });

  it('fails the write when the transaction is aborted', async () => {
    const harness = buildRedisMock();
    const repository = new RedisDueCacheRepository(harness.client);
    const aborted: PipelineMock = {
      set: () => aborted,
      sadd: () => aborted,
      expire: () => aborted,
      exec: async () => null,
    };
    harness.redis.multi.mockReturnValueOnce(aborted);

    await expect(
      repository.setTracked(
        'schedule:note-1:patient-1',
        { nextOccurrence: '2025-03-10T21:00:00.000Z', description: 'Walk', stepId: null },
        'schedule:note-1:keys',
        86400,
      ),
    ).rejects.toThrow('Redis transaction for schedule:note-1:patient-1 was aborted');
  });

  it('deletes keys and skips the round trip for an empty list', async () => {
    const harness = buildRedisMock();
    const repository = new RedisDueCacheRepository(harness.client);
    harness.values.set('schedule:note-1:patient-1', '{}');

    await expect(repository.deleteMany([])).resolves.toBe(0);
    expect(harness.redis.del).not.toHaveBeenCalled();

    await expect(repository.deleteMany(['schedule:note-1:patient-1', 'schedule:note-1:missing'])).resolves.toBe(1);
    await repository.delete('schedule:note-1:patient-1');
    expect(harness.redis.del).toHaveBeenLastCalledWith('schedule:note-1:patient-1');
  });

  describe('parseDueCacheEntry', () => {
    it('rejects values that are not a due entry', () => {
      expect(parseDueCacheEntry(null)).toBeNull();
      expect(parseDueCacheEntry('not json')).toBeNull();
      expect(parseDueCacheEntry('[1,2]')).toBeNull();
      expect(parseDueCacheEntry(JSON.stringify({ nextOccurrence: 'tomorrow' }))).toBeNull();
    });

    it('fills in missing optional fields', () => {
      expect(parseDueCacheEntry(JSON.stringify({ nextOccurrence: '2025-03-10T21:00:00.000Z' }))).toEqual({
        nextOccurrence: '2025-03-10T21:00:00.000Z',
        description: '',
        stepId: null,
      });
    });
  });
});

import type { Redis } from 'ioredis';
import type { DueCacheEntry, DueCacheRepository } from './DueCacheRepository';

export function parseDueCacheEntry(raw: string | null): DueCacheEntry | null {
  if (raw == null || raw === '') return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      return null;
    }

    const nextOccurrence = 'nextOccurrence' in parsed ? parsed.nextOccurrence : undefined;
    if (typeof nextOccurrence !== 'string' || Number.isNaN(Date.parse(nextOccurrence))) {
      return null;
    }

    const description = 'description' in parsed ? parsed.description : undefined;
    const stepId = 'stepId' in parsed ? parsed.stepId : undefined;
    return {
      nextOccurrence,
      description: typeof description === 'string' ? description : '',
      stepId: typeof stepId === 'string' ? stepId : null,
    };
  } catch {
    return null;
  }
}

export class RedisDueCacheRepository implements DueCacheRepository {
  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<DueCacheEntry | null> {
    return parseDueCacheEntry(await this.redis.get(key));
  }

  async setTracked(key: string, entry: DueCacheEntry, listKey: string, ttlSeconds: number): Promise<void> {
    const results = await this.redis
      .multi()
      .set(key, JSON.stringify(entry), 'EX', ttlSeconds)
      .sadd(listKey, key)
      .expire(listKey, ttlSeconds)
      .exec();

    if (!results) {
      throw new Error(`Redis transaction for ${key} was aborted`);
    }

    const failed = results.find(([error]) => error);
    if (failed?.[0]) {
      throw failed[0];
    }
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async deleteMany(keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }

    return this.redis.del(...keys);
  }

  async listTrackedKeys(listKey: string): Promise<string[]> {
    return this.redis.smembers(listKey);
  }
}

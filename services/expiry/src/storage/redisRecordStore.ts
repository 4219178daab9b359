import type Redis from 'ioredis';
import { isEmptyWrite } from '../codec/expiry';
import { ConflictError, TransportError } from '../errors';
import { decodeParticle, encodeParticle } from '../redis/particle';
import type { MutationFn, RecordStore } from '../contracts/recordStore';
import type { RecordFields, RecordKey, RecordSetId } from '../types';

/** Hash field holding the record generation used for optimistic commits. */
export const GENERATION_FIELD = '!gen';

/** Counter key, under the store prefix, that every generation is drawn from. */
export const SEQUENCE_KEY = '!seq';

/**
 * Commits a record write only when the generation is unchanged, then stamps a new one.
 * Generations come from one shared counter, so a record deleted and created again never
 * reuses a generation an earlier reader saw.
 * KEYS[1] record, KEYS[2] counter; ARGV: generation field, expected generation, JSON sets, JSON removes.
 * Returns 1 when committed, 0 on a generation mismatch.
 */
export const COMMIT_SCRIPT = `
local current = redis.call('HGET', KEYS[1], ARGV[1]) or '0'
if current ~= ARGV[2] then return 0 end
local sets = cjson.decode(ARGV[3])
local removes = cjson.decode(ARGV[4])
for _, field in ipairs(removes) do redis.call('HDEL', KEYS[1], field) end
for field, value in pairs(sets) do redis.call('HSET', KEYS[1], field, value) end
if redis.call('HLEN', KEYS[1]) - redis.call('HEXISTS', KEYS[1], ARGV[1]) == 0 then
  redis.call('DEL', KEYS[1])
  return 1
end
redis.call('HSET', KEYS[1], ARGV[1], redis.call('INCR', KEYS[2]))
return 1
`;

export interface RedisRecordStoreOptions {
  keyPrefix?: string;
  /** Extra attempts after a lost optimistic commit. */
  maxRetries?: number;
  /** COUNT hint for SCAN. */
  scanCount?: number;
}

/**
 * Records are Redis hashes at `<prefix>:<namespace>:<set>:<key>`. Hash TTLs are never touched,
 * so the whole-record expiration stays under Redis' own semantics.
 */
export class RedisRecordStore implements RecordStore {
  readonly name = 'redis';
  private readonly keyPrefix: string;
  private readonly maxRetries: number;
  private readonly scanCount: number;

  constructor(
    private readonly redis: Redis,
    options: RedisRecordStoreOptions = {},
  ) {
    this.keyPrefix = options.keyPrefix ?? 'eb';
    this.maxRetries = options.maxRetries ?? 16;
    this.scanCount = options.scanCount ?? 100;
  }

  async ping(): Promise<void> {
    try {
      await this.redis.ping();
    } catch (err) {
      throw new TransportError('ping', this.keyPrefix, err);
    }
  }

  async read(key: RecordKey): Promise<RecordFields | null> {
    const redisKey = this.redisKey(key);
    const { fields } = await this.load('read', redisKey);
    return fields;
  }

  async readModifyWrite<T>(key: RecordKey, fn: MutationFn<T>): Promise<T> {
    const redisKey = this.redisKey(key);
    const attempts = this.maxRetries + 1;

    for (let attempt = 0; attempt < attempts; attempt++) {
      const { fields, generation } = await this.load('readModifyWrite', redisKey);
      const mutation = fn(fields);
      if (isEmptyWrite(mutation)) return mutation.result;
      const sets = Object.entries(mutation.set ?? {}).map(([bin, value]) => [bin, encodeParticle(value)]);
      const removes = mutation.remove ?? [];

      let committed: unknown;
      try {
        committed = await this.redis.eval(
          COMMIT_SCRIPT,
          2,
          redisKey,
          this.sequenceKey,
          GENERATION_FIELD,
          generation,
          JSON.stringify(Object.fromEntries(sets)),
          JSON.stringify(removes),
        );
      } catch (err) {
        throw new TransportError('readModifyWrite', redisKey, err);
      }
      if (committed === 1) return mutation.result;
    }

    throw new ConflictError(redisKey, attempts);
  }

  async *scan(recordSet: RecordSetId): AsyncIterable<RecordKey> {
    const prefix = this.setPrefix(recordSet);
    let cursor = '0';
    do {
      let batch: string[];
      try {
        [cursor, batch] = await this.redis.scan(cursor, 'MATCH', `${prefix}*`, 'COUNT', this.scanCount, 'TYPE', 'hash');
      } catch (err) {
        throw new TransportError('scan', prefix, err);
      }
      for (const redisKey of batch) {
        yield { ...recordSet, key: redisKey.slice(prefix.length) };
      }
    } while (cursor !== '0');
  }

  get sequenceKey(): string {
    return `${this.keyPrefix}:${SEQUENCE_KEY}`;
  }

  redisKey(key: RecordKey): string {
    return `${this.setPrefix(key)}${key.key}`;
  }

  private setPrefix(recordSet: RecordSetId): string {
    return `${this.keyPrefix}:${recordSet.namespace}:${recordSet.set}:`;
  }

  private async load(operation: string, redisKey: string) {
    let hash: Record<string, string>;
    try {
      hash = await this.redis.hgetall(redisKey);
    } catch (err) {
      throw new TransportError(operation, redisKey, err);
    }

    const generation = hash[GENERATION_FIELD] ?? '0';
    const fields: RecordFields = {};
    let count = 0;
    for (const [bin, raw] of Object.entries(hash)) {
      if (bin === GENERATION_FIELD) continue;
      fields[bin] = decodeParticle(raw);
      count++;
    }
    return { fields: count > 0 ? fields : null, generation };
  }
}

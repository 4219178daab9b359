import { z } from 'zod';
import { ValidationError } from '../errors';
import { RESERVED_BIN_PREFIX } from '../codec/expiry';
import type { BinName, BinPut, BinTouch, BinTtl, FieldValue, RecordKey } from '../types';
import { fieldValueSchema } from '../values';

const NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export const namespaceSchema = z.string().regex(NAME_PATTERN, 'namespace must match [A-Za-z0-9_.-]+');
export const setNameSchema = z.string().regex(NAME_PATTERN, 'set must match [A-Za-z0-9_.-]+');

export const binNameSchema = z
  .string({ required_error: 'bin name required' })
  .min(1, 'bin name required')
  .refine((bin) => !bin.startsWith(RESERVED_BIN_PREFIX), {
    message: `bin names starting with "${RESERVED_BIN_PREFIX}" are reserved`,
  })
  .refine((bin) => bin !== '__proto__', { message: 'bin name not allowed' });

export const recordKeySchema = z.object({
  namespace: namespaceSchema,
  set: setNameSchema,
  key: z.string().min(1, 'key required'),
});

export function binTtlSchema(maxSeconds: number) {
  return z
    .number({ required_error: 'ttl required', invalid_type_error: 'ttl must be a number' })
    .int('ttl must be an integer')
    .min(-1, 'ttl must be -1, 0 or positive')
    .max(maxSeconds, `ttl must not exceed ${maxSeconds} seconds`);
}

/** Validates input against `schema`, raising `ValidationError` with the zod issues. */
export function validate<T>(schema: z.ZodType<T>, input: unknown, what: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new ValidationError(`invalid ${what}${where}: ${first?.message ?? 'malformed'}`, parsed.error.issues);
  }
  return parsed.data;
}

export class InputValidator {
  private readonly ttl: z.ZodType<BinTtl>;
  private readonly putBatch: z.ZodType<BinPut[]>;
  private readonly touchBatch: z.ZodType<Array<Required<BinTouch>>>;

  constructor(maxTtlSeconds: number) {
    this.ttl = binTtlSchema(maxTtlSeconds);
    this.putBatch = z
      .array(z.object({ bin: binNameSchema, value: fieldValueSchema.optional(), ttl: this.ttl.optional() }))
      .min(1, 'batch must not be empty');
    this.touchBatch = z
      .array(z.object({ bin: binNameSchema, ttl: this.ttl }))
      .min(1, 'batch must not be empty');
  }

  key(key: RecordKey): RecordKey {
    return validate(recordKeySchema, key, 'record key');
  }

  bins(bins: readonly BinName[]): BinName[] {
    return validate(z.array(binNameSchema).min(1, 'at least one bin required'), bins, 'bin list');
  }

  bin(bin: BinName): BinName {
    return validate(binNameSchema, bin, 'bin name');
  }

  binTtl(ttl: BinTtl): BinTtl {
    return validate(this.ttl, ttl, 'ttl');
  }

  value(value: FieldValue): FieldValue {
    return validate(fieldValueSchema, value, 'value');
  }

  puts(entries: readonly BinPut[]): BinPut[] {
    return validate(this.putBatch, entries, 'batch');
  }

  touches(entries: readonly BinTouch[]): Array<Required<BinTouch>> {
    return validate(this.touchBatch, entries, 'touch batch');
  }
}

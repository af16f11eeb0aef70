import { z } from 'zod';
import { InvalidRecord } from './errors.js';
import type {
  ChannelConfig,
  ChannelConfigInput,
  Id,
  IdInput,
  UserOffenses,
  UserOffensesInput,
} from './types.js';

// SQLite INTEGER is a signed 64-bit value.
const MAX_ID = 9223372036854775807n;

const id = z
  .union([z.bigint().nonnegative().max(MAX_ID), z.number().int().nonnegative().safe()])
  .transform((value) => BigInt(value));
const count = z.number().int();
const real = z.number().finite();

const channelConfigSchema = z.object({
  guild_id: id,
  channel_id: id,
  event_expectancy: real,
  event_duration: count,
  event_cooldown: real,
  last_event: count,
  max_offenses: count,
  timeout_duration: count,
  prefixes: z.string(),
});

const userOffensesSchema = z.object({
  guild_id: id,
  channel_id: id,
  user_id: id,
  current_offenses: count,
  total_offenses: count,
  last_offense: count,
});

function parse<S extends z.ZodTypeAny>(kind: string, schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRecord(
      kind,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(record)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function toId(value: IdInput): Id {
  return parse('id', id, value);
}

export function makeChannelConfig(input: ChannelConfigInput): ChannelConfig {
  return Object.freeze(parse('ChannelConfig', channelConfigSchema, input));
}

export function makeUserOffenses(input: UserOffensesInput): UserOffenses {
  return Object.freeze(parse('UserOffenses', userOffensesSchema, input));
}

function isUserOffenses(record: ChannelConfig | UserOffenses): record is UserOffenses {
  return 'user_id' in record;
}

// The only way to "change" a record: a new frozen value, validated again.
export function replaceRecord(record: ChannelConfig, overrides: Partial<ChannelConfigInput>): ChannelConfig;
export function replaceRecord(record: UserOffenses, overrides: Partial<UserOffensesInput>): UserOffenses;
export function replaceRecord(
  record: ChannelConfig | UserOffenses,
  overrides: Partial<ChannelConfigInput> | Partial<UserOffensesInput>,
): ChannelConfig | UserOffenses {
  if (isUserOffenses(record)) {
    return Object.freeze(parse('UserOffenses', userOffensesSchema, { ...record, ...overrides }));
  }
  return Object.freeze(parse('ChannelConfig', channelConfigSchema, { ...record, ...overrides }));
}

export function recordsEqual(a: ChannelConfig, b: ChannelConfig): boolean;
export function recordsEqual(a: UserOffenses, b: UserOffenses): boolean;
export function recordsEqual(
  a: ChannelConfig | UserOffenses,
  b: ChannelConfig | UserOffenses,
): boolean {
  const left = Object.entries(a);
  const right = new Map<string, unknown>(Object.entries(b));
  if (left.length !== right.size) return false;
  return left.every(([key, value]) => right.has(key) && Object.is(value, right.get(key)));
}

export function splitStrings(text: string, delimiter = ','): string[] {
  return text
    .split(delimiter)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function parsePrefixes(config: Pick<ChannelConfig, 'prefixes'>): string[] {
  return config.prefixes
    .split(/[\s,]+/)
    .filter((token) => token.length > 0)
    .map((token) => token.toLowerCase());
}

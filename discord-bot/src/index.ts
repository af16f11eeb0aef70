export { Rules, type RulesCacheInfo } from './rules.js';
export { RulesStore, openStore, type StoreOptions } from './db.js';
export { MemoCache, type CacheInfo, type CacheKey } from './cache.js';
export { InvalidRecord, StorageUnavailable } from './errors.js';
export {
  makeChannelConfig,
  makeUserOffenses,
  parsePrefixes,
  recordsEqual,
  replaceRecord,
  splitStrings,
  toId,
} from './records.js';
export {
  pardonUser,
  recordOffense,
  resetAllOffenses,
  resetChannelOffenses,
  unixNow,
  type OffenseResult,
  type ResetSummary,
} from './offenses.js';
export { eventEndsAt, isCompliant, isEventActive, isOnCooldown, shouldStartEvent, startEvent } from './events.js';
export type {
  ChannelConfig,
  ChannelConfigInput,
  ChannelKey,
  Id,
  IdInput,
  UserKey,
  UserOffenses,
  UserOffensesInput,
} from './types.js';

import { makeUserOffenses, replaceRecord } from './records.js';
import type { Rules } from './rules.js';
import type { ChannelConfig, IdInput, UserKey, UserOffenses } from './types.js';

export type OffenseResult = {
  user: UserOffenses;
  config: ChannelConfig | undefined;
  // The channel has a positive limit and the user is now at or over it.
  limitReached: boolean;
};

export function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

export function recordOffense(rules: Rules, key: UserKey, now = unixNow()): OffenseResult {
  const previous =
    rules.getUser(key.guild_id, key.channel_id, key.user_id) ??
    makeUserOffenses({ ...key, current_offenses: 0, total_offenses: 0, last_offense: 0 });
  const user = replaceRecord(previous, {
    current_offenses: previous.current_offenses + 1,
    total_offenses: previous.total_offenses + 1,
    last_offense: now,
  });
  rules.updateUser(user);

  const config = rules.getConfig(key.guild_id, key.channel_id);
  const limitReached =
    config !== undefined && config.max_offenses > 0 && user.current_offenses >= config.max_offenses;
  return { user, config, limitReached };
}

// total_offenses is never lowered.
export function pardonUser(rules: Rules, key: UserKey): UserOffenses | undefined {
  const user = rules.getUser(key.guild_id, key.channel_id, key.user_id);
  if (!user) return undefined;
  const pardoned = replaceRecord(user, { current_offenses: 0 });
  rules.updateUser(pardoned);
  return pardoned;
}

export function resetChannelOffenses(rules: Rules, guildId: IdInput, channelId: IdInput): number {
  let reset = 0;
  for (const user of rules.getUsers(guildId, channelId)) {
    if (user.current_offenses === 0) continue;
    rules.updateUser(replaceRecord(user, { current_offenses: 0 }));
    reset += 1;
  }
  return reset;
}

export type ResetSummary = {
  channels: number;
  users: number;
};

// Covers every channel with offense rows, configured or not.
export function resetAllOffenses(rules: Rules): ResetSummary {
  const channels = rules.listOffenseChannels();
  let users = 0;
  for (const { guild_id, channel_id } of channels) {
    users += resetChannelOffenses(rules, guild_id, channel_id);
  }
  return { channels: channels.length, users };
}

/** Discord snowflake. Builders also take a safe-integer `number`. */
export type Id = bigint;
export type IdInput = bigint | number;

export type ChannelConfig = Readonly<{
  guild_id: Id;
  channel_id: Id;
  event_expectancy: number; // probability of an event starting, 0..1
  event_duration: number; // hours
  event_cooldown: number; // hours
  last_event: number; // unix seconds
  max_offenses: number;
  timeout_duration: number; // seconds
  prefixes: string; // space or comma separated
}>;

export type UserOffenses = Readonly<{
  guild_id: Id;
  channel_id: Id;
  user_id: Id;
  current_offenses: number;
  total_offenses: number;
  last_offense: number; // unix seconds
}>;

type WithIdInputs<T> = {
  [K in keyof T]: T[K] extends Id ? IdInput : T[K];
};

export type ChannelConfigInput = WithIdInputs<ChannelConfig>;
export type UserOffensesInput = WithIdInputs<UserOffenses>;

export type ChannelKey = Readonly<{
  guild_id: Id;
  channel_id: Id;
}>;

export type UserKey = {
  guild_id: IdInput;
  channel_id: IdInput;
  user_id: IdInput;
};

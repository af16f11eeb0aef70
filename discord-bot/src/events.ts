import { parsePrefixes, replaceRecord } from './records.js';
import type { ChannelConfig } from './types.js';

const HOUR = 60 * 60;

type EventFields = Pick<ChannelConfig, 'last_event' | 'event_duration' | 'event_cooldown'>;

export function eventEndsAt(config: EventFields): number {
  return config.last_event + config.event_duration * HOUR;
}

// last_event = 0 means the channel never had an event.
export function isEventActive(config: EventFields, now: number): boolean {
  return config.last_event > 0 && now >= config.last_event && now < eventEndsAt(config);
}

export function isOnCooldown(config: EventFields, now: number): boolean {
  if (config.last_event === 0) return false;
  const endsAt = eventEndsAt(config);
  return now >= endsAt && now < endsAt + config.event_cooldown * HOUR;
}

// roll: uniform sample in [0, 1)
export function shouldStartEvent(
  config: EventFields & Pick<ChannelConfig, 'event_expectancy'>,
  now: number,
  roll: number = Math.random(),
): boolean {
  if (isEventActive(config, now) || isOnCooldown(config, now)) return false;
  return roll < config.event_expectancy;
}

export function startEvent(config: ChannelConfig, now: number): ChannelConfig {
  return replaceRecord(config, { last_event: now });
}

// No prefixes means no rule.
export function isCompliant(content: string, config: Pick<ChannelConfig, 'prefixes'>): boolean {
  const prefixes = parsePrefixes(config);
  if (prefixes.length === 0) return true;
  const text = content.trimStart().toLowerCase();
  return prefixes.some((prefix) => text.startsWith(prefix));
}

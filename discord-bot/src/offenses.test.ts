import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { pardonUser, recordOffense, resetAllOffenses, resetChannelOffenses } from './offenses.js';
import { makeChannelConfig, makeUserOffenses } from './records.js';
import { Rules } from './rules.js';

const config = (channel_id: number, max_offenses: number) =>
  makeChannelConfig({
    guild_id: 1,
    channel_id,
    event_expectancy: 0.5,
    event_duration: 24,
    event_cooldown: 5,
    last_event: 0,
    max_offenses,
    timeout_duration: 300,
    prefixes: '3pseat',
  });

const offenses = (channel_id: number, user_id: number, current_offenses: number, total_offenses: number) =>
  makeUserOffenses({ guild_id: 1, channel_id, user_id, current_offenses, total_offenses, last_offense: 100 });

describe('offense helpers', () => {
  let dir: string;
  let rules: Rules;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'offenses-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    rules = Rules.open(path.join(dir, 'rules.db'));
  });

  afterEach(() => {
    rules.close();
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('recordOffense starts a record for a new user', () => {
    const result = recordOffense(rules, { guild_id: 1, channel_id: 1, user_id: 5 }, 1000);
    expect(result.user).toEqual({
      guild_id: 1n,
      channel_id: 1n,
      user_id: 5n,
      current_offenses: 1,
      total_offenses: 1,
      last_offense: 1000,
    });
    expect(result.config).toBeUndefined();
    expect(result.limitReached).toBe(false);
    expect(rules.getUser(1, 1, 5)).toEqual(result.user);
  });

  it('recordOffense flags the channel limit', () => {
    rules.updateConfig(config(1, 2));
    const key = { guild_id: 1, channel_id: 1, user_id: 5 };

    expect(recordOffense(rules, key, 1000).limitReached).toBe(false);
    const second = recordOffense(rules, key, 1010);
    expect(second.limitReached).toBe(true);
    expect(second.user.current_offenses).toBe(2);
    expect(second.user.last_offense).toBe(1010);
  });

  it('a zero limit never triggers', () => {
    rules.updateConfig(config(1, 0));
    const key = { guild_id: 1, channel_id: 1, user_id: 5 };
    recordOffense(rules, key, 1000);
    expect(recordOffense(rules, key, 1001).limitReached).toBe(false);
  });

  it('pardonUser clears the current count and keeps the total', () => {
    rules.updateUser(offenses(1, 5, 3, 7));
    expect(pardonUser(rules, { guild_id: 1, channel_id: 1, user_id: 5 })).toEqual(offenses(1, 5, 0, 7));
    expect(rules.getUser(1, 1, 5)?.current_offenses).toBe(0);
    expect(pardonUser(rules, { guild_id: 1, channel_id: 1, user_id: 6 })).toBeUndefined();
  });

  it('resetChannelOffenses touches only users with offenses in that channel', () => {
    rules.updateUser(offenses(1, 1, 2, 2));
    rules.updateUser(offenses(1, 2, 0, 4));
    rules.updateUser(offenses(1, 3, 1, 9));
    rules.updateUser(offenses(2, 1, 5, 5));

    expect(resetChannelOffenses(rules, 1, 1)).toBe(2);
    expect(rules.getUsers(1, 1).map((u) => u.current_offenses)).toEqual([0, 0, 0]);
    expect(rules.getUser(1, 1, 3)?.total_offenses).toBe(9);
    expect(rules.getUser(1, 2, 1)?.current_offenses).toBe(5);
  });

  it('resetAllOffenses covers every channel with offenses, configured or not', () => {
    rules.updateConfig(config(1, 3));
    rules.updateConfig(config(2, 3));
    rules.updateConfig(config(4, 3));
    rules.updateUser(offenses(1, 1, 2, 2));
    rules.updateUser(offenses(2, 1, 1, 1));
    rules.updateUser(offenses(2, 2, 4, 4));
    rules.updateUser(offenses(3, 1, 6, 6));

    expect(resetAllOffenses(rules)).toEqual({ channels: 3, users: 4 });
    expect(rules.getUser(1, 2, 2)).toEqual(offenses(2, 2, 0, 4));
    expect(rules.getUser(1, 3, 1)).toEqual(offenses(3, 1, 0, 6));
    expect(resetAllOffenses(rules)).toEqual({ channels: 3, users: 0 });
  });

  it('repeated read-modify-write keeps every increment', () => {
    const key = { guild_id: 1, channel_id: 1, user_id: 5 };
    for (let i = 0; i < 10; i += 1) {
      recordOffense(rules, key, 1000 + i);
    }
    expect(rules.getUser(1, 1, 5)).toEqual(
      makeUserOffenses({ ...key, current_offenses: 10, total_offenses: 10, last_offense: 1009 }),
    );
  });
});

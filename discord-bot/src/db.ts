import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { StorageUnavailable } from './errors.js';
import { makeChannelConfig, makeUserOffenses } from './records.js';
import type { ChannelConfig, ChannelKey, IdInput, UserOffenses } from './types.js';

// How long a connection waits on another writer's lock before giving up.
const DEFAULT_BUSY_TIMEOUT_MS = 5000;

export type StoreOptions = {
  busyTimeoutMs?: number;
};

const SCHEMA = `
  PRAGMA journal_mode = WAL;
  CREATE TABLE IF NOT EXISTS channel_configs (
    guild_id INTEGER NOT NULL,
    channel_id INTEGER NOT NULL,
    event_expectancy REAL NOT NULL,
    event_duration INTEGER NOT NULL,
    event_cooldown REAL NOT NULL,
    last_event INTEGER NOT NULL,
    max_offenses INTEGER NOT NULL,
    timeout_duration INTEGER NOT NULL,
    prefixes TEXT NOT NULL,
    PRIMARY KEY (guild_id, channel_id)
  );

  CREATE TABLE IF NOT EXISTS user_offenses (
    guild_id INTEGER NOT NULL,
    channel_id INTEGER NOT NULL,
    user_id INTEGER NOT NULL,
    current_offenses INTEGER NOT NULL,
    total_offenses INTEGER NOT NULL,
    last_offense INTEGER NOT NULL,
    PRIMARY KEY (guild_id, channel_id, user_id)
  );
`;

// Connections run in safe-integers mode, so every INTEGER column comes back as a bigint.
type ChannelConfigRow = {
  guild_id: bigint;
  channel_id: bigint;
  event_expectancy: number;
  event_duration: bigint;
  event_cooldown: number;
  last_event: bigint;
  max_offenses: bigint;
  timeout_duration: bigint;
  prefixes: string;
};

type UserOffensesRow = {
  guild_id: bigint;
  channel_id: bigint;
  user_id: bigint;
  current_offenses: bigint;
  total_offenses: bigint;
  last_offense: bigint;
};

function configFromRow(row: ChannelConfigRow): ChannelConfig {
  return makeChannelConfig({
    ...row,
    event_duration: Number(row.event_duration),
    last_event: Number(row.last_event),
    max_offenses: Number(row.max_offenses),
    timeout_duration: Number(row.timeout_duration),
  });
}

function userFromRow(row: UserOffensesRow): UserOffenses {
  return makeUserOffenses({
    ...row,
    current_offenses: Number(row.current_offenses),
    total_offenses: Number(row.total_offenses),
    last_offense: Number(row.last_offense),
  });
}

// Holds only the path; every operation gets its own connection, closed before it returns.
export class RulesStore {
  readonly path: string;
  readonly busyTimeoutMs: number;

  private constructor(dbPath: string, busyTimeoutMs: number) {
    this.path = dbPath;
    this.busyTimeoutMs = busyTimeoutMs;
  }

  static open(dbPath: string, options: StoreOptions = {}): RulesStore {
    if (dbPath === '' || dbPath === ':memory:') {
      throw new StorageUnavailable('Rules DB needs a file path; every operation opens its own connection', dbPath);
    }
    const resolved = path.resolve(dbPath);
    try {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    } catch (err) {
      throw new StorageUnavailable(`Cannot create directory for ${resolved}`, resolved, { cause: err });
    }

    const store = new RulesStore(resolved, options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS);
    store.withConnection(true, (db) => db.exec(SCHEMA));
    console.log(`Using rules DB at ${resolved}`);
    return store;
  }

  connect<T>(fn: (db: Database.Database) => T): T {
    return this.withConnection(false, fn);
  }

  getConfig(guildId: IdInput, channelId: IdInput): ChannelConfig | undefined {
    return this.connect((db) => {
      const row = db
        .prepare('SELECT * FROM channel_configs WHERE guild_id = ? AND channel_id = ?')
        .get(guildId, channelId) as ChannelConfigRow | undefined;
      return row ? configFromRow(row) : undefined;
    });
  }

  putConfig(config: ChannelConfig): void {
    this.connect((db) => {
      const remove = db.prepare('DELETE FROM channel_configs WHERE guild_id = ? AND channel_id = ?');
      const insert = db.prepare(
        `INSERT INTO channel_configs (guild_id, channel_id, event_expectancy, event_duration, event_cooldown, last_event, max_offenses, timeout_duration, prefixes)
         VALUES (@guild_id, @channel_id, @event_expectancy, @event_duration, @event_cooldown, @last_event, @max_offenses, @timeout_duration, @prefixes)`
      );
      db.transaction((record: ChannelConfig) => {
        remove.run(record.guild_id, record.channel_id);
        insert.run(record);
      }).immediate(config);
    });
  }

  getUser(guildId: IdInput, channelId: IdInput, userId: IdInput): UserOffenses | undefined {
    return this.connect((db) => {
      const row = db
        .prepare('SELECT * FROM user_offenses WHERE guild_id = ? AND channel_id = ? AND user_id = ?')
        .get(guildId, channelId, userId) as UserOffensesRow | undefined;
      return row ? userFromRow(row) : undefined;
    });
  }

  putUser(user: UserOffenses): void {
    this.connect((db) => {
      const remove = db.prepare('DELETE FROM user_offenses WHERE guild_id = ? AND channel_id = ? AND user_id = ?');
      const insert = db.prepare(
        `INSERT INTO user_offenses (guild_id, channel_id, user_id, current_offenses, total_offenses, last_offense)
         VALUES (@guild_id, @channel_id, @user_id, @current_offenses, @total_offenses, @last_offense)`
      );
      db.transaction((record: UserOffenses) => {
        remove.run(record.guild_id, record.channel_id, record.user_id);
        insert.run(record);
      }).immediate(user);
    });
  }

  listUsers(guildId: IdInput, channelId: IdInput): readonly UserOffenses[] {
    return this.connect((db) => {
      const rows = db
        .prepare('SELECT * FROM user_offenses WHERE guild_id = ? AND channel_id = ?')
        .all(guildId, channelId) as UserOffensesRow[];
      return rows.map(userFromRow);
    });
  }

  listOffenseChannels(): readonly ChannelKey[] {
    return this.connect((db) => {
      const rows = db
        .prepare('SELECT DISTINCT guild_id, channel_id FROM user_offenses')
        .all() as { guild_id: bigint; channel_id: bigint }[];
      return rows.map(({ guild_id, channel_id }) => Object.freeze({ guild_id, channel_id }));
    });
  }

  private openConnection(create: boolean): Database.Database {
    try {
      return new Database(this.path, { fileMustExist: !create, timeout: this.busyTimeoutMs });
    } catch (err) {
      throw new StorageUnavailable(`Cannot open rules DB at ${this.path}`, this.path, { cause: err });
    }
  }

  private withConnection<T>(create: boolean, fn: (db: Database.Database) => T): T {
    const db = this.openConnection(create);
    try {
      db.defaultSafeIntegers(true);
      return fn(db);
    } catch (err) {
      if (err instanceof Database.SqliteError) {
        throw new StorageUnavailable(`Rules DB operation failed: ${err.message}`, this.path, { cause: err });
      }
      throw err;
    } finally {
      db.close();
    }
  }
}

export function openStore(dbPath: string, options?: StoreOptions): RulesStore {
  return RulesStore.open(dbPath, options);
}

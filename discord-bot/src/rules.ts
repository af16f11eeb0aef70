import { MemoCache, type CacheInfo } from './cache.js';
import { RulesStore, type StoreOptions } from './db.js';
import { makeChannelConfig, makeUserOffenses, toId } from './records.js';
import type {
  ChannelConfig,
  ChannelConfigInput,
  ChannelKey,
  Id,
  IdInput,
  UserOffenses,
  UserOffensesInput,
} from './types.js';

export type RulesCacheInfo = {
  config: CacheInfo;
  user: CacheInfo;
  users: CacheInfo;
};

export class Rules {
  readonly store: RulesStore;
  private readonly configs = new MemoCache<[Id, Id], ChannelConfig | undefined>('config');
  private readonly users = new MemoCache<[Id, Id, Id], UserOffenses | undefined>('user');
  private readonly channelUsers = new MemoCache<[Id, Id], readonly UserOffenses[]>('users');

  constructor(store: RulesStore) {
    this.store = store;
  }

  static open(dbPath: string, options?: StoreOptions): Rules {
    return new Rules(RulesStore.open(dbPath, options));
  }

  updateConfig(input: ChannelConfigInput): void {
    const config = makeChannelConfig(input);
    this.store.putConfig(config);
    this.configs.invalidate([config.guild_id, config.channel_id]);
  }

  getConfig(guildId: IdInput, channelId: IdInput): ChannelConfig | undefined {
    const key: [Id, Id] = [toId(guildId), toId(channelId)];
    return this.configs.get(key, () => this.store.getConfig(...key));
  }

  // Uncached: every (guild, channel) pair that has offense rows.
  listOffenseChannels(): readonly ChannelKey[] {
    return this.store.listOffenseChannels();
  }

  updateUser(input: UserOffensesInput): void {
    const user = makeUserOffenses(input);
    this.store.putUser(user);
    this.users.invalidate([user.guild_id, user.channel_id, user.user_id]);
    this.channelUsers.invalidate([user.guild_id, user.channel_id]);
  }

  getUser(guildId: IdInput, channelId: IdInput, userId: IdInput): UserOffenses | undefined {
    const key: [Id, Id, Id] = [toId(guildId), toId(channelId), toId(userId)];
    return this.users.get(key, () => this.store.getUser(...key));
  }

  getUsers(guildId: IdInput, channelId: IdInput): readonly UserOffenses[] {
    const key: [Id, Id] = [toId(guildId), toId(channelId)];
    return this.channelUsers.get(key, () => Object.freeze(this.store.listUsers(...key)));
  }

  cacheInfo(): RulesCacheInfo {
    return {
      config: this.configs.info(),
      user: this.users.info(),
      users: this.channelUsers.info(),
    };
  }

  clearCaches(): void {
    this.configs.clear();
    this.users.clear();
    this.channelUsers.clear();
  }

  close(): void {
    this.clearCaches();
  }
}

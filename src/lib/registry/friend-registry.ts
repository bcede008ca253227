/**
 * Friend Registry - durable map of the peers this node has added as friends
 *
 * Entries are kept in memory and mirrored to one JSON file per friend, so
 * the friend list survives restarts. The registry is also the address book
 * the peer client resolves peer IDs through.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import * as crypto from 'crypto';
import Debug from 'debug';
import { z } from 'zod';
import type { AddressBook, IPeerClient, Logger } from '../../interfaces';
import { ConnectionDescriptor, createDescriptor } from '../connection/descriptor';
import { FormatError, NotFoundError, WriteError, errorMessage } from '../errors';
import { Mutex } from '../utils/mutex';
import { DEFAULT_ONLINE_THRESHOLD, FriendStatus } from '../../types/constants';
import type { Friend, FriendRecord } from '../../types/common';

const debug = Debug('mediapeer:friend-registry');

const storedFriendSchema = z.object({
  peerId: z.string().min(1),
  peerName: z.string(),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  addedAt: z.number(),
  lastSeen: z.number().optional()
});

export interface FriendRegistryOptions {
  registryDir: string;
  selfPeerId: string;
  client: Pick<IPeerClient, 'fetchInfo'>;
  onlineThresholdMs?: number;
  now?: () => number;
  logger?: Logger;
}

export class FriendRegistry implements AddressBook {
  private registryDir: string;
  private selfPeerId: string;
  private client: Pick<IPeerClient, 'fetchInfo'>;
  private onlineThreshold: number;
  private now: () => number;
  private logger: Logger;
  private friends: Map<string, FriendRecord> = new Map();
  private lock = new Mutex();
  private saveQueue: Promise<void> = Promise.resolve();
  private initializing?: Promise<void>;

  constructor(options: FriendRegistryOptions) {
    this.registryDir = options.registryDir;
    this.selfPeerId = options.selfPeerId;
    this.client = options.client;
    this.onlineThreshold = options.onlineThresholdMs ?? DEFAULT_ONLINE_THRESHOLD;
    this.now = options.now || Date.now;
    this.logger = options.logger || {
      debug: (): void => {},
      info: (): void => {},
      warn: (message: string, ...args: unknown[]): void => console.warn(message, ...args),
      error: (message: string, ...args: unknown[]): void => console.error(message, ...args)
    };
  }

  /**
   * Create the registry directory and load stored friends. Safe to call
   * more than once.
   */
  initialize(): Promise<void> {
    if (!this.initializing) {
      this.initializing = this.loadRegistry().catch((err: unknown) => {
        this.initializing = undefined;
        throw err;
      });
    }
    return this.initializing;
  }

  private async loadRegistry(): Promise<void> {
    await fs.ensureDir(this.registryDir);
    const files = await fs.readdir(this.registryDir);
    const loaded: FriendRecord[] = [];

    for (const file of files) {
      if (!file.endsWith('.json')) continue;

      try {
        const data = await fs.readJson(path.join(this.registryDir, file));
        const parsed = storedFriendSchema.safeParse(data);
        if (!parsed.success) {
          this.logger.warn(`Skipping malformed friend file ${file}`);
          continue;
        }
        loaded.push(parsed.data);
      } catch (err) {
        this.logger.warn(`Error loading friend file ${file}: ${errorMessage(err)}`);
      }
    }

    await this.lock.runExclusive(() => {
      for (const record of loaded) {
        this.friends.set(record.peerId, record);
      }
    });

    debug(`Loaded ${loaded.length} friends from ${this.registryDir}`);
  }

  /**
   * Add or refresh a friend. The remote node is asked for its identity
   * first; nothing is stored when it cannot be reached.
   * @param descriptor Address and claimed peer ID
   * @param peerName Name used when the remote reports none
   */
  async add(descriptor: ConnectionDescriptor, peerName = ''): Promise<Friend> {
    await this.initialize();

    if (descriptor.peerId === this.selfPeerId) {
      throw new FormatError('A node cannot add itself as a friend');
    }

    const info = await this.client.fetchInfo(descriptor);
    if (info.peerId !== descriptor.peerId) {
      this.logger.warn(
        `Peer at ${descriptor.host}:${descriptor.port} identifies as ${info.peerId}, not ${descriptor.peerId}; using the reported ID`
      );
    }
    if (info.peerId === this.selfPeerId) {
      throw new FormatError(`${descriptor.host}:${descriptor.port} is this node`);
    }

    const seenAt = this.now();
    const record = await this.lock.runExclusive(() => {
      const existing = this.friends.get(info.peerId);
      const next: FriendRecord = {
        peerId: info.peerId,
        peerName: info.peerName || peerName.trim() || existing?.peerName || info.peerId,
        host: descriptor.host,
        port: descriptor.port,
        addedAt: existing ? existing.addedAt : seenAt,
        lastSeen: Math.max(existing?.lastSeen ?? seenAt, seenAt)
      };
      this.friends.set(next.peerId, next);
      return next;
    });

    await this.persist(record.peerId);
    this.logger.info(`Friend ${record.peerName} (${record.peerId}) saved at ${record.host}:${record.port}`);
    return this.toFriend(record, this.now());
  }

  /**
   * Remove a friend
   * @throws NotFoundError when the peer is not a friend
   */
  async remove(peerId: string): Promise<void> {
    await this.initialize();

    const removed = await this.lock.runExclusive(() => this.friends.delete(peerId));
    if (!removed) {
      throw new NotFoundError(`Friend ${peerId} not found`);
    }

    await this.persist(peerId);
    this.logger.info(`Friend ${peerId} removed`);
  }

  /**
   * All friends, oldest first
   */
  async list(): Promise<Friend[]> {
    await this.initialize();

    const records = await this.lock.runExclusive(() => Array.from(this.friends.values()));
    const now = this.now();
    return records
      .sort((a, b) => a.addedAt - b.addedAt || a.peerId.localeCompare(b.peerId))
      .map(record => this.toFriend(record, now));
  }

  /**
   * @throws NotFoundError when the peer is not a friend
   */
  async get(peerId: string): Promise<Friend> {
    await this.initialize();

    const record = await this.lock.runExclusive(() => this.friends.get(peerId));
    if (!record) {
      throw new NotFoundError(`Friend ${peerId} not found`);
    }
    return this.toFriend(record, this.now());
  }

  /**
   * Record a successful contact. Unknown peers are ignored and lastSeen
   * never moves backwards.
   * @returns Whether a friend record was updated
   */
  async markSeen(peerId: string, when: number): Promise<boolean> {
    await this.initialize();

    const updated = await this.lock.runExclusive(() => {
      const existing = this.friends.get(peerId);
      if (!existing) return false;
      if (existing.lastSeen !== undefined && existing.lastSeen >= when) return false;
      this.friends.set(peerId, { ...existing, lastSeen: when });
      return true;
    });

    if (updated) {
      await this.persist(peerId);
      debug(`Marked ${peerId} seen at ${new Date(when).toISOString()}`);
    }
    return updated;
  }

  async resolve(peerId: string): Promise<ConnectionDescriptor> {
    const friend = await this.get(peerId);
    return createDescriptor(friend.host, friend.port, friend.peerId);
  }

  /**
   * Online status of a friend record at a point in time
   */
  status(record: FriendRecord, at: number = this.now()): FriendStatus {
    if (record.lastSeen === undefined) return FriendStatus.UNKNOWN;
    return at - record.lastSeen < this.onlineThreshold ? FriendStatus.ONLINE : FriendStatus.OFFLINE;
  }

  private toFriend(record: FriendRecord, at: number): Friend {
    const status = this.status(record, at);
    return { ...record, isOnline: status === FriendStatus.ONLINE, status };
  }

  /**
   * Queue a write of the current in-memory state of one friend. Writes run
   * one at a time, outside the lock.
   */
  private persist(peerId: string): Promise<void> {
    const write = this.saveQueue.then(() => this.writeEntry(peerId));
    this.saveQueue = write.catch((err: unknown) => {
      debug(`Save of ${peerId} failed: ${errorMessage(err)}`);
    });
    return write;
  }

  private async writeEntry(peerId: string): Promise<void> {
    const filePath = path.join(this.registryDir, `${this.getSafeFileName(peerId)}.json`);
    const record = this.friends.get(peerId);

    try {
      if (record) {
        await fs.outputFile(filePath, JSON.stringify(record, null, 2), 'utf8');
      } else {
        await fs.remove(filePath);
      }
    } catch (err) {
      throw new WriteError(`Failed to persist friend ${peerId}: ${errorMessage(err)}`, { cause: err });
    }
  }

  /**
   * Convert a peer ID to a safe filename
   */
  private getSafeFileName(peerId: string): string {
    if (peerId.length > 64 || /[<>:"/\\|?*\x00-\x1F]/.test(peerId)) {
      return crypto.createHash('md5').update(peerId).digest('hex');
    }
    return peerId;
  }
}

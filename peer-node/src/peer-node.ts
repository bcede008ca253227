import { EventEmitter } from 'events';
import * as path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { PeerClient } from '../../src/client';
import { NodeHost } from '../../src/host';
import { formatConnectionString, createDescriptor } from '../../src/lib/connection/descriptor';
import { errorMessage } from '../../src/lib/errors';
import { DownloadCache } from '../../src/lib/gallery/download-cache';
import { MediaLibrary } from '../../src/lib/gallery/media-library';
import { FriendRegistry } from '../../src/lib/registry';
import { ContentSyncEngine } from '../../src/lib/sync/content-sync-engine';
import { PathManager } from '../../src/lib/utils/paths';
import type { NodeIdentity } from '../../src/types/common';
import { loadIdentity } from './identity';
import { Logger } from './logger';
import type { NodeConfig } from './types';

export interface PeerNodeOptions {
  quiet?: boolean; // No spinners, for tests and services
}

/**
 * One running node: media library, friend registry, peer client, sync
 * engine and the HTTP host, wired together.
 */
export class PeerNode extends EventEmitter {
  private config: NodeConfig;
  private logger: Logger;
  private quiet: boolean;
  private library?: MediaLibrary;
  private host?: NodeHost;
  private identity?: NodeIdentity;
  private isRunning: boolean = false;

  constructor(config: NodeConfig, options: PeerNodeOptions = {}) {
    super();
    this.config = config;
    this.quiet = options.quiet ?? false;
    this.logger = new Logger({
      level: config.logLevel,
      logToFile: config.logToFile,
      logFilePath: config.logFilePath || path.join(config.dataDirectory, 'mediapeer.log'),
      maxLogSize: config.maxLogSize,
      keepOldLogs: config.keepOldLogs
    });
  }

  public async start(): Promise<NodeIdentity> {
    if (this.isRunning) {
      throw new Error('Node is already running');
    }

    const spinner = ora({ text: 'Starting node...', isSilent: this.quiet }).start();

    try {
      const identity = await loadIdentity(this.config);
      const paths = new PathManager(this.config.mediaDirectory, this.config.cacheDirectory);

      spinner.text = 'Scanning media...';
      const library = new MediaLibrary(paths, this.logger);
      await library.initialize({ watch: this.config.watchMedia });
      this.library = library;
      const folder = await library.describe();
      spinner.succeed(`Found ${folder.files.length} media files in ${folder.path}`);

      spinner.start('Loading friends...');
      const client = new PeerClient({ requestTimeoutMs: this.config.requestTimeout, logger: this.logger });
      const registry = new FriendRegistry({
        registryDir: path.join(this.config.dataDirectory, 'friends'),
        selfPeerId: identity.peerId,
        client,
        onlineThresholdMs: this.config.onlineThreshold,
        logger: this.logger
      });
      await registry.initialize();
      client.useAddressBook(registry);
      client.on('contact', (peerId: string, at: number) => {
        registry.markSeen(peerId, at).catch((error: unknown) => {
          this.logger.warn(`Could not record contact with ${peerId}: ${errorMessage(error)}`);
        });
      });
      const friends = await registry.list();
      spinner.succeed(`Loaded ${friends.length} friends`);

      const cache = new DownloadCache(paths);
      const engine = new ContentSyncEngine({
        client,
        friends: registry,
        cache,
        concurrency: this.config.syncConcurrency,
        retries: this.config.syncRetries,
        logger: this.logger
      });

      spinner.start('Starting HTTP server...');
      this.host = new NodeHost({
        identity,
        bindAddress: this.config.bindAddress,
        library,
        registry,
        client,
        cache,
        engine,
        logger: this.logger
      });
      this.identity = await this.host.start();
      spinner.succeed(`Listening on ${this.config.bindAddress}:${this.identity.port}`);

      this.isRunning = true;
      if (!this.quiet) {
        console.log(chalk.green(`✅ Node ${this.identity.name} is running`));
        console.log(`   Connection string: ${chalk.cyan(this.connectionString())}`);
      }
      this.emit('started', this.identity);
      return this.identity;
    } catch (error) {
      spinner.fail(`Failed to start node: ${errorMessage(error)}`);
      await this.shutdown();
      throw error;
    }
  }

  public async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    const spinner = ora({ text: 'Stopping node...', isSilent: this.quiet }).start();
    try {
      await this.shutdown();
      this.isRunning = false;
      spinner.succeed('Node stopped');
      this.emit('stopped');
    } catch (error) {
      spinner.fail(`Error while stopping: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async shutdown(): Promise<void> {
    if (this.host) {
      await this.host.stop();
      this.host = undefined;
    }
    if (this.library) {
      await this.library.stop();
      this.library = undefined;
    }
  }

  /**
   * `<host>:<port>:<peerID>` friends use to add this node
   */
  public connectionString(): string {
    if (!this.identity) {
      throw new Error('Node is not running');
    }
    const { host, port, peerId } = this.identity;
    return formatConnectionString(createDescriptor(host, port, peerId));
  }

  public getIdentity(): NodeIdentity | undefined {
    return this.identity;
  }
}

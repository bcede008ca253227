#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';
import { createDescriptor, formatConnectionString } from '../../src/lib/connection/descriptor';
import { errorMessage } from '../../src/lib/errors';
import { ConfigOverrides, defaultConfig, loadConfig } from './config';
import { loadIdentity } from './identity';
import { PeerNode } from './peer-node';
import type { LogLevel } from './types';

interface NodeFlags {
  config?: string;
  port?: string;
  host?: string;
  bind?: string;
  name?: string;
  mediaDir?: string;
  dataDir?: string;
  cacheDir?: string;
  logLevel?: string;
  watch?: boolean;
}

function parseInteger(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${flag} must be an integer, got "${value}"`);
  }
  return parsed;
}

function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function toOverrides(flags: NodeFlags): ConfigOverrides {
  let logLevel: LogLevel | undefined;
  if (flags.logLevel !== undefined) {
    if (!isLogLevel(flags.logLevel)) {
      throw new Error('--log-level must be one of debug, info, warn, error');
    }
    logLevel = flags.logLevel;
  }
  return {
    port: parseInteger(flags.port, '--port'),
    host: flags.host,
    bindAddress: flags.bind,
    nodeName: flags.name,
    mediaDirectory: flags.mediaDir,
    dataDirectory: flags.dataDir,
    cacheDirectory: flags.cacheDir,
    logLevel,
    watchMedia: flags.watch === false ? false : undefined
  };
}

function withNodeOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to a JSON config file')
    .option('-p, --port <port>', 'Port to listen on')
    .option('--host <host>', 'Address friends use to reach this node')
    .option('--bind <address>', 'Interface to listen on')
    .option('-n, --name <name>', 'Display name of this node')
    .option('--media-dir <path>', 'Media directory shared with friends')
    .option('--data-dir <path>', 'Directory for identity and friends')
    .option('--cache-dir <path>', 'Directory for downloaded content')
    .option('--log-level <level>', 'Log level (debug, info, warn, error)');
}

const program = new Command();

program
  .name('mediapeer')
  .description('Share media galleries and documents with friends, peer to peer')
  .version('1.0.0');

withNodeOptions(program.command('start'))
  .description('Start the node')
  .option('--no-watch', 'Do not watch the media directory for changes')
  .action(async (flags: NodeFlags) => {
    try {
      console.log(chalk.blue('🚀 Starting mediapeer node...'));
      const config = await loadConfig({ configPath: flags.config, overrides: toOverrides(flags) });
      const node = new PeerNode(config);
      await node.start();

      const shutdown = (): void => {
        console.log(chalk.yellow('\n🛑 Shutting down node...'));
        node
          .stop()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            console.error(chalk.red('❌ Error during shutdown:'), errorMessage(error));
            process.exit(1);
          });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (error) {
      console.error(chalk.red('❌ Failed to start node:'), errorMessage(error));
      process.exit(1);
    }
  });

withNodeOptions(program.command('connection-string'))
  .description('Print the connection string friends use to add this node')
  .action(async (flags: NodeFlags) => {
    try {
      const config = await loadConfig({ configPath: flags.config, overrides: toOverrides(flags) });
      const identity = await loadIdentity(config);
      console.log(formatConnectionString(createDescriptor(identity.host, identity.port, identity.peerId)));
    } catch (error) {
      console.error(chalk.red('❌ Failed to read identity:'), errorMessage(error));
      process.exit(1);
    }
  });

program
  .command('config')
  .description('Generate a sample configuration file')
  .option('-o, --output <path>', 'Output path for config file', './mediapeer-config.json')
  .action(async (options: { output: string }) => {
    try {
      const output = path.resolve(options.output);
      await fs.outputJson(output, defaultConfig(), { spaces: 2 });
      console.log(chalk.green(`✅ Sample config written to ${output}`));
      console.log(chalk.yellow(`💡 Start with: mediapeer start --config ${options.output}`));
    } catch (error) {
      console.error(chalk.red('❌ Failed to write config:'), errorMessage(error));
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('❌'), errorMessage(error));
  process.exit(1);
});

/**
 * Node configuration: built-in defaults, then a JSON config file, then
 * command-line flags. The merged result is validated before use.
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { FormatError, errorMessage } from '../../src/lib/errors';
import {
  DEFAULT_NODE_PORT,
  DEFAULT_ONLINE_THRESHOLD,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_SYNC_CONCURRENCY
} from '../../src/types/constants';
import type { NodeConfig } from './types';

export const nodeConfigSchema = z.object({
  port: z.number().int().min(0).max(65535),
  host: z.string().min(1).regex(/^[^:\s]+$/, 'must not contain colons or spaces'),
  bindAddress: z.string().min(1),
  nodeName: z.string().min(1),
  mediaDirectory: z.string().min(1),
  dataDirectory: z.string().min(1),
  cacheDirectory: z.string().min(1),
  watchMedia: z.boolean(),
  requestTimeout: z.number().int().positive(),
  onlineThreshold: z.number().int().positive(),
  syncConcurrency: z.number().int().min(1).max(32),
  syncRetries: z.number().int().min(0).max(10),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  logToFile: z.boolean().optional(),
  logFilePath: z.string().optional(),
  maxLogSize: z.number().int().positive().optional(),
  keepOldLogs: z.number().int().positive().optional()
});

const fileConfigSchema = nodeConfigSchema.partial();

export type ConfigOverrides = Partial<NodeConfig>;

export function defaultConfig(baseDirectory: string = path.join(os.homedir(), '.mediapeer')): NodeConfig {
  return {
    port: DEFAULT_NODE_PORT,
    host: '127.0.0.1',
    bindAddress: '0.0.0.0',
    nodeName: os.hostname() || 'mediapeer-node',
    mediaDirectory: path.join(baseDirectory, 'media'),
    dataDirectory: path.join(baseDirectory, 'data'),
    cacheDirectory: path.join(baseDirectory, 'downloads'),
    watchMedia: true,
    requestTimeout: DEFAULT_REQUEST_TIMEOUT,
    onlineThreshold: DEFAULT_ONLINE_THRESHOLD,
    syncConcurrency: DEFAULT_SYNC_CONCURRENCY,
    syncRetries: 0,
    logLevel: 'info'
  };
}

/**
 * Read and validate a JSON config file. Every field is optional.
 * @throws FormatError when the file is not valid JSON or a field is wrong
 */
export async function readConfigFile(configPath: string): Promise<ConfigOverrides> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(configPath, 'utf8'));
  } catch (err) {
    throw new FormatError(`Cannot read config file ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = fileConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new FormatError(`Invalid config file ${configPath}: ${issues}`);
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
  baseDirectory?: string;
}

/**
 * Merge defaults, the config file (when given) and overrides
 * @throws FormatError when the merged configuration is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<NodeConfig> {
  let config: NodeConfig = defaultConfig(options.baseDirectory);

  if (options.configPath) {
    config = { ...config, ...(await readConfigFile(options.configPath)) };
  }

  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined)
  );
  const merged = nodeConfigSchema.safeParse({ ...config, ...overrides });
  if (!merged.success) {
    const issues = merged.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new FormatError(`Invalid configuration: ${issues}`);
  }
  return merged.data;
}

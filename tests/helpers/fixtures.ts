import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import type { Logger } from '../../src/interfaces';

export async function makeTempDir(prefix = 'mediapeer-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Write files relative to `root`; keys are slash-separated paths
 */
export async function writeTree(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    await fs.outputFile(path.join(root, ...relativePath.split('/')), content);
  }
}

export function createSilentLogger(): Logger & {
  debug: jest.Mock;
  info: jest.Mock;
  warn: jest.Mock;
  error: jest.Mock;
} {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  };
}

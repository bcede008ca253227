/**
 * Persistent node identity. The peer ID is generated once and reused on
 * every start; name and address come from the current configuration.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { FormatError } from '../../src/lib/errors';
import type { NodeIdentity } from '../../src/types/common';
import type { NodeConfig } from './types';

const IDENTITY_FILE = 'identity.json';

const storedIdentitySchema = z.object({
  peerId: z.string().regex(/^[\x21-\x7e]+$/).refine(id => !id.includes(':'), 'must not contain colons'),
  createdAt: z.string()
});

export function identityPath(dataDirectory: string): string {
  return path.join(dataDirectory, IDENTITY_FILE);
}

/**
 * Load the stored peer ID, creating one on first run
 */
export async function loadOrCreatePeerId(dataDirectory: string): Promise<string> {
  const filePath = identityPath(dataDirectory);

  if (await fs.pathExists(filePath)) {
    const parsed = storedIdentitySchema.safeParse(await fs.readJson(filePath));
    if (!parsed.success) {
      throw new FormatError(`Identity file ${filePath} is corrupt; remove it to generate a new peer ID`);
    }
    return parsed.data.peerId;
  }

  const peerId = uuidv4();
  await fs.outputJson(filePath, { peerId, createdAt: new Date().toISOString() }, { spaces: 2 });
  return peerId;
}

export async function loadIdentity(config: NodeConfig): Promise<NodeIdentity> {
  const peerId = await loadOrCreatePeerId(config.dataDirectory);
  return {
    peerId,
    name: config.nodeName,
    host: config.host,
    port: config.port
  };
}

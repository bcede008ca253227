import * as fs from 'fs-extra';
import * as path from 'path';
import { defaultConfig, loadConfig, readConfigFile } from '../peer-node/src/config';
import { identityPath, loadIdentity, loadOrCreatePeerId } from '../peer-node/src/identity';
import { FormatError } from '../src/lib/errors';
import { DEFAULT_NODE_PORT, DEFAULT_REQUEST_TIMEOUT } from '../src/types/constants';
import { makeTempDir } from './helpers/fixtures';

describe('node configuration', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('should derive defaults from the base directory', () => {
    const config = defaultConfig(root);

    expect(config.port).toBe(DEFAULT_NODE_PORT);
    expect(config.requestTimeout).toBe(DEFAULT_REQUEST_TIMEOUT);
    expect(config.mediaDirectory).toBe(path.join(root, 'media'));
    expect(config.dataDirectory).toBe(path.join(root, 'data'));
    expect(config.cacheDirectory).toBe(path.join(root, 'downloads'));
    expect(config.syncRetries).toBe(0);
  });

  it('should layer the config file over defaults and flags over the file', async () => {
    const configPath = path.join(root, 'node.json');
    await fs.writeJson(configPath, { port: 9001, nodeName: 'from-file', logLevel: 'debug' });

    const config = await loadConfig({
      baseDirectory: root,
      configPath,
      overrides: { port: 9002, host: undefined }
    });

    expect(config.port).toBe(9002);
    expect(config.nodeName).toBe('from-file');
    expect(config.logLevel).toBe('debug');
    expect(config.host).toBe('127.0.0.1');
  });

  it('should reject unreadable config files', async () => {
    const configPath = path.join(root, 'broken.json');
    await fs.writeFile(configPath, '{ port: ');

    await expect(readConfigFile(configPath)).rejects.toThrow(FormatError);
    await expect(readConfigFile(path.join(root, 'absent.json'))).rejects.toThrow(FormatError);
  });

  it('should reject invalid values with the offending field', async () => {
    const configPath = path.join(root, 'node.json');
    await fs.writeJson(configPath, { port: 'eighty' });

    await expect(readConfigFile(configPath)).rejects.toThrow(/port/);
    await expect(loadConfig({ baseDirectory: root, overrides: { syncConcurrency: 0 } })).rejects.toThrow(
      /syncConcurrency/
    );
    await expect(loadConfig({ baseDirectory: root, overrides: { host: 'a:b' } })).rejects.toThrow(FormatError);
  });
});

describe('node identity', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('should generate a peer ID once and reuse it', async () => {
    const first = await loadOrCreatePeerId(root);
    const second = await loadOrCreatePeerId(root);

    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(second).toBe(first);
    expect(await fs.readJson(identityPath(root))).toMatchObject({ peerId: first });
  });

  it('should take name and address from the configuration', async () => {
    const config = { ...defaultConfig(root), nodeName: 'attic', host: '192.168.1.9', port: 8200 };
    const identity = await loadIdentity(config);

    expect(identity).toEqual({
      peerId: await loadOrCreatePeerId(config.dataDirectory),
      name: 'attic',
      host: '192.168.1.9',
      port: 8200
    });
  });

  it('should refuse a corrupt identity file', async () => {
    await fs.outputJson(identityPath(root), { peerId: 'has:colon', createdAt: 'x' });
    await expect(loadOrCreatePeerId(root)).rejects.toThrow(FormatError);
  });
});

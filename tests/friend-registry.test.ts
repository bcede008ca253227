import * as fs from 'fs-extra';
import * as path from 'path';
import { ConnectionDescriptor, createDescriptor } from '../src/lib/connection/descriptor';
import { FormatError, NotFoundError, UnreachableError } from '../src/lib/errors';
import { FriendRegistry } from '../src/lib/registry';
import { DEFAULT_ONLINE_THRESHOLD, FriendStatus } from '../src/types/constants';
import type { NodeInfo } from '../src/types/common';
import { createSilentLogger, makeTempDir } from './helpers/fixtures';

const START = Date.parse('2026-03-01T12:00:00.000Z');

describe('FriendRegistry', () => {
  let root: string;
  let now: number;
  let fetchInfo: jest.Mock<Promise<NodeInfo>, [ConnectionDescriptor]>;
  let logger: ReturnType<typeof createSilentLogger>;

  const createRegistry = (): FriendRegistry =>
    new FriendRegistry({
      registryDir: path.join(root, 'friends'),
      selfPeerId: 'self-peer',
      client: { fetchInfo },
      now: () => now,
      logger
    });

  beforeEach(async () => {
    root = await makeTempDir();
    now = START;
    logger = createSilentLogger();
    fetchInfo = jest.fn(async (descriptor: ConnectionDescriptor) => ({
      peerId: descriptor.peerId,
      peerName: `node ${descriptor.peerId}`,
      host: '0.0.0.0',
      port: descriptor.port
    }));
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  describe('add', () => {
    it('should confirm the peer and store it as an online friend', async () => {
      const registry = createRegistry();
      const friend = await registry.add(createDescriptor('10.0.0.2', 8184, 'peer-b'));

      expect(fetchInfo).toHaveBeenCalledTimes(1);
      expect(friend).toEqual({
        peerId: 'peer-b',
        peerName: 'node peer-b',
        host: '10.0.0.2',
        port: 8184,
        addedAt: START,
        lastSeen: START,
        isOnline: true,
        status: FriendStatus.ONLINE
      });
      await expect(registry.list()).resolves.toHaveLength(1);
    });

    it('should update an existing friend instead of duplicating it', async () => {
      const registry = createRegistry();
      await registry.add(createDescriptor('10.0.0.2', 8184, 'peer-b'));

      now = START + 60_000;
      fetchInfo.mockResolvedValueOnce({ peerId: 'peer-b', peerName: 'renamed', host: '', port: 9000 });
      const updated = await registry.add(createDescriptor('10.0.0.3', 9000, 'peer-b'));

      expect(updated.peerName).toBe('renamed');
      expect(updated.host).toBe('10.0.0.3');
      expect(updated.addedAt).toBe(START);
      expect(updated.lastSeen).toBe(START + 60_000);
      await expect(registry.list()).resolves.toHaveLength(1);
    });

    it('should trust the peer ID the remote reports', async () => {
      const registry = createRegistry();
      fetchInfo.mockResolvedValueOnce({ peerId: 'real-id', peerName: 'real', host: '', port: 8184 });

      const friend = await registry.add(createDescriptor('10.0.0.2', 8184, 'claimed-id'));

      expect(friend.peerId).toBe('real-id');
      await expect(registry.get('claimed-id')).rejects.toThrow(NotFoundError);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('should use the given name only when the remote has none', async () => {
      const registry = createRegistry();
      fetchInfo.mockResolvedValueOnce({ peerId: 'peer-b', peerName: '', host: '', port: 8184 });

      const friend = await registry.add(createDescriptor('10.0.0.2', 8184, 'peer-b'), 'Bea');

      expect(friend.peerName).toBe('Bea');
    });

    it('should refuse to add the node itself', async () => {
      const registry = createRegistry();

      await expect(registry.add(createDescriptor('127.0.0.1', 8184, 'self-peer'))).rejects.toThrow(FormatError);
      expect(fetchInfo).not.toHaveBeenCalled();
    });

    it('should store nothing when the peer is unreachable', async () => {
      const registry = createRegistry();
      fetchInfo.mockRejectedValueOnce(new UnreachableError('connection refused'));

      await expect(registry.add(createDescriptor('10.0.0.9', 8184, 'peer-x'))).rejects.toThrow(UnreachableError);
      await expect(registry.list()).resolves.toEqual([]);
      expect(await fs.readdir(path.join(root, 'friends'))).toEqual([]);
    });
  });

  describe('remove and get', () => {
    it('should remove a friend and report NotFound the second time', async () => {
      const registry = createRegistry();
      await registry.add(createDescriptor('10.0.0.2', 8184, 'peer-b'));

      await registry.remove('peer-b');

      await expect(registry.get('peer-b')).rejects.toThrow(NotFoundError);
      await expect(registry.remove('peer-b')).rejects.toThrow(NotFoundError);
      await expect(registry.list()).resolves.toEqual([]);
    });

    it('should leave other friends alone when removing an unknown peer', async () => {
      const registry = createRegistry();
      await registry.add(createDescriptor('10.0.0.2', 8184, 'peer-b'));

      await expect(registry.remove('nobody')).rejects.toThrow(NotFoundError);
      await expect(registry.list()).resolves.toHaveLength(1);
    });

    it('should list friends oldest first', async () => {
      const registry = createRegistry();
      await registry.add(createDescriptor('10.0.0.3', 8184, 'peer-c'));
      now += 1000;
      await registry.add(createDescriptor('10.0.0.2', 8184, 'peer-b'));

      const friends = await registry.list();
      expect(friends.map(friend => friend.peerId)).toEqual(['peer-c', 'peer-b']);
    });

    it('should resolve a friend to its connection descriptor', async () => {
      const registry = createRegistry();
      await registry.add(createDescriptor('10.0.0.2', 8185, 'peer-b'));

      const descriptor = await registry.resolve('peer-b');
      expect(descriptor.toString()).toBe('10.0.0.2:8185:peer-b');
      await expect(registry.resolve('peer-z')).rejects.toThrow(NotFoundError);
    });
  });

  describe('online status', () => {
    it('should go offline after the threshold and back online on contact', async () => {
      const registry = createRegistry();
      await registry.add(createDescriptor('10.0.0.2', 8184, 'peer-b'));

      now = START + DEFAULT_ONLINE_THRESHOLD - 1;
      expect((await registry.get('peer-b')).status).toBe(FriendStatus.ONLINE);

      now = START + DEFAULT_ONLINE_THRESHOLD;
      const stale = await registry.get('peer-b');
      expect(stale.status).toBe(FriendStatus.OFFLINE);
      expect(stale.isOnline).toBe(false);

      await expect(registry.markSeen('peer-b', now)).resolves.toBe(true);
      expect((await registry.get('peer-b')).status).toBe(FriendStatus.ONLINE);
    });

    it('should report unknown for a friend never seen', () => {
      const registry = createRegistry();
      const status = registry.status({ peerId: 'p', peerName: 'p', host: 'h', port: 1, addedAt: START });
      expect(status).toBe(FriendStatus.UNKNOWN);
    });

    it('should ignore contacts from strangers and never move lastSeen back', async () => {
      const registry = createRegistry();
      await registry.add(createDescriptor('10.0.0.2', 8184, 'peer-b'));

      await expect(registry.markSeen('stranger', START)).resolves.toBe(false);
      await expect(registry.markSeen('peer-b', START - 10_000)).resolves.toBe(false);
      expect((await registry.get('peer-b')).lastSeen).toBe(START);
    });

    it('should keep the latest time under concurrent contacts', async () => {
      const registry = createRegistry();
      await registry.add(createDescriptor('10.0.0.2', 8184, 'peer-b'));

      await Promise.all([
        registry.markSeen('peer-b', START + 3000),
        registry.markSeen('peer-b', START + 1000),
        registry.markSeen('peer-b', START + 2000)
      ]);

      expect((await registry.get('peer-b')).lastSeen).toBe(START + 3000);
    });
  });

  describe('persistence', () => {
    it('should reload friends after a restart', async () => {
      const first = createRegistry();
      await first.add(createDescriptor('10.0.0.2', 8184, 'peer-b'));
      await first.markSeen('peer-b', START + 5000);

      const second = createRegistry();
      await second.initialize();
      const friend = await second.get('peer-b');

      expect(friend.host).toBe('10.0.0.2');
      expect(friend.peerName).toBe('node peer-b');
      expect(friend.lastSeen).toBe(START + 5000);
    });

    it('should delete the stored file on remove', async () => {
      const registry = createRegistry();
      await registry.add(createDescriptor('10.0.0.2', 8184, 'peer-b'));
      expect(await fs.readdir(path.join(root, 'friends'))).toEqual(['peer-b.json']);

      await registry.remove('peer-b');
      expect(await fs.readdir(path.join(root, 'friends'))).toEqual([]);
    });

    it('should skip malformed friend files', async () => {
      await fs.outputFile(path.join(root, 'friends', 'broken.json'), '{"peerId": 42}');
      await fs.outputFile(path.join(root, 'friends', 'garbage.json'), 'not json');

      const registry = createRegistry();
      await expect(registry.list()).resolves.toEqual([]);
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });
  });
});

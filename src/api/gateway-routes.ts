/**
 * Local REST gateway used by the node's own UI
 */

import * as path from 'path';
import { Router } from 'express';
import { z } from 'zod';
import type { IPeerClient, Logger } from '../interfaces';
import { parseConnectionString } from '../lib/connection/descriptor';
import { NotFoundError, errorMessage } from '../lib/errors';
import type { DownloadCache } from '../lib/gallery/download-cache';
import { mergeGalleries } from '../lib/gallery/gallery-merger';
import type { MediaLibrary } from '../lib/gallery/media-library';
import type { FriendRegistry } from '../lib/registry';
import type { ContentSyncEngine } from '../lib/sync/content-sync-engine';
import { DEFAULT_NODE_PORT, MediaKind } from '../types/constants';
import type { GalleryListing, NodeIdentity } from '../types/common';
import { parseBody, route, sendFile } from './error-middleware';
import { parseMediaKind } from './params';
import {
  docContentJson,
  docSummaryJson,
  friendJson,
  galleryDescriptorJson,
  galleryJson,
  nodeInfoJson,
  nodeJson,
  outcomeJson
} from './serializers';

const discoverBody = z.object({
  ip: z.string().trim().min(1),
  port: z.number().int().min(1).max(65535).optional()
});

const addFriendBody = z.object({
  connection_string: z.string().min(1),
  peer_name: z.string().optional()
});

const downloadBody = z.object({
  deadline_ms: z.number().int().positive().optional()
});

export interface GatewayRouterOptions {
  identity: () => NodeIdentity;
  library: MediaLibrary;
  registry: FriendRegistry;
  client: IPeerClient;
  cache: DownloadCache;
  engine: ContentSyncEngine;
  logger: Logger;
}

export function createGatewayRouter(options: GatewayRouterOptions): Router {
  const { library, registry, client, cache, engine, logger } = options;
  const router = Router();

  router.get(
    '/info',
    route(async (_req, res) => {
      res.json({ node: nodeJson(options.identity()), folderInfo: await library.describe() });
    })
  );

  // Reachability probe only; nothing is added to the registry
  router.post(
    '/discover',
    route(async (req, res) => {
      const body = parseBody(discoverBody, req.body);
      const port = body.port ?? DEFAULT_NODE_PORT;
      const result = await client.probe(body.ip, port);
      res.json({
        ip: body.ip,
        port,
        reachable: result.reachable,
        ...(result.node ? { node: nodeInfoJson(result.node) } : {}),
        ...(result.error ? { error: result.error } : {})
      });
    })
  );

  router.get(
    '/friends',
    route(async (_req, res) => {
      const friends = await registry.list();
      res.json({ friends: friends.map(friendJson), count: friends.length });
    })
  );

  router.post(
    '/friends',
    route(async (req, res) => {
      const body = parseBody(addFriendBody, req.body);
      const descriptor = parseConnectionString(body.connection_string);
      const friend = await registry.add(descriptor, body.peer_name);
      res.status(201).json(friendJson(friend));
    })
  );

  router.get(
    '/friends/:peerId',
    route(async (req, res) => {
      res.json(friendJson(await registry.get(req.params.peerId)));
    })
  );

  router.delete(
    '/friends/:peerId',
    route(async (req, res) => {
      await registry.remove(req.params.peerId);
      res.json({ status: 'removed', message: `Friend ${req.params.peerId} removed` });
    })
  );

  // Live catalog merged with what was already downloaded
  router.get(
    '/peer-galleries/:peerId',
    route(async (req, res) => {
      const { peerId } = req.params;
      const kind = parseMediaKind(req.query.kind, MediaKind.IMAGES);
      await registry.get(peerId);

      let live: GalleryListing[] = [];
      let liveError: string | undefined;
      try {
        live = await client.fetchGalleries(peerId, kind);
      } catch (error) {
        liveError = errorMessage(error);
        logger.warn(`Live ${kind} listing of ${peerId} failed, showing downloaded galleries: ${liveError}`);
      }

      const downloaded = await cache.listGalleries(peerId, kind);
      const galleries = mergeGalleries(live, downloaded);
      res.json({
        galleries: galleries.map(galleryDescriptorJson),
        count: galleries.length,
        ...(liveError !== undefined ? { live_error: liveError } : {})
      });
    })
  );

  router.get(
    '/peer-galleries/:peerId/:gallery',
    route(async (req, res) => {
      const { peerId, gallery } = req.params;
      const kind = parseMediaKind(req.query.kind, MediaKind.IMAGES);
      await registry.get(peerId);
      res.json(galleryJson(await client.fetchGallery(peerId, kind, gallery)));
    })
  );

  // Cached copy when there is one, otherwise fetched live and cached
  router.get(
    '/peer-galleries/:peerId/:gallery/:file',
    route(async (req, res) => {
      const { peerId, gallery, file } = req.params;
      const kind = parseMediaKind(req.query.kind, MediaKind.IMAGES);
      await registry.get(peerId);

      const cached = await cache.filePath(peerId, kind, gallery, file);
      if (cached) {
        await sendFile(res, cached);
        return;
      }

      const data = await client.fetchFile(peerId, kind, gallery, file);
      try {
        await cache.save(peerId, kind, gallery, file, data);
      } catch (error) {
        logger.warn(`Could not cache ${kind}/${gallery}/${file} from ${peerId}: ${errorMessage(error)}`);
      }
      res.type(path.extname(file) || 'application/octet-stream').send(data);
    })
  );

  router.get(
    '/downloaded/:peerId/:kind',
    route(async (req, res) => {
      const galleries = await cache.listGalleries(req.params.peerId, parseMediaKind(req.params.kind));
      res.json({ galleries: galleries.map(galleryJson), count: galleries.length });
    })
  );

  router.get(
    '/downloaded/:peerId/:kind/:gallery',
    route(async (req, res) => {
      const { peerId, gallery } = req.params;
      res.json(galleryJson(await cache.getGallery(peerId, parseMediaKind(req.params.kind), gallery)));
    })
  );

  router.get(
    '/downloaded/:peerId/:kind/:gallery/:file',
    route(async (req, res) => {
      const { peerId, gallery, file } = req.params;
      const kind = parseMediaKind(req.params.kind);
      const filePath = await cache.filePath(peerId, kind, gallery, file);
      if (!filePath) {
        throw new NotFoundError(`${kind}/${gallery}/${file} has not been downloaded from ${peerId}`);
      }
      await sendFile(res, filePath);
    })
  );

  router.post(
    '/peer-docs/:peerId/download',
    route(async (req, res) => {
      const body = parseBody(downloadBody, req.body);
      const outcome = await engine.downloadAll(req.params.peerId, { deadlineMs: body.deadline_ms });
      res.json(outcomeJson(outcome));
    })
  );

  router.get(
    '/peer-docs/:peerId',
    route(async (req, res) => {
      const { peerId } = req.params;
      await registry.get(peerId);
      const docs = await client.fetchDocs(peerId);
      res.json({ docs: docs.map(docSummaryJson), count: docs.length });
    })
  );

  router.get(
    '/peer-docs/:peerId/:filename',
    route(async (req, res) => {
      const { peerId, filename } = req.params;
      await registry.get(peerId);
      res.json({ doc: docContentJson(await client.fetchDoc(peerId, filename)) });
    })
  );

  router.get(
    '/peer-friends/:peerId',
    route(async (req, res) => {
      const { peerId } = req.params;
      await registry.get(peerId);
      const friends = await client.fetchFriendsOf(peerId);
      res.json({ friends: friends.map(friendJson), count: friends.length });
    })
  );

  return router;
}

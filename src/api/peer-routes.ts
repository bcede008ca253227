/**
 * Endpoints other nodes call: this node's identity, catalog, documents and
 * friend list.
 */

import { Router } from 'express';
import type { FriendRegistry } from '../lib/registry';
import type { MediaLibrary } from '../lib/gallery/media-library';
import type { NodeIdentity } from '../types/common';
import { route, sendFile } from './error-middleware';
import { parseMediaKind } from './params';
import { docContentJson, docSummaryJson, friendJson, galleryJson, nodeJson } from './serializers';

export interface PeerRouterOptions {
  identity: () => NodeIdentity;
  library: MediaLibrary;
  registry: FriendRegistry;
}

export function createPeerRouter(options: PeerRouterOptions): Router {
  const { library, registry } = options;
  const router = Router();

  router.get('/info', (_req, res) => {
    res.json({ node: nodeJson(options.identity()) });
  });

  router.get(
    '/galleries/:kind',
    route(async (req, res) => {
      const galleries = await library.listGalleries(parseMediaKind(req.params.kind));
      res.json({ galleries: galleries.map(galleryJson), count: galleries.length });
    })
  );

  router.get(
    '/galleries/:kind/:gallery',
    route(async (req, res) => {
      const gallery = await library.getGallery(parseMediaKind(req.params.kind), req.params.gallery);
      res.json(galleryJson(gallery));
    })
  );

  router.get(
    '/galleries/:kind/:gallery/:file',
    route(async (req, res) => {
      const filePath = await library.filePath(parseMediaKind(req.params.kind), req.params.gallery, req.params.file);
      await sendFile(res, filePath);
    })
  );

  router.get(
    '/docs',
    route(async (_req, res) => {
      const docs = await library.listDocs();
      res.json({ docs: docs.map(docSummaryJson), count: docs.length });
    })
  );

  router.get(
    '/docs/:filename',
    route(async (req, res) => {
      const doc = await library.findDoc(req.params.filename);
      res.json({ doc: docContentJson(doc) });
    })
  );

  router.get(
    '/friends',
    route(async (_req, res) => {
      const friends = await registry.list();
      res.json({ friends: friends.map(friendJson), count: friends.length });
    })
  );

  return router;
}

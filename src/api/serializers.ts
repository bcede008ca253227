/**
 * snake_case JSON encoders for everything the node sends over HTTP. The
 * peer wire schemas in lib/connection/schemas.ts decode the same shapes.
 */

import { toIsoTime } from '../lib/utils/common';
import type {
  DocContent,
  DocSummary,
  DownloadOutcome,
  Friend,
  GalleryDescriptor,
  GalleryListing,
  NodeIdentity,
  NodeInfo
} from '../types/common';

export function nodeJson(node: NodeIdentity) {
  return { id: node.peerId, name: node.name, host: node.host, port: node.port };
}

export function nodeInfoJson(info: NodeInfo) {
  return { id: info.peerId, name: info.peerName, host: info.host, port: info.port };
}

export function galleryJson(gallery: GalleryListing) {
  return { name: gallery.name, file_count: gallery.fileCount, files: gallery.files };
}

export function galleryDescriptorJson(gallery: GalleryDescriptor) {
  return { ...galleryJson(gallery), source: gallery.source, is_downloaded: gallery.isDownloaded };
}

export function docSummaryJson(doc: DocSummary) {
  return { filename: doc.filename, gallery: doc.gallery, size: doc.size, modified_at: doc.modifiedAt };
}

export function docContentJson(doc: DocContent) {
  return { ...docSummaryJson(doc), content: doc.content };
}

export function friendJson(friend: Friend) {
  return {
    peer_id: friend.peerId,
    peer_name: friend.peerName,
    host: friend.host,
    port: friend.port,
    added_at: toIsoTime(friend.addedAt),
    last_seen: toIsoTime(friend.lastSeen),
    is_online: friend.isOnline,
    status: friend.status
  };
}

export function outcomeJson(outcome: DownloadOutcome) {
  return {
    peer_id: outcome.peerId,
    docs_downloaded: outcome.docsDownloaded,
    images_downloaded: outcome.imagesDownloaded,
    attempted: outcome.attempted,
    successful_files: outcome.savedFiles,
    errors: outcome.errors.map(error => ({ item: error.item, reason: error.reason, kind: error.kind }))
  };
}

/**
 * Common type definitions
 */

import type { ErrorKind, FriendStatus, GallerySource, MediaKind } from './constants';

/**
 * Identity of the local node, fixed for the lifetime of the process
 */
export interface NodeIdentity {
  readonly peerId: string;
  readonly name: string;
  readonly host: string;
  readonly port: number;
}

/**
 * What a peer reports about itself on /peer/info
 */
export interface NodeInfo {
  peerId: string;
  peerName: string;
  host: string;
  port: number;
}

/**
 * Stored friend record (what the registry persists)
 */
export interface FriendRecord {
  peerId: string;
  peerName: string;
  host: string;
  port: number;
  addedAt: number;
  lastSeen?: number;
}

/**
 * Friend as returned to callers, with the derived online fields
 */
export interface Friend extends FriendRecord {
  isOnline: boolean;
  status: FriendStatus;
}

/**
 * A gallery as listed by a peer or by the local cache
 */
export interface GalleryListing {
  name: string;
  fileCount: number;
  files: string[];
}

/**
 * A gallery in a merged live/downloaded view
 */
export interface GalleryDescriptor extends GalleryListing {
  source: GallerySource;
  isDownloaded: boolean;
}

/**
 * Document entry in a peer's doc listing
 */
export interface DocSummary {
  filename: string;
  gallery: string;
  size: number;
  modifiedAt: string;
}

/**
 * Document with its text content
 */
export interface DocContent extends DocSummary {
  content: string;
}

/**
 * One failed item of a bulk download
 */
export interface DownloadError {
  item: string;
  reason: string;
  kind: ErrorKind;
}

/**
 * Aggregate result of one bulk download
 */
export interface DownloadOutcome {
  peerId: string;
  docsDownloaded: number;
  imagesDownloaded: number;
  attempted: number;
  savedFiles: string[];
  errors: DownloadError[];
}

/**
 * Summary of the local media tree for /api/info
 */
export interface FolderInfo {
  path: string;
  files: string[];
  lastScan: string;
}

/**
 * A file scheduled for download
 */
export interface TransferItem {
  kind: MediaKind;
  gallery: string;
  filename: string;
}

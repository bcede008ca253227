/**
 * Constant definitions for mediapeer
 */

/**
 * Media kinds a node shares. Each kind is a top-level directory of the media
 * tree and is split into named galleries.
 */
export const MediaKind = {
  DOCS: 'docs',
  IMAGES: 'images',
  AUDIO: 'audio',
  VIDEO: 'video',
} as const;

export type MediaKind = (typeof MediaKind)[keyof typeof MediaKind];

export const MEDIA_KINDS: readonly MediaKind[] = [
  MediaKind.DOCS,
  MediaKind.IMAGES,
  MediaKind.AUDIO,
  MediaKind.VIDEO,
];

/**
 * Where a gallery listing came from
 */
export enum GallerySource {
  LIVE = 'live',
  DOWNLOADED = 'downloaded'
}

/**
 * Friend online state, evaluated lazily from lastSeen
 */
export enum FriendStatus {
  UNKNOWN = 'unknown',
  ONLINE = 'online',
  OFFLINE = 'offline'
}

/**
 * Error taxonomy shared by the client, registry, engine and gateway
 */
export enum ErrorKind {
  FORMAT = 'FormatError',
  NOT_FOUND = 'NotFound',
  UNREACHABLE = 'Unreachable',
  TIMEOUT = 'Timeout',
  PROTOCOL = 'ProtocolError',
  CANCELLED = 'Cancelled',
  WRITE = 'WriteError'
}

/**
 * File extensions accepted per media kind (lowercase, with leading dot)
 */
export const MEDIA_EXTENSIONS: Record<MediaKind, ReadonlySet<string>> = {
  docs: new Set(['.md', '.pdf', '.txt', '.html', '.djvu', '.doc', '.docx']),
  images: new Set(['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.tiff', '.webp']),
  audio: new Set(['.mp3', '.wav', '.flac', '.aac', '.ogg', '.m4a', '.wma', '.opus']),
  video: new Set(['.mp4', '.avi', '.mkv', '.mov', '.wmv', '.flv', '.webm', '.m4v', '.3gp', '.mpg', '.mpeg']),
};

/**
 * Default HTTP port for a node (web UI, gateway and peer endpoints share it)
 */
export const DEFAULT_NODE_PORT = 8184;

/**
 * Hard ceiling for a single outbound peer request (5 seconds)
 */
export const DEFAULT_REQUEST_TIMEOUT = 5000;

/**
 * Largest response body accepted from a peer (50MB)
 */
export const DEFAULT_MAX_RESPONSE_BYTES = 50 * 1024 * 1024;

/**
 * A friend seen within this window counts as online (5 minutes)
 */
export const DEFAULT_ONLINE_THRESHOLD = 5 * 60 * 1000;

/**
 * Parallel transfers during a bulk download
 */
export const DEFAULT_SYNC_CONCURRENCY = 4;

/**
 * Ceiling for writing one downloaded file to the cache (10 seconds)
 */
export const DEFAULT_WRITE_TIMEOUT = 10000;

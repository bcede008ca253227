// Re-export from host.ts
import { NodeHost } from './host';

// Re-export from client.ts
import { PeerClient } from './client';

// Re-export registry, gallery and sync components
import { FriendRegistry } from './lib/registry';
import { mergeGalleries } from './lib/gallery/gallery-merger';
import { MediaLibrary } from './lib/gallery/media-library';
import { DownloadCache } from './lib/gallery/download-cache';
import { ContentSyncEngine } from './lib/sync/content-sync-engine';
import { PathManager } from './lib/utils/paths';

export {
  NodeHost,
  PeerClient,
  FriendRegistry,
  mergeGalleries,
  MediaLibrary,
  DownloadCache,
  ContentSyncEngine,
  PathManager
};

export {
  ConnectionDescriptor,
  parseConnectionString,
  formatConnectionString,
  createDescriptor
} from './lib/connection/descriptor';
export * from './lib/errors';
export * from './types/constants';

// Export types for TypeScript users
export type { NodeHostOptions } from './host';
export type { PeerClientOptions } from './client';
export type { FriendRegistryOptions } from './lib/registry';
export type { ContentSyncEngineOptions, DownloadAllOptions, FriendLookup } from './lib/sync/content-sync-engine';
export type { AddressBook, IPeerClient, INodeHost, Logger, ProbeResult, RequestOptions } from './interfaces';
export type * from './types/common';

import type { ConnectionDescriptor } from './lib/connection/descriptor';
import type { MediaKind } from './types/constants';
import type { DocContent, DocSummary, Friend, GalleryListing, NodeIdentity, NodeInfo } from './types/common';

/**
 * Logger accepted by the host, client and engine. The node app passes its
 * chalk logger; library users may pass console-like objects.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Resolves a peer ID to the address the client should dial
 */
export interface AddressBook {
  /**
   * @throws NotFoundError when the peer is unknown
   */
  resolve(peerId: string): Promise<ConnectionDescriptor>;
}

export interface RequestOptions {
  /** Aborts the in-flight request; the call then fails with CancelledError */
  signal?: AbortSignal;
}

export interface ProbeResult {
  reachable: boolean;
  node?: NodeInfo;
  error?: string;
}

export interface IPeerClient {
  /**
   * Ask a peer who it is. Used as the liveness handshake when adding a friend.
   */
  fetchInfo(descriptor: ConnectionDescriptor, options?: RequestOptions): Promise<NodeInfo>;

  /**
   * List a peer's galleries of one media kind
   */
  fetchGalleries(peerId: string, kind: MediaKind, options?: RequestOptions): Promise<GalleryListing[]>;

  /**
   * Fetch one gallery's file list
   */
  fetchGallery(peerId: string, kind: MediaKind, gallery: string, options?: RequestOptions): Promise<GalleryListing>;

  /**
   * Download one file's bytes
   */
  fetchFile(
    peerId: string,
    kind: MediaKind,
    gallery: string,
    filename: string,
    options?: RequestOptions
  ): Promise<Buffer>;

  /**
   * List a peer's documents
   */
  fetchDocs(peerId: string, options?: RequestOptions): Promise<DocSummary[]>;

  /**
   * Fetch one document with its text content
   */
  fetchDoc(peerId: string, filename: string, options?: RequestOptions): Promise<DocContent>;

  /**
   * Fetch the friend list a peer publishes
   */
  fetchFriendsOf(peerId: string, options?: RequestOptions): Promise<Friend[]>;

  /**
   * Reachability check against a raw address; never throws
   */
  probe(host: string, port: number): Promise<ProbeResult>;
}

export interface INodeHost {
  /**
   * Start serving the gateway and peer endpoints
   * @returns The identity as bound (port filled in when 0 was requested)
   */
  start(): Promise<NodeIdentity>;

  /**
   * Stop the HTTP server
   */
  stop(): Promise<void>;
}

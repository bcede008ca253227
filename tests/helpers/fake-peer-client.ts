import type { IPeerClient, ProbeResult, RequestOptions } from '../../src/interfaces';
import { ConnectionDescriptor } from '../../src/lib/connection/descriptor';
import { CancelledError, NotFoundError } from '../../src/lib/errors';
import { MediaKind } from '../../src/types/constants';
import type { DocContent, DocSummary, Friend, GalleryListing, NodeInfo } from '../../src/types/common';

type FileBehaviour = (options: RequestOptions) => Promise<Buffer>;

/**
 * In-memory IPeerClient. Galleries and file behaviours are set per test;
 * files without a behaviour resolve to their own path as bytes.
 */
export class FakePeerClient implements IPeerClient {
  galleries: Partial<Record<MediaKind, GalleryListing[] | Error>> = {};
  files = new Map<string, FileBehaviour>();
  info?: NodeInfo;
  fetchFileCalls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  static key(kind: MediaKind, gallery: string, filename: string): string {
    return `${kind}/${gallery}/${filename}`;
  }

  async fetchInfo(descriptor: ConnectionDescriptor): Promise<NodeInfo> {
    return this.info ?? { peerId: descriptor.peerId, peerName: 'fake', host: descriptor.host, port: descriptor.port };
  }

  async fetchGalleries(_peerId: string, kind: MediaKind): Promise<GalleryListing[]> {
    const listing = this.galleries[kind];
    if (listing instanceof Error) throw listing;
    return listing ?? [];
  }

  async fetchGallery(peerId: string, kind: MediaKind, gallery: string): Promise<GalleryListing> {
    const found = (await this.fetchGalleries(peerId, kind)).find(entry => entry.name === gallery);
    if (!found) throw new NotFoundError(`no gallery ${gallery}`);
    return found;
  }

  async fetchFile(
    _peerId: string,
    kind: MediaKind,
    gallery: string,
    filename: string,
    options: RequestOptions = {}
  ): Promise<Buffer> {
    const key = FakePeerClient.key(kind, gallery, filename);
    this.fetchFileCalls.push(key);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const behaviour = this.files.get(key);
      return behaviour ? await behaviour(options) : Buffer.from(key);
    } finally {
      this.inFlight--;
    }
  }

  async fetchDocs(): Promise<DocSummary[]> {
    return [];
  }

  async fetchDoc(_peerId: string, filename: string): Promise<DocContent> {
    throw new NotFoundError(`no doc ${filename}`);
  }

  async fetchFriendsOf(): Promise<Friend[]> {
    return [];
  }

  async probe(): Promise<ProbeResult> {
    return { reachable: false };
  }
}

/**
 * File behaviour that settles only when the request is aborted
 */
export function hangUntilAborted(options: RequestOptions): Promise<Buffer> {
  return new Promise((_resolve, reject) => {
    options.signal?.addEventListener('abort', () => reject(new CancelledError('aborted')), { once: true });
  });
}

/**
 * File behaviour resolving after `ms` milliseconds
 */
export function delayed(ms: number, content: string): FileBehaviour {
  return () => new Promise(resolve => setTimeout(() => resolve(Buffer.from(content)), ms));
}

/**
 * Path layout of a node's data, media and cache directories, and name checks
 * for anything that ends up as a path segment.
 */

import * as path from 'path';
import { FormatError } from '../errors';
import { MEDIA_EXTENSIONS, MediaKind } from '../../types/constants';

const UNSAFE_SEGMENT = /\.\.|[\/\\]|\u0000/;

/**
 * Throw a FormatError unless `name` is usable as a single path segment
 * @param field - Name of the field for the error message
 * @param name - Gallery name or filename to check
 */
export function assertSafeSegment(field: string, name: string): void {
  if (name.trim() === '' || UNSAFE_SEGMENT.test(name)) {
    throw new FormatError(`Invalid ${field}: ${JSON.stringify(name)}`);
  }
}

/**
 * Whether `filename` has an extension belonging to the media kind
 */
export function matchesMediaKind(kind: MediaKind, filename: string): boolean {
  return MEDIA_EXTENSIONS[kind].has(path.extname(filename).toLowerCase());
}

export class PathManager {
  constructor(
    private readonly mediaRoot: string,
    private readonly cacheRoot: string
  ) {}

  getMediaRoot(): string {
    return this.mediaRoot;
  }

  getMediaKindPath(kind: MediaKind): string {
    return path.join(this.mediaRoot, kind);
  }

  getGalleryPath(kind: MediaKind, gallery: string): string {
    assertSafeSegment('gallery name', gallery);
    return path.join(this.getMediaKindPath(kind), gallery);
  }

  getPeerDownloadPath(peerId: string): string {
    assertSafeSegment('peer ID', peerId);
    return path.join(this.cacheRoot, peerId);
  }

  getPeerMediaPath(peerId: string, kind: MediaKind): string {
    return path.join(this.getPeerDownloadPath(peerId), kind);
  }

  getPeerGalleryPath(peerId: string, kind: MediaKind, gallery: string): string {
    assertSafeSegment('gallery name', gallery);
    return path.join(this.getPeerMediaPath(peerId, kind), gallery);
  }
}

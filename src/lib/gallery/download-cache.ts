/**
 * Per-peer cache of downloaded content: `<cacheDir>/<peerId>/<kind>/<gallery>/<file>`
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import Debug from 'debug';
import { NotFoundError } from '../errors';
import { PathManager, assertSafeSegment } from '../utils/paths';
import { listGalleries, listGalleryFiles } from './listing';
import type { MediaKind } from '../../types/constants';
import type { GalleryListing } from '../../types/common';

const debug = Debug('mediapeer:download-cache');

export class DownloadCache {
  constructor(private readonly paths: PathManager) {}

  /**
   * Cached galleries of one peer and kind; empty when nothing was downloaded
   */
  async listGalleries(peerId: string, kind: MediaKind): Promise<GalleryListing[]> {
    return listGalleries(this.paths.getPeerMediaPath(peerId, kind), kind);
  }

  /**
   * @throws NotFoundError when the gallery was never downloaded
   */
  async getGallery(peerId: string, kind: MediaKind, gallery: string): Promise<GalleryListing> {
    const galleryDir = this.paths.getPeerGalleryPath(peerId, kind, gallery);
    if (!(await fs.pathExists(galleryDir))) {
      throw new NotFoundError(`No downloaded gallery ${kind}/${gallery} for peer ${peerId}`);
    }
    const files = await listGalleryFiles(galleryDir, kind);
    return { name: gallery, fileCount: files.length, files };
  }

  /**
   * Absolute path of a cached file, or undefined when it is not cached
   */
  async filePath(peerId: string, kind: MediaKind, gallery: string, filename: string): Promise<string | undefined> {
    assertSafeSegment('filename', filename);
    const filePath = path.join(this.paths.getPeerGalleryPath(peerId, kind, gallery), filename);
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile() ? filePath : undefined;
    } catch (err) {
      debug(`Cache miss for ${filePath}`);
      return undefined;
    }
  }

  /**
   * Write a downloaded file, creating its directories
   * @returns Path of the written file
   */
  async save(peerId: string, kind: MediaKind, gallery: string, filename: string, data: Buffer): Promise<string> {
    assertSafeSegment('filename', filename);
    const filePath = path.join(this.paths.getPeerGalleryPath(peerId, kind, gallery), filename);
    await fs.outputFile(filePath, data);
    debug(`Saved ${data.length} bytes to ${filePath}`);
    return filePath;
  }
}

/**
 * Local media tree: `<mediaRoot>/<kind>/<gallery>/<file>`
 *
 * Serves the node's own catalog to peers and to the gateway. A chokidar
 * watcher can keep the folder summary fresh while the node runs.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs-extra';
import * as path from 'path';
import { FSWatcher, watch } from 'chokidar';
import type { Logger } from '../../interfaces';
import { NotFoundError, errorMessage } from '../errors';
import { PathManager, assertSafeSegment } from '../utils/paths';
import { listGalleries, listGalleryFiles, listGalleryNames } from './listing';
import { MEDIA_KINDS, MediaKind } from '../../types/constants';
import type { DocContent, DocSummary, FolderInfo, GalleryListing } from '../../types/common';

const RESCAN_DELAY = 500;

export interface MediaLibraryOptions {
  watch?: boolean; // Rescan on filesystem changes
}

export class MediaLibrary extends EventEmitter {
  private paths: PathManager;
  private logger: Logger;
  private watcher?: FSWatcher;
  private rescanTimer?: NodeJS.Timeout;
  private folderInfo?: FolderInfo;

  constructor(paths: PathManager, logger: Logger) {
    super();
    this.paths = paths;
    this.logger = logger;
  }

  public async initialize(options: MediaLibraryOptions = {}): Promise<void> {
    for (const kind of MEDIA_KINDS) {
      await fs.ensureDir(this.paths.getMediaKindPath(kind));
    }

    await this.scan();

    if (options.watch) {
      this.setupWatcher();
    }
  }

  public async stop(): Promise<void> {
    if (this.rescanTimer) {
      clearTimeout(this.rescanTimer);
      this.rescanTimer = undefined;
    }
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = undefined;
    }
  }

  /**
   * Walk the whole tree and refresh the folder summary
   */
  public async scan(): Promise<FolderInfo> {
    const files: string[] = [];

    for (const kind of MEDIA_KINDS) {
      const galleries = await listGalleries(this.paths.getMediaKindPath(kind), kind);
      for (const gallery of galleries) {
        for (const file of gallery.files) {
          files.push(`${kind}/${gallery.name}/${file}`);
        }
      }
    }

    this.folderInfo = {
      path: this.paths.getMediaRoot(),
      files,
      lastScan: new Date().toISOString()
    };
    this.logger.debug(`Scanned ${this.folderInfo.path}: ${files.length} media files`);
    this.emit('scanned', this.folderInfo);
    return this.folderInfo;
  }

  /**
   * Folder summary from the latest scan
   */
  public async describe(): Promise<FolderInfo> {
    return this.folderInfo ?? this.scan();
  }

  private setupWatcher(): void {
    this.watcher = watch(this.paths.getMediaRoot(), {
      persistent: true,
      ignoreInitial: true,
      ignored: /(^|[\/\\])\../
    });

    this.watcher.on('all', () => this.scheduleRescan());
    this.watcher.on('error', (error: unknown) => {
      this.logger.error(`Media watcher error: ${errorMessage(error)}`);
    });
  }

  private scheduleRescan(): void {
    if (this.rescanTimer) clearTimeout(this.rescanTimer);
    this.rescanTimer = setTimeout(() => {
      this.rescanTimer = undefined;
      this.scan().catch((error: unknown) => {
        this.logger.error(`Rescan of ${this.paths.getMediaRoot()} failed: ${errorMessage(error)}`);
      });
    }, RESCAN_DELAY);
  }

  public async listGalleries(kind: MediaKind): Promise<GalleryListing[]> {
    return listGalleries(this.paths.getMediaKindPath(kind), kind);
  }

  /**
   * @throws NotFoundError when the gallery does not exist
   */
  public async getGallery(kind: MediaKind, gallery: string): Promise<GalleryListing> {
    const galleryDir = this.paths.getGalleryPath(kind, gallery);
    if (!(await fs.pathExists(galleryDir))) {
      throw new NotFoundError(`Gallery ${kind}/${gallery} not found`);
    }
    const files = await listGalleryFiles(galleryDir, kind);
    return { name: gallery, fileCount: files.length, files };
  }

  /**
   * Absolute path of a shared file
   * @throws NotFoundError when the file is not part of the gallery
   */
  public async filePath(kind: MediaKind, gallery: string, filename: string): Promise<string> {
    assertSafeSegment('filename', filename);
    const { files } = await this.getGallery(kind, gallery);
    if (!files.includes(filename)) {
      throw new NotFoundError(`File ${kind}/${gallery}/${filename} not found`);
    }
    return path.join(this.paths.getGalleryPath(kind, gallery), filename);
  }

  /**
   * Every document across the doc galleries, gallery by gallery
   */
  public async listDocs(): Promise<DocSummary[]> {
    const docsDir = this.paths.getMediaKindPath(MediaKind.DOCS);
    const docs: DocSummary[] = [];

    for (const gallery of await listGalleryNames(docsDir)) {
      const galleryDir = path.join(docsDir, gallery);
      for (const filename of await listGalleryFiles(galleryDir, MediaKind.DOCS)) {
        docs.push(await this.summarizeDoc(galleryDir, gallery, filename));
      }
    }

    return docs;
  }

  /**
   * First document with this filename, searching galleries in name order
   * @throws NotFoundError when no gallery holds the file
   */
  public async findDoc(filename: string): Promise<DocContent> {
    assertSafeSegment('filename', filename);
    const docsDir = this.paths.getMediaKindPath(MediaKind.DOCS);

    for (const gallery of await listGalleryNames(docsDir)) {
      const galleryDir = path.join(docsDir, gallery);
      const files = await listGalleryFiles(galleryDir, MediaKind.DOCS);
      if (!files.includes(filename)) continue;

      const summary = await this.summarizeDoc(galleryDir, gallery, filename);
      const content = await fs.readFile(path.join(galleryDir, filename), 'utf8');
      return { ...summary, content };
    }

    throw new NotFoundError(`Document ${filename} not found`);
  }

  private async summarizeDoc(galleryDir: string, gallery: string, filename: string): Promise<DocSummary> {
    const stats = await fs.stat(path.join(galleryDir, filename));
    return {
      filename,
      gallery,
      size: stats.size,
      modifiedAt: stats.mtime.toISOString()
    };
  }
}

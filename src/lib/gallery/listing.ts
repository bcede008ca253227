/**
 * Directory listing shared by the media library and the download cache.
 * A kind directory holds one subdirectory per gallery; a gallery holds
 * files whose extension belongs to the kind.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { matchesMediaKind } from '../utils/paths';
import type { MediaKind } from '../../types/constants';
import type { GalleryListing } from '../../types/common';

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

/**
 * Gallery names under a kind directory, sorted. A missing directory lists
 * as empty.
 */
export async function listGalleryNames(kindDir: string): Promise<string[]> {
  if (!(await fs.pathExists(kindDir))) return [];

  const entries = await fs.readdir(kindDir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isDirectory() && !isHidden(entry.name))
    .map(entry => entry.name)
    .sort();
}

/**
 * Media files of one gallery, sorted. A missing directory lists as empty.
 */
export async function listGalleryFiles(galleryDir: string, kind: MediaKind): Promise<string[]> {
  if (!(await fs.pathExists(galleryDir))) return [];

  const entries = await fs.readdir(galleryDir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && !isHidden(entry.name) && matchesMediaKind(kind, entry.name))
    .map(entry => entry.name)
    .sort();
}

/**
 * Every gallery of a kind directory with its files
 */
export async function listGalleries(kindDir: string, kind: MediaKind): Promise<GalleryListing[]> {
  const names = await listGalleryNames(kindDir);
  const listings: GalleryListing[] = [];

  for (const name of names) {
    const files = await listGalleryFiles(path.join(kindDir, name), kind);
    listings.push({ name, fileCount: files.length, files });
  }

  return listings;
}

/**
 * Merge of a peer's live gallery listing with what is already cached locally
 */

import { GallerySource } from '../../types/constants';
import type { GalleryDescriptor, GalleryListing } from '../../types/common';

/**
 * Combine live and downloaded listings into one view.
 *
 * Live galleries come first in their input order; a live gallery that is
 * also cached is flagged `isDownloaded`. Galleries only present in the
 * cache follow in their input order with the flag left off. Inputs are left untouched, and a name
 * repeated within one input keeps its first entry.
 */
export function mergeGalleries(
  live: readonly GalleryListing[],
  downloaded: readonly GalleryListing[]
): GalleryDescriptor[] {
  const byName = new Map<string, GalleryDescriptor>();
  const merged: GalleryDescriptor[] = [];

  for (const gallery of live) {
    if (byName.has(gallery.name)) continue;
    const entry: GalleryDescriptor = {
      name: gallery.name,
      fileCount: gallery.fileCount,
      files: [...gallery.files],
      source: GallerySource.LIVE,
      isDownloaded: false
    };
    byName.set(entry.name, entry);
    merged.push(entry);
  }

  for (const gallery of downloaded) {
    const existing = byName.get(gallery.name);
    if (existing) {
      existing.isDownloaded = true;
      continue;
    }
    const entry: GalleryDescriptor = {
      name: gallery.name,
      fileCount: gallery.fileCount,
      files: [...gallery.files],
      source: GallerySource.DOWNLOADED,
      isDownloaded: false
    };
    byName.set(entry.name, entry);
    merged.push(entry);
  }

  return merged;
}

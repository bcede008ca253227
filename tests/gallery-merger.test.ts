import { mergeGalleries } from '../src/lib/gallery/gallery-merger';
import { GallerySource } from '../src/types/constants';
import type { GalleryListing } from '../src/types/common';

function gallery(name: string, files: string[] = []): GalleryListing {
  return { name, fileCount: files.length, files };
}

describe('mergeGalleries', () => {
  it('should list live galleries first, then downloaded-only ones', () => {
    const merged = mergeGalleries(
      [gallery('beach', ['1.jpg']), gallery('city', ['2.jpg'])],
      [gallery('mountains', ['3.jpg']), gallery('beach', ['1.jpg'])]
    );

    expect(merged.map(entry => [entry.name, entry.source, entry.isDownloaded])).toEqual([
      ['beach', GallerySource.LIVE, true],
      ['city', GallerySource.LIVE, false],
      ['mountains', GallerySource.DOWNLOADED, false]
    ]);
  });

  it('should flag only live galleries that are also cached', () => {
    const merged = mergeGalleries([gallery('trip', ['a.jpg'])], [gallery('trip', ['a.jpg']), gallery('old', ['b.jpg'])]);

    expect(merged).toEqual([
      { name: 'trip', fileCount: 1, files: ['a.jpg'], source: GallerySource.LIVE, isDownloaded: true },
      { name: 'old', fileCount: 1, files: ['b.jpg'], source: GallerySource.DOWNLOADED, isDownloaded: false }
    ]);
  });

  it('should keep the live file list for galleries present in both', () => {
    const merged = mergeGalleries([gallery('beach', ['1.jpg', '2.jpg'])], [gallery('beach', ['1.jpg'])]);

    expect(merged).toEqual([
      { name: 'beach', fileCount: 2, files: ['1.jpg', '2.jpg'], source: GallerySource.LIVE, isDownloaded: true }
    ]);
  });

  it('should fall back to downloaded galleries when the live list is empty', () => {
    const merged = mergeGalleries([], [gallery('b'), gallery('a')]);

    expect(merged.map(entry => entry.name)).toEqual(['b', 'a']);
    expect(merged.every(entry => entry.source === GallerySource.DOWNLOADED)).toBe(true);
  });

  it('should return an empty list for empty inputs', () => {
    expect(mergeGalleries([], [])).toEqual([]);
  });

  it('should keep the first entry of a name repeated within one input', () => {
    const merged = mergeGalleries([gallery('a', ['x.jpg']), gallery('a', ['y.jpg'])], []);
    expect(merged).toHaveLength(1);
    expect(merged[0].files).toEqual(['x.jpg']);
  });

  it('should not mutate its inputs', () => {
    const live = [gallery('a', ['x.jpg'])];
    const downloaded = [gallery('a', ['x.jpg']), gallery('b')];
    const snapshot = JSON.stringify({ live, downloaded });

    const merged = mergeGalleries(live, downloaded);
    merged[0].files.push('changed.jpg');

    expect(JSON.stringify({ live, downloaded })).toBe(snapshot);
  });
});

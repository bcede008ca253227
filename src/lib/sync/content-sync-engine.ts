/**
 * Content Sync Engine - bulk download of a friend's docs and images
 *
 * Lists both media kinds on the peer, then fetches every file through a
 * bounded worker pool and saves it into the per-peer download cache. A
 * failed item never stops its siblings; the outcome reports each one.
 */

import Debug from 'debug';
import type { IPeerClient, Logger } from '../../interfaces';
import type { DownloadCache } from '../gallery/download-cache';
import { CancelledError, WriteError, errorMessage, isPeerSyncError } from '../errors';
import { abortable, promiseWithTimeout, sleep } from '../utils/common';
import { assertSafeSegment } from '../utils/paths';
import { runPool } from '../utils/worker-pool';
import { DEFAULT_SYNC_CONCURRENCY, DEFAULT_WRITE_TIMEOUT, ErrorKind, MediaKind } from '../../types/constants';
import type { DownloadOutcome, Friend, GalleryListing, TransferItem } from '../../types/common';

const debug = Debug('mediapeer:content-sync');

/** Media kinds a bulk download covers */
const SYNC_KINDS: readonly MediaKind[] = [MediaKind.DOCS, MediaKind.IMAGES];

const RETRYABLE = new Set<ErrorKind>([ErrorKind.TIMEOUT, ErrorKind.UNREACHABLE]);

export interface FriendLookup {
  get(peerId: string): Promise<Friend>;
}

export interface ContentSyncEngineOptions {
  client: IPeerClient;
  friends: FriendLookup;
  cache: DownloadCache;
  concurrency?: number;
  retries?: number; // Extra attempts for Timeout and Unreachable failures
  retryDelayMs?: number; // Backoff step; attempt n waits n * retryDelayMs
  writeTimeoutMs?: number;
  logger?: Logger;
}

export interface DownloadAllOptions {
  deadlineMs?: number; // Covers the whole call
  signal?: AbortSignal;
}

export class ContentSyncEngine {
  private client: IPeerClient;
  private friends: FriendLookup;
  private cache: DownloadCache;
  private concurrency: number;
  private retries: number;
  private retryDelayMs: number;
  private writeTimeoutMs: number;
  private logger: Logger;

  constructor(options: ContentSyncEngineOptions) {
    this.client = options.client;
    this.friends = options.friends;
    this.cache = options.cache;
    this.concurrency = options.concurrency ?? DEFAULT_SYNC_CONCURRENCY;
    this.retries = options.retries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.writeTimeoutMs = options.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT;
    this.logger = options.logger || {
      debug: (): void => {},
      info: (): void => {},
      warn: (message: string, ...args: unknown[]): void => console.warn(message, ...args),
      error: (message: string, ...args: unknown[]): void => console.error(message, ...args)
    };
  }

  /**
   * Download every doc and image a friend shares.
   *
   * Resolves with an outcome even when every item fails. When the deadline
   * passes or `signal` aborts, items still running or not yet started are
   * reported as Cancelled and completed ones are kept.
   * @throws NotFoundError when the peer is not a friend
   */
  async downloadAll(peerId: string, options: DownloadAllOptions = {}): Promise<DownloadOutcome> {
    await this.friends.get(peerId);

    const controller = new AbortController();
    const abort = (): void => controller.abort();
    const { signal: callerSignal, deadlineMs } = options;
    if (callerSignal?.aborted) {
      abort();
    } else {
      callerSignal?.addEventListener('abort', abort, { once: true });
    }
    const deadline = deadlineMs !== undefined ? setTimeout(abort, deadlineMs) : undefined;
    const signal = controller.signal;

    const outcome: DownloadOutcome = {
      peerId,
      docsDownloaded: 0,
      imagesDownloaded: 0,
      attempted: 0,
      savedFiles: [],
      errors: []
    };

    try {
      const items = await this.collectItems(peerId, signal, outcome);
      debug(`Scheduling ${items.length} transfers from ${peerId}`);

      const unstarted = await runPool(
        items,
        async item => {
          outcome.attempted++;
          try {
            const savedPath = await this.transfer(peerId, item, signal);
            outcome.savedFiles.push(savedPath);
            if (item.kind === MediaKind.DOCS) {
              outcome.docsDownloaded++;
            } else {
              outcome.imagesDownloaded++;
            }
          } catch (error) {
            this.recordError(outcome, `${item.gallery}/${item.filename}`, error);
          }
        },
        { concurrency: this.concurrency, signal }
      );

      for (const item of unstarted) {
        outcome.attempted++;
        this.recordError(
          outcome,
          `${item.gallery}/${item.filename}`,
          new CancelledError('Bulk download cancelled before this file started')
        );
      }
    } finally {
      if (deadline) clearTimeout(deadline);
      callerSignal?.removeEventListener('abort', abort);
    }

    this.logger.info(
      `Bulk download from ${peerId}: ${outcome.docsDownloaded} docs, ${outcome.imagesDownloaded} images, ` +
        `${outcome.errors.length} errors of ${outcome.attempted} attempted`
    );
    return outcome;
  }

  /**
   * List docs and images concurrently. A listing that fails becomes one
   * error entry named after its kind.
   */
  private async collectItems(peerId: string, signal: AbortSignal, outcome: DownloadOutcome): Promise<TransferItem[]> {
    const listings = await Promise.all(
      SYNC_KINDS.map(async kind => {
        try {
          const galleries = await abortable(
            this.client.fetchGalleries(peerId, kind, { signal }),
            signal,
            `Listing ${kind} of ${peerId} cancelled`
          );
          return { kind, galleries };
        } catch (error) {
          outcome.attempted++;
          this.recordError(outcome, kind, error);
          return { kind, galleries: [] };
        }
      })
    );

    const items: TransferItem[] = [];
    for (const { kind, galleries } of listings) {
      items.push(...toItems(kind, galleries));
    }
    return items;
  }

  private async transfer(peerId: string, item: TransferItem, signal: AbortSignal): Promise<string> {
    assertSafeSegment('gallery name', item.gallery);
    assertSafeSegment('filename', item.filename);

    const data = await this.fetchWithRetry(peerId, item, signal);

    const cancelMessage = `Saving ${item.gallery}/${item.filename} cancelled`;
    if (signal.aborted) {
      throw new CancelledError(cancelMessage);
    }

    // An abandoned write may still land on disk; it is not counted as saved
    try {
      return await abortable(
        promiseWithTimeout(
          this.cache.save(peerId, item.kind, item.gallery, item.filename, data),
          this.writeTimeoutMs,
          `Writing ${item.gallery}/${item.filename} timed out`
        ),
        signal,
        cancelMessage
      );
    } catch (error) {
      if (isPeerSyncError(error)) throw error;
      throw new WriteError(`Failed to save ${item.gallery}/${item.filename}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async fetchWithRetry(peerId: string, item: TransferItem, signal: AbortSignal): Promise<Buffer> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await abortable(
          this.client.fetchFile(peerId, item.kind, item.gallery, item.filename, { signal }),
          signal,
          `Download of ${item.gallery}/${item.filename} cancelled`
        );
      } catch (error) {
        const retryable = isPeerSyncError(error) && RETRYABLE.has(error.kind);
        if (!retryable || attempt >= this.retries || signal.aborted) throw error;

        debug(`Retrying ${item.gallery}/${item.filename} after ${errorMessage(error)}`);
        await sleep(this.retryDelayMs * (attempt + 1));
        if (signal.aborted) {
          throw new CancelledError(`Download of ${item.gallery}/${item.filename} cancelled`);
        }
      }
    }
  }

  private recordError(outcome: DownloadOutcome, item: string, error: unknown): void {
    const kind = isPeerSyncError(error) ? error.kind : ErrorKind.PROTOCOL;
    outcome.errors.push({ item, reason: errorMessage(error), kind });
    debug(`${item} failed (${kind}): ${errorMessage(error)}`);
  }
}

/**
 * Files of every gallery, gallery by gallery in listing order
 */
function toItems(kind: MediaKind, galleries: GalleryListing[]): TransferItem[] {
  const items: TransferItem[] = [];
  for (const gallery of galleries) {
    for (const filename of gallery.files) {
      items.push({ kind, gallery: gallery.name, filename });
    }
  }
  return items;
}

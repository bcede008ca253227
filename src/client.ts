import http from "node:http";
import { EventEmitter } from "node:events";
import Debug from "debug";
import { z } from "zod";
import type { AddressBook, IPeerClient, Logger, ProbeResult, RequestOptions } from "./interfaces";
import { ConnectionDescriptor } from "./lib/connection/descriptor";
import {
  docSchema,
  docsSchema,
  friendsSchema,
  galleriesSchema,
  galleryListingSchema,
  nodeInfoSchema,
} from "./lib/connection/schemas";
import {
  CancelledError,
  NotFoundError,
  ProtocolError,
  TimeoutError,
  UnreachableError,
  errorMessage,
  isPeerSyncError,
} from "./lib/errors";
import { safeJSONParse } from "./lib/utils/common";
import { DEFAULT_MAX_RESPONSE_BYTES, DEFAULT_REQUEST_TIMEOUT, MediaKind } from "./types/constants";
import type { DocContent, DocSummary, Friend, GalleryListing, NodeInfo } from "./types/common";

const debug = Debug("mediapeer:client");

export interface PeerClientOptions {
  addressBook?: AddressBook; // Resolves peer IDs for the peerID-addressed calls
  requestTimeoutMs?: number; // Hard ceiling per request
  maxResponseBytes?: number; // Larger bodies fail with ProtocolError
  logger?: Logger;
}

interface Target {
  baseUrl: string;
  label: string; // peer ID or host:port, for messages
}

export interface PeerClient {
  on(event: "contact", listener: (peerId: string, at: number) => void): this;
  emit(event: "contact", peerId: string, at: number): boolean;
}

/**
 * Outbound HTTP client for the /peer endpoints of remote nodes.
 *
 * Every call is bounded by `requestTimeoutMs`. The client never retries;
 * after each successful call it emits `contact` so the friend registry can
 * update lastSeen.
 */
export class PeerClient extends EventEmitter implements IPeerClient {
  private addressBook?: AddressBook;
  private requestTimeoutMs: number;
  private maxResponseBytes: number;
  private logger: Logger;

  constructor(options: PeerClientOptions = {}) {
    super();
    this.addressBook = options.addressBook;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT;
    this.maxResponseBytes = options.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;

    // Only warnings and errors reach the console when no logger is provided
    this.logger = options.logger || {
      debug: (): void => {},
      info: (): void => {},
      warn: (message: string, ...args: unknown[]): void => console.warn(message, ...args),
      error: (message: string, ...args: unknown[]): void => console.error(message, ...args),
    };
  }

  /**
   * Set the address book used to resolve peer IDs. The friend registry is
   * usually created after the client, since it needs the client for its
   * handshake.
   */
  public useAddressBook(addressBook: AddressBook): void {
    this.addressBook = addressBook;
  }

  public async fetchInfo(descriptor: ConnectionDescriptor, options: RequestOptions = {}): Promise<NodeInfo> {
    const target = { baseUrl: descriptor.baseUrl(), label: descriptor.peerId };
    const info = await this.requestJson(target, "/peer/info", nodeInfoSchema, options);
    this.emit("contact", info.peerId, Date.now());
    return info;
  }

  public async fetchGalleries(
    peerId: string,
    kind: MediaKind,
    options: RequestOptions = {}
  ): Promise<GalleryListing[]> {
    return this.peerJson(peerId, `/peer/galleries/${kind}`, galleriesSchema, options);
  }

  public async fetchGallery(
    peerId: string,
    kind: MediaKind,
    gallery: string,
    options: RequestOptions = {}
  ): Promise<GalleryListing> {
    const pathname = `/peer/galleries/${kind}/${encodeURIComponent(gallery)}`;
    return this.peerJson(peerId, pathname, galleryListingSchema, options);
  }

  public async fetchFile(
    peerId: string,
    kind: MediaKind,
    gallery: string,
    filename: string,
    options: RequestOptions = {}
  ): Promise<Buffer> {
    const target = await this.resolveTarget(peerId);
    const pathname = `/peer/galleries/${kind}/${encodeURIComponent(gallery)}/${encodeURIComponent(filename)}`;
    const body = await this.request(target, pathname, options);
    this.emit("contact", peerId, Date.now());
    return body;
  }

  public async fetchDocs(peerId: string, options: RequestOptions = {}): Promise<DocSummary[]> {
    return this.peerJson(peerId, "/peer/docs", docsSchema, options);
  }

  public async fetchDoc(peerId: string, filename: string, options: RequestOptions = {}): Promise<DocContent> {
    return this.peerJson(peerId, `/peer/docs/${encodeURIComponent(filename)}`, docSchema, options);
  }

  public async fetchFriendsOf(peerId: string, options: RequestOptions = {}): Promise<Friend[]> {
    return this.peerJson(peerId, "/peer/friends", friendsSchema, options);
  }

  public async probe(host: string, port: number): Promise<ProbeResult> {
    const target = { baseUrl: `http://${host}:${port}`, label: `${host}:${port}` };
    try {
      const node = await this.requestJson(target, "/peer/info", nodeInfoSchema, {});
      this.emit("contact", node.peerId, Date.now());
      return { reachable: true, node };
    } catch (error) {
      this.logger.debug(`Probe of ${target.label} failed: ${errorMessage(error)}`);
      return { reachable: false, error: errorMessage(error) };
    }
  }

  private async resolveTarget(peerId: string): Promise<Target> {
    if (!this.addressBook) {
      throw new NotFoundError(`No address known for peer ${peerId}`);
    }
    const descriptor = await this.addressBook.resolve(peerId);
    return { baseUrl: descriptor.baseUrl(), label: peerId };
  }

  private async peerJson<T>(
    peerId: string,
    pathname: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions
  ): Promise<T> {
    const target = await this.resolveTarget(peerId);
    const value = await this.requestJson(target, pathname, schema, options);
    this.emit("contact", peerId, Date.now());
    return value;
  }

  private async requestJson<T>(
    target: Target,
    pathname: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions
  ): Promise<T> {
    const body = await this.request(target, pathname, options);
    const text = body.toString("utf8");
    const parsed = safeJSONParse(text);
    if (parsed === null && text.trim() !== "null") {
      throw new ProtocolError(`Peer ${target.label} sent invalid JSON for ${pathname}`);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ProtocolError(`Peer ${target.label} sent an unexpected ${pathname} response: ${issues}`);
    }
    return result.data;
  }

  /**
   * GET a path on a peer and buffer the body
   */
  private request(target: Target, pathname: string, options: RequestOptions): Promise<Buffer> {
    const url = `${target.baseUrl}${pathname}`;
    const { signal } = options;
    debug(`GET ${url}`);

    return new Promise<Buffer>((resolve, reject) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (error: Error | null, body?: Buffer): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        if (error) {
          debug(`GET ${url} failed: ${error.message}`);
          reject(error);
        } else {
          resolve(body ?? Buffer.alloc(0));
        }
      };

      const req = http.get(url, { headers: { accept: "application/json, */*" } }, (res: http.IncomingMessage) => {
        const status = res.statusCode ?? 0;
        if (status === 404 || status === 410) {
          res.resume();
          finish(new NotFoundError(`Peer ${target.label} has no ${pathname}`));
          return;
        }
        if (status < 200 || status >= 300) {
          res.resume();
          finish(new ProtocolError(`Peer ${target.label} answered ${status} ${res.statusMessage ?? ""} for ${pathname}`.trim()));
          return;
        }

        const chunks: Buffer[] = [];
        let receivedBytes = 0;

        res.on("data", (chunk: Buffer) => {
          receivedBytes += chunk.length;
          if (receivedBytes > this.maxResponseBytes) {
            finish(new ProtocolError(`Peer ${target.label} response for ${pathname} exceeds ${this.maxResponseBytes} bytes`));
            req.destroy();
            return;
          }
          chunks.push(chunk);
        });

        res.on("end", () => finish(null, Buffer.concat(chunks)));
        res.on("error", (err: Error) => finish(this.transportError(target, err)));
      });

      req.on("error", (err: Error) => finish(this.transportError(target, err)));

      timer = setTimeout(() => {
        finish(new TimeoutError(`Peer ${target.label} did not answer ${pathname} within ${this.requestTimeoutMs} ms`));
        req.destroy();
      }, this.requestTimeoutMs);

      function onAbort(): void {
        finish(new CancelledError(`Request ${pathname} to peer ${target.label} was cancelled`));
        req.destroy();
      }

      if (signal) {
        if (signal.aborted) {
          onAbort();
        } else {
          signal.addEventListener("abort", onAbort, { once: true });
        }
      }
    });
  }

  private transportError(target: Target, error: Error): Error {
    if (isPeerSyncError(error)) return error;
    const code = "code" in error && typeof error.code === "string" ? error.code : "EUNKNOWN";
    return new UnreachableError(`Peer ${target.label} is unreachable (${code}): ${error.message}`, { cause: error });
  }
}

/**
 * TLV over HTTP polling.
 *
 * Outbound packets queue in `egress` until the peer's next GET drains them.
 * Inbound packets arrive as POST bodies, one frame per request. GET and POST
 * share one URL path. There is no push: delivery latency is the peer's poll
 * interval.
 */

import type { Readable } from "node:stream";
import { ConnectionError, EgressOverflowError } from "../shared/errors.js";
import { decodePacket, type Packet } from "../shared/packet.js";
import type { OverflowPolicy, PacketCallback } from "../shared/types.js";
import type { DispatchRequest, HttpDispatcher, RouteHandler, RouteRegistration } from "./dispatcher.js";
import { createLogger, type Logger } from "./log.js";

export const DEFAULT_MAX_EGRESS_BYTES = 16 * 1024 * 1024;

export interface HttpTunnelOptions {
  urlPath?: string;
  callback?: PacketCallback;
  /** Upper bound on queued egress bytes. */
  maxEgressBytes?: number;
  overflowPolicy?: OverflowPolicy;
  log?: Logger;
}

export class HttpTunnelTransport implements RouteHandler {
  callback: PacketCallback | undefined;
  readonly maxEgressBytes: number;
  readonly overflowPolicy: OverflowPolicy;

  private registration: RouteRegistration | null;
  private egress: Buffer[] = [];
  private egressBytes = 0;
  private log: Logger;

  constructor(dispatcher: HttpDispatcher, options: HttpTunnelOptions = {}) {
    this.callback = options.callback;
    this.maxEgressBytes = options.maxEgressBytes ?? DEFAULT_MAX_EGRESS_BYTES;
    this.overflowPolicy = options.overflowPolicy ?? "reject";
    this.log = options.log ?? createLogger("tunnel");
    this.registration = dispatcher.register(normalizePath(options.urlPath ?? "/"), this);
  }

  get urlPath(): string {
    return this.requireRegistration().path;
  }

  get pendingBytes(): number {
    return this.egressBytes;
  }

  get pendingPackets(): number {
    return this.egress.length;
  }

  /** Queue a packet for the next GET. Never blocks, never touches the network. */
  send(packet: Packet): void {
    this.requireRegistration();
    const frame = packet.encode();

    if (this.egressBytes + frame.length > this.maxEgressBytes) {
      if (this.overflowPolicy === "reject" || frame.length > this.maxEgressBytes) {
        throw new EgressOverflowError(this.egressBytes + frame.length, this.maxEgressBytes);
      }
      let dropped = 0;
      while (this.egressBytes + frame.length > this.maxEgressBytes) {
        const oldest = this.egress.shift();
        if (!oldest) break;
        this.egressBytes -= oldest.length;
        dropped++;
      }
      this.log.warn("egress full, dropped oldest packets", { dropped, path: this.urlPath });
    }

    this.egress.push(frame);
    this.egressBytes += frame.length;
  }

  /** Move both handlers to `urlPath`; the old path stops being served. */
  setUrlPath(urlPath: string): void {
    this.requireRegistration().moveTo(normalizePath(urlPath));
  }

  /** Drop the path registration. The dispatcher keeps running. */
  close(): void {
    this.requireRegistration().remove();
    this.registration = null;
  }

  handleGet(request: DispatchRequest): boolean {
    if (!this.registration || request.path !== this.registration.path) return false;

    const body = this.drainEgress();
    request.sendStatus(200);
    request.response.write(body);
    this.log.debug("egress drained", { path: request.path, bytes: body.length });
    return true;
  }

  async handlePost(request: DispatchRequest): Promise<boolean> {
    if (!this.registration || request.path !== this.registration.path) return false;

    const length = parseContentLength(request.headers["content-length"]);
    if (length === null) {
      request.sendStatus(411);
      return true;
    }
    const data = await readBody(request.body, length);
    if (!this.registration || request.path !== this.registration.path) return false;

    request.sendStatus(200);
    try {
      await writeBestEffort(request, Buffer.concat(this.egress));
    } catch (err) {
      this.log.debug("POST response write failed", {
        path: request.path,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    const packet = decodePacket(data);
    this.log.debug("packet received", { path: request.path, type: packet.type, length: packet.length });
    if (this.callback) {
      await this.callback(packet);
    }
    return true;
  }

  private drainEgress(): Buffer {
    const body = Buffer.concat(this.egress);
    this.egress = [];
    this.egressBytes = 0;
    return body;
  }

  private requireRegistration(): RouteRegistration {
    if (!this.registration) {
      throw new ConnectionError("tunnel is closed");
    }
    return this.registration;
  }
}

/** Ensure a leading slash. */
export function normalizePath(urlPath: string): string {
  return urlPath.startsWith("/") ? urlPath : `/${urlPath}`;
}

function parseContentLength(header: string | undefined): number | null {
  if (header === undefined || !/^\d+$/.test(header.trim())) return null;
  return Number(header.trim());
}

/**
 * Keep the first `length` bytes of the body (fewer if it ends early).
 * The stream is always read to its end.
 */
async function readBody(body: Readable, length: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).subarray(0, length);
}

function writeBestEffort(request: DispatchRequest, body: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    request.response.write(body, (err) => (err ? reject(err) : resolve()));
  });
}

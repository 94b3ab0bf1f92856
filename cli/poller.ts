/**
 * Agent side of the HTTP tunnel.
 *
 * GET drains whatever the controller queued; POST delivers one packet.
 * The POST response carries a copy of the controller's queue, which the next
 * GET returns again, so only GET bodies are treated as deliveries.
 */

import { ConnectionError } from "../shared/errors.js";
import { splitPackets, type Packet } from "../shared/packet.js";
import type { PacketCallback } from "../shared/types.js";

export interface TunnelPollerOptions {
  url: string;
  intervalMs?: number;
  onPacket?: PacketCallback;
  onError?: (err: Error) => void;
  fetch?: typeof fetch;
}

export class TunnelPoller {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private stopped = true;
  private readonly intervalMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private opts: TunnelPollerOptions) {
    this.intervalMs = opts.intervalMs ?? 1000;
    this.fetchImpl = opts.fetch ?? fetch;
  }

  get running(): boolean {
    return !this.stopped;
  }

  /** One GET: returns the packets the controller had queued. */
  async poll(): Promise<Packet[]> {
    const res = await this.request("GET");
    const body = Buffer.from(await res.arrayBuffer());
    return splitPackets(body);
  }

  /** One POST carrying `packet`. */
  async post(packet: Packet): Promise<void> {
    const res = await this.request("POST", packet.encode());
    await res.arrayBuffer();
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.schedule(0);
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(delay: number): void {
    if (this.stopped) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delay);
  }

  private async tick(): Promise<void> {
    try {
      const packets = await this.poll();
      for (const packet of packets) {
        await this.opts.onPacket?.(packet);
      }
    } catch (err) {
      this.opts.onError?.(err instanceof Error ? err : new Error(String(err)));
    }
    this.schedule(this.intervalMs);
  }

  private async request(method: "GET" | "POST", body?: Buffer): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.opts.url, {
        method,
        headers: body ? { "Content-Type": "application/octet-stream" } : undefined,
        body,
      });
    } catch (err) {
      throw new ConnectionError(
        `${method} ${this.opts.url} failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
    if (!res.ok) {
      throw new ConnectionError(`${method} ${this.opts.url} returned ${res.status}`);
    }
    return res;
  }
}

/**
 * TLV framing over one connected stream socket.
 *
 * The socket is read in flowing mode: every chunk lands in `pending` and
 * frames are cut from there, so any chunking the kernel picks (down to one
 * byte at a time) yields the same packets. The socket is paused while
 * `pending` holds `maxBufferedBytes` or more and nobody is waiting for data. Writes are sliced into
 * `writeChunkSize` pieces and each piece is awaited before the next one is
 * handed over; a socket whose buffer is full delays that callback, which is
 * the "would block, try again" case.
 */

import * as net from "node:net";
import type { Duplex } from "node:stream";
import { ConnectionError } from "./errors.js";
import { HEADER_SIZE, TYPE_SIZE, decodePacket, type Packet } from "./packet.js";

export const DEFAULT_WRITE_CHUNK_SIZE = 64 * 1024;
export const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;

export interface SocketTransportOptions {
  /** Largest slice handed to a single socket write. */
  writeChunkSize?: number;
  /** Unread bytes at which the socket stops being read until a read consumes them. */
  maxBufferedBytes?: number;
}

export interface ReadOptions {
  /**
   * With `block: false` the read resolves `null` when the 4 type bytes have
   * not arrived yet. Bytes already received stay buffered for the next call.
   */
  block?: boolean;
}

export class FramedSocketTransport {
  private socket: Duplex | null;
  private pending: Buffer = Buffer.alloc(0);
  private ended = false;
  private error: Error | null = null;
  private wake: (() => void) | null = null;
  private readChain: Promise<unknown> = Promise.resolve();
  private writeChain: Promise<unknown> = Promise.resolve();
  private paused = false;
  private readonly writeChunkSize: number;
  private readonly maxBufferedBytes: number;

  constructor(socket: Duplex, options: SocketTransportOptions = {}) {
    const writeChunkSize = options.writeChunkSize ?? DEFAULT_WRITE_CHUNK_SIZE;
    if (!Number.isInteger(writeChunkSize) || writeChunkSize < 1) {
      throw new RangeError(`writeChunkSize must be a positive integer, got ${writeChunkSize}`);
    }
    const maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
    if (!Number.isInteger(maxBufferedBytes) || maxBufferedBytes < HEADER_SIZE) {
      throw new RangeError(`maxBufferedBytes must be an integer >= ${HEADER_SIZE}, got ${maxBufferedBytes}`);
    }
    this.writeChunkSize = writeChunkSize;
    this.maxBufferedBytes = maxBufferedBytes;
    this.socket = socket;

    socket.on("data", (chunk: Buffer) => {
      this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
      if (!this.paused && this.pending.length >= this.maxBufferedBytes) {
        this.paused = true;
        socket.pause();
      }
      this.notify();
    });
    socket.on("end", () => {
      this.ended = true;
      this.notify();
    });
    socket.on("close", () => {
      this.ended = true;
      this.notify();
    });
    socket.on("error", (err: Error) => {
      this.error = err;
      this.notify();
    });
  }

  get closed(): boolean {
    return this.socket === null;
  }

  get remoteAddress(): string | undefined {
    const socket = this.socket;
    if (socket instanceof net.Socket && socket.remoteAddress) {
      return `${socket.remoteAddress}:${socket.remotePort}`;
    }
    return undefined;
  }

  /** Bytes received but not yet consumed by a read. */
  get bufferedBytes(): number {
    return this.pending.length;
  }

  async send(packet: Packet): Promise<void> {
    await this.sendRaw(packet.encode());
  }

  /** Write arbitrary bytes with the same write loop as `send`, unframed. */
  sendRaw(data: Uint8Array): Promise<void> {
    const result = this.writeChain.then(async () => {
      const socket = this.requireSocket();
      for (let offset = 0; offset < data.length; offset += this.writeChunkSize) {
        await writeChunk(socket, data.subarray(offset, offset + this.writeChunkSize));
      }
    });
    this.writeChain = result.catch(() => undefined);
    return result;
  }

  /** Read one packet. Resolves `null` only for a non-blocking probe with no data. */
  read(options: ReadOptions = {}): Promise<Packet | null> {
    const block = options.block ?? true;
    return this.enqueueRead(() => this.readFrame(block, false));
  }

  /** Single pass-through read of up to `size` bytes; empty at end of stream. */
  readRaw(size: number): Promise<Buffer> {
    return this.enqueueRead(async () => {
      while (this.pending.length === 0) {
        if (this.checkReadable()) return Buffer.alloc(0);
        await this.waitForData();
      }
      return this.take(Math.min(size, this.pending.length));
    });
  }

  /** Yield packets until the peer closes the stream on a frame boundary. */
  async *packets(): AsyncGenerator<Packet, void, undefined> {
    while (true) {
      const packet = await this.enqueueRead(() => this.readFrame(true, true));
      if (!packet) return;
      yield packet;
    }
  }

  close(): void {
    const socket = this.requireSocket();
    this.socket = null;
    socket.destroy();
    this.notify();
  }

  private async readFrame(block: boolean, endOk: boolean): Promise<Packet | null> {
    this.requireSocket();

    if (!block && this.pending.length < TYPE_SIZE) {
      if (this.checkReadable()) {
        throw new ConnectionError(
          `peer closed the stream with ${this.pending.length} of ${HEADER_SIZE} bytes pending`,
        );
      }
      return null;
    }

    if (endOk) {
      while (this.pending.length === 0) {
        if (this.checkReadable()) return null;
        await this.waitForData();
      }
    }

    const header = await this.readExactly(HEADER_SIZE);
    const length = header.readUInt32BE(TYPE_SIZE);
    const payload = await this.readExactly(length);
    return decodePacket(Buffer.concat([header, payload]));
  }

  private async readExactly(size: number): Promise<Buffer> {
    while (this.pending.length < size) {
      if (this.checkReadable()) {
        throw new ConnectionError(
          `peer closed the stream with ${this.pending.length} of ${size} bytes pending`,
        );
      }
      await this.waitForData();
    }
    return this.take(size);
  }

  private take(size: number): Buffer {
    const out = this.pending.subarray(0, size);
    this.pending = this.pending.subarray(size);
    if (this.pending.length < this.maxBufferedBytes) this.resumeReading();
    return out;
  }

  private resumeReading(): void {
    if (!this.paused || !this.socket) return;
    this.paused = false;
    this.socket.resume();
  }

  /**
   * Throws when the transport is closed or the socket failed.
   * Returns true when the peer has ended the stream.
   */
  private checkReadable(): boolean {
    this.requireSocket();
    if (this.error) {
      throw new ConnectionError(`socket error: ${this.error.message}`, { cause: this.error });
    }
    return this.ended;
  }

  private requireSocket(): Duplex {
    if (!this.socket) {
      throw new ConnectionError("socket is not connected");
    }
    return this.socket;
  }

  private enqueueRead<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.readChain.then(fn);
    // Keep the chain alive after a failed read; the caller still sees the rejection.
    this.readChain = result.catch(() => undefined);
    return result;
  }

  private waitForData(): Promise<void> {
    this.resumeReading();
    return new Promise((resolve) => {
      this.wake = resolve;
    });
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

function writeChunk(socket: Duplex, chunk: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    if (socket.destroyed || !socket.writable) {
      reject(new ConnectionError("socket is not writable"));
      return;
    }
    socket.write(chunk, (err) => {
      if (err) {
        reject(new ConnectionError(`write failed: ${err.message}`, { cause: err }));
      } else {
        resolve();
      }
    });
  });
}

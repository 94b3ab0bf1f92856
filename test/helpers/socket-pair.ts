import { Duplex } from "node:stream";

/**
 * In-process stand-in for one end of a connected stream socket.
 * Bytes written here are pushed to the peer's readable side.
 */
export class PairedSocket extends Duplex {
  peer: PairedSocket | null = null;
  /** Every chunk handed to _write, in order. */
  readonly writes: Buffer[] = [];
  private peerEnded = false;

  constructor(private readonly writeDelay = false) {
    super({ highWaterMark: writeDelay ? 1 : 16 * 1024 });
  }

  override _read(): void {}

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const deliver = () => {
      this.writes.push(Buffer.from(chunk));
      this.peer?.push(chunk);
      callback();
    };
    if (this.writeDelay) {
      setImmediate(deliver);
    } else {
      deliver();
    }
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.endPeer();
    callback();
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.endPeer();
    callback(error);
  }

  private endPeer(): void {
    if (this.peerEnded || !this.peer) return;
    this.peerEnded = true;
    this.peer.push(null);
  }
}

export function createSocketPair(options: { writeDelay?: boolean } = {}): [PairedSocket, PairedSocket] {
  const a = new PairedSocket(options.writeDelay);
  const b = new PairedSocket(options.writeDelay);
  a.peer = b;
  b.peer = a;
  return [a, b];
}

/** Let pending stream callbacks and 'data' events run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

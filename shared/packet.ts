/**
 * TLV packet codec.
 *
 * Wire format: [4 bytes uint32 BE: type][4 bytes uint32 BE: length][payload]
 * Identical bytes travel over raw sockets and inside HTTP bodies.
 */

import { FormatError } from "./errors.js";

export const TYPE_SIZE = 4;
export const HEADER_SIZE = 8;
export const MAX_UINT32 = 0xffff_ffff;

function assertType(type: number): void {
  if (!Number.isInteger(type) || type < 0 || type > MAX_UINT32) {
    throw new RangeError(`Packet type out of range: ${type}`);
  }
}

export class Packet {
  readonly type: number;
  readonly payload: Buffer;

  constructor(type: number, payload: Uint8Array = Buffer.alloc(0)) {
    assertType(type);
    if (payload.length > MAX_UINT32) {
      throw new RangeError(`Payload too large for u32 length: ${payload.length}`);
    }
    this.type = type;
    this.payload = Buffer.from(payload);
  }

  /** Build a packet from a UTF-8 string or raw bytes. */
  static from(type: number, data: string | Uint8Array = ""): Packet {
    return new Packet(type, typeof data === "string" ? Buffer.from(data, "utf-8") : data);
  }

  static decode(buffer: Uint8Array): Packet {
    return decodePacket(buffer);
  }

  get length(): number {
    return this.payload.length;
  }

  encode(): Buffer {
    return encodePacket(this.type, this.payload);
  }

  equals(other: Packet): boolean {
    return this.type === other.type && this.payload.equals(other.payload);
  }

  toString(): string {
    return `Packet(type=${this.type}, length=${this.length})`;
  }
}

/** Serialize (type, payload) into its wire form. */
export function encodePacket(type: number, payload: Uint8Array = Buffer.alloc(0)): Buffer {
  assertType(type);
  const header = Buffer.alloc(HEADER_SIZE);
  header.writeUInt32BE(type, 0);
  header.writeUInt32BE(payload.length, TYPE_SIZE);
  return Buffer.concat([header, payload]);
}

/**
 * Parse one complete frame from the start of `buffer`.
 * Bytes after the frame are ignored.
 */
export function decodePacket(buffer: Uint8Array): Packet {
  const buf = Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  if (buf.length < HEADER_SIZE) {
    throw new FormatError(`Packet too short: ${buf.length} < ${HEADER_SIZE} header bytes`);
  }
  const type = buf.readUInt32BE(0);
  const length = buf.readUInt32BE(TYPE_SIZE);
  if (buf.length < HEADER_SIZE + length) {
    throw new FormatError(
      `Packet truncated: declared ${length} payload bytes, got ${buf.length - HEADER_SIZE}`,
    );
  }
  return new Packet(type, buf.subarray(HEADER_SIZE, HEADER_SIZE + length));
}

/**
 * Decode a concatenation of frames, e.g. a drained egress body.
 * A trailing partial frame is a FormatError.
 */
export function splitPackets(buffer: Uint8Array): Packet[] {
  const packets: Packet[] = [];
  let offset = 0;
  while (offset < buffer.length) {
    const packet = decodePacket(buffer.subarray(offset));
    packets.push(packet);
    offset += HEADER_SIZE + packet.length;
  }
  return packets;
}

import * as readline from "node:readline";
import type { Readable } from "node:stream";
import { Packet, MAX_UINT32 } from "../shared/packet.js";
import type { FramedSocketTransport } from "../shared/socket-transport.js";
import { cyan, dim } from "../server/log.js";

/**
 * Parse a console line of the form `<type> [text]`.
 * A `hex:` prefix on the text sends raw bytes, e.g. `7 hex:deadbeef`.
 * Returns null for blank lines.
 */
export function parseCommandLine(line: string): Packet | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  const match = /^(\S+)(?:\s(.*))?$/.exec(trimmed);
  const typeStr = match?.[1] ?? "";
  const text = match?.[2] ?? "";

  const type = Number(typeStr);
  if (!/^(0x[0-9a-f]+|\d+)$/i.test(typeStr) || type > MAX_UINT32) {
    throw new Error(`Invalid packet type: ${typeStr}`);
  }

  if (text.startsWith("hex:")) {
    const hex = text.slice(4).replace(/\s+/g, "");
    if (hex.length % 2 !== 0 || !/^[0-9a-f]*$/i.test(hex)) {
      throw new Error(`Invalid hex payload: ${hex}`);
    }
    return new Packet(type, Buffer.from(hex, "hex"));
  }
  return Packet.from(type, text);
}

/** One-line rendering: printable payloads as quoted text, anything else as hex. */
export function formatPacket(packet: Packet): string {
  const printable = packet.payload.every((b) => b === 0x09 || (b >= 0x20 && b < 0x7f));
  const payload = printable
    ? JSON.stringify(packet.payload.toString("latin1"))
    : `hex:${packet.payload.toString("hex")}`;
  return `type=${packet.type} length=${packet.length} payload=${payload}`;
}

export function printPacket(packet: Packet, from?: string): void {
  const prefix = from ? dim(`[${from}] `) : "";
  console.log(`${prefix}${cyan("<<")} ${formatPacket(packet)}`);
}

/**
 * Read `<type> [text]` lines from `input` and hand each packet to `send`.
 * Errors are reported on stderr and reading continues.
 */
export function attachConsole(
  send: (packet: Packet) => void | Promise<void>,
  input: Readable = process.stdin,
): readline.Interface {
  const rl = readline.createInterface({ input, terminal: false });

  rl.on("line", (line) => {
    const packet = parseOrReport(line);
    if (!packet) return;

    new Promise<void>((resolve) => resolve(send(packet))).catch((err: unknown) => {
      process.stderr.write(`Send failed: ${err instanceof Error ? err.message : String(err)}\n`);
    });
  });

  return rl;
}

function parseOrReport(line: string): Packet | null {
  try {
    return parseCommandLine(line);
  } catch (err) {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    return null;
  }
}

/** Print an error the way every command reports failures, then exit 1. */
export function exitWithError(err: unknown): never {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
}

/** Print every packet from `transport` until it ends; errors end the session. */
export async function readPackets(transport: FramedSocketTransport, peer: string): Promise<void> {
  try {
    for await (const packet of transport.packets()) {
      printPacket(packet, peer);
    }
    console.log(dim(`${peer} closed the connection`));
  } catch (err) {
    process.stderr.write(`${peer}: ${err instanceof Error ? err.message : String(err)}\n`);
  } finally {
    if (!transport.closed) transport.close();
  }
}

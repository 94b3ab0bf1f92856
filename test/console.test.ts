import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Packet } from "../shared/packet.js";
import { formatPacket, parseCommandLine } from "../cli/console.js";

describe("parseCommandLine", () => {
  it("reads a decimal type and text payload", () => {
    const packet = parseCommandLine("1 PING");
    assert.ok(packet?.equals(Packet.from(1, "PING")));
  });

  it("keeps inner whitespace of the text", () => {
    assert.equal(parseCommandLine("2 hello  world")?.payload.toString(), "hello  world");
  });

  it("accepts hex types and hex payloads", () => {
    const packet = parseCommandLine("0x10 hex:dead beef");
    assert.equal(packet?.type, 16);
    assert.deepEqual(packet?.payload, Buffer.from([0xde, 0xad, 0xbe, 0xef]));
  });

  it("allows an empty payload", () => {
    assert.equal(parseCommandLine("7")?.length, 0);
  });

  it("ignores blank lines", () => {
    assert.equal(parseCommandLine("   "), null);
  });

  it("rejects bad types", () => {
    assert.throws(() => parseCommandLine("abc"), { message: "Invalid packet type: abc" });
    assert.throws(() => parseCommandLine("4294967296 x"), { message: "Invalid packet type: 4294967296" });
  });

  it("rejects odd-length hex", () => {
    assert.throws(() => parseCommandLine("3 hex:abc"), { message: "Invalid hex payload: abc" });
  });
});

describe("formatPacket", () => {
  it("quotes printable payloads", () => {
    assert.equal(formatPacket(Packet.from(1, 'say "hi"')), 'type=1 length=8 payload="say \\"hi\\""');
  });

  it("falls back to hex for binary payloads", () => {
    assert.equal(formatPacket(new Packet(2, Buffer.from([0, 1]))), "type=2 length=2 payload=hex:0001");
  });

  it("prints an empty payload as an empty string", () => {
    assert.equal(formatPacket(Packet.from(0xffffffff, "")), 'type=4294967295 length=0 payload=""');
  });
});

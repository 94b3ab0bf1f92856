import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type * as net from "node:net";
import { ConnectionError } from "../shared/errors.js";
import { Packet } from "../shared/packet.js";
import { dial, listen, parseAddress } from "../shared/dial.js";
import type { FramedSocketTransport } from "../shared/socket-transport.js";
import { recordingLogger } from "./helpers/fake-request.js";

function boundPort(server: net.Server): number {
  const address = server.address();
  assert.ok(address && typeof address === "object");
  return address.port;
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe("parseAddress", () => {
  it("splits host and port", () => {
    assert.deepEqual(parseAddress("10.1.2.3:4444"), { host: "10.1.2.3", port: 4444 });
  });

  it("unwraps bracketed IPv6 hosts", () => {
    assert.deepEqual(parseAddress("[::1]:7690"), { host: "::1", port: 7690 });
  });

  it("defaults an empty host to loopback", () => {
    assert.deepEqual(parseAddress(":7690"), { host: "127.0.0.1", port: 7690 });
  });

  it("rejects missing or invalid ports", () => {
    assert.throws(() => parseAddress("localhost"), { message: "Invalid address: localhost" });
    assert.throws(() => parseAddress("localhost:0"), { message: "Invalid port in address: localhost:0" });
    assert.throws(() => parseAddress("localhost:http"), { message: "Invalid port in address: localhost:http" });
  });
});

describe("dial/listen over loopback", () => {
  it("exchanges packets between a dialed agent and the listener", async () => {
    let onAccept: (transport: FramedSocketTransport) => void = () => {};
    const accepted = new Promise<FramedSocketTransport>((resolve) => {
      onAccept = resolve;
    });
    const server = await listen(0, "127.0.0.1", (transport) => onAccept(transport), { log: recordingLogger() });
    const port = boundPort(server);

    const agent = await dial("127.0.0.1", port);
    const controller = await accepted;

    await agent.send(Packet.from(1, "PING"));
    assert.ok((await controller.read())?.equals(Packet.from(1, "PING")));

    await controller.send(Packet.from(2, "PONG"));
    assert.ok((await agent.read())?.equals(Packet.from(2, "PONG")));

    assert.equal(agent.remoteAddress, `127.0.0.1:${port}`);
    assert.match(controller.remoteAddress ?? "", /^127\.0\.0\.1:\d+$/);

    agent.close();
    controller.close();
    await closeServer(server);
  });

  it("reports a refused connection as a ConnectionError", async () => {
    const server = await listen(0, "127.0.0.1", () => {}, { log: recordingLogger() });
    const port = boundPort(server);
    await closeServer(server);

    await assert.rejects(dial("127.0.0.1", port, { timeoutMs: 2000 }), (err: unknown) => {
      assert.ok(err instanceof ConnectionError);
      assert.match(err.message, new RegExp(`^Connection error: failed to connect to 127\\.0\\.0\\.1:${port}: `));
      return true;
    });
  });

  it("rejects when the port is already taken", async () => {
    const server = await listen(0, "127.0.0.1", () => {}, { log: recordingLogger() });

    await assert.rejects(listen(boundPort(server), "127.0.0.1", () => {}), { code: "EADDRINUSE" });

    await closeServer(server);
  });

  it("logs server errors raised after it is listening", async () => {
    const log = recordingLogger();
    const server = await listen(0, "127.0.0.1", () => {}, { log });

    server.emit("error", new Error("accept failed"));

    assert.deepEqual(log.entries, [{ level: "ERROR", msg: "server error", extra: { error: "accept failed" } }]);
    await closeServer(server);
  });
});

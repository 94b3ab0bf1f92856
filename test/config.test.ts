import { after, describe, it } from "node:test";
import assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { intOption, loadConfig } from "../cli/config.js";

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "tlv-relay-config-"));
after(() => fs.rmSync(dir, { recursive: true, force: true }));

function writeConfig(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

describe("loadConfig", () => {
  it("falls back to defaults when the file is missing", () => {
    const config = loadConfig({ file: path.join(dir, "absent.json"), env: {} });

    assert.deepEqual(config, {
      host: "127.0.0.1",
      port: 7690,
      httpPort: 7691,
      httpPath: "/",
      maxEgressBytes: 16 * 1024 * 1024,
      overflowPolicy: "reject",
      pollIntervalMs: 1000,
      connectTimeoutMs: 5000,
    });
  });

  it("reads values from the config file", () => {
    const file = writeConfig("file.json", JSON.stringify({ port: 9000, overflowPolicy: "drop-oldest" }));

    const config = loadConfig({ file, env: {} });

    assert.equal(config.port, 9000);
    assert.equal(config.overflowPolicy, "drop-oldest");
    assert.equal(config.httpPort, 7691);
  });

  it("lets the environment override the file", () => {
    const file = writeConfig("env.json", JSON.stringify({ host: "10.0.0.1", port: 9000 }));

    const config = loadConfig({
      file,
      env: { TLV_RELAY_PORT: "9100", TLV_RELAY_HTTP_PATH: "/c2" },
    });

    assert.equal(config.host, "10.0.0.1");
    assert.equal(config.port, 9100);
    assert.equal(config.httpPath, "/c2");
  });

  it("finds the file through TLV_RELAY_CONFIG", () => {
    const file = writeConfig("via-env.json", JSON.stringify({ httpPort: 8088 }));

    assert.equal(loadConfig({ env: { TLV_RELAY_CONFIG: file } }).httpPort, 8088);
  });

  it("names the offending field when validation fails", () => {
    const file = writeConfig("bad-policy.json", JSON.stringify({ overflowPolicy: "block" }));

    assert.throws(() => loadConfig({ file, env: {} }), /Invalid configuration: overflowPolicy: /);
  });

  it("rejects an out-of-range port from the environment", () => {
    assert.throws(
      () => loadConfig({ file: path.join(dir, "absent.json"), env: { TLV_RELAY_PORT: "70000" } }),
      /Invalid configuration: port: /,
    );
  });

  it("rejects malformed JSON", () => {
    const file = writeConfig("broken.json", "{ port: ");
    assert.throws(() => loadConfig({ file, env: {} }), /Invalid JSON in .*broken\.json: /);
  });

  it("rejects a file that is not an object", () => {
    const file = writeConfig("array.json", "[1, 2]");
    assert.throws(() => loadConfig({ file, env: {} }), {
      message: `Invalid configuration in ${file}: expected a JSON object`,
    });
  });
});

describe("intOption", () => {
  it("returns the fallback when the flag is absent", () => {
    assert.equal(intOption(undefined, 42, "port"), 42);
  });

  it("parses integer strings", () => {
    assert.equal(intOption("8080", 42, "port"), 8080);
  });

  it("rejects anything else", () => {
    assert.throws(() => intOption("12.5", 42, "port"), { message: "Invalid port: 12.5" });
    assert.throws(() => intOption("-1", 42, "port"), { message: "Invalid port: -1" });
  });
});

import { afterEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { formatLine } from "../server/log.js";

describe("formatLine", () => {
  afterEach(() => {
    delete process.env.TLV_RELAY_LOG_JSON;
  });

  it("renders component, level and extra fields as text", () => {
    assert.equal(
      formatLine("2024-01-01T00:00:00.000Z", "WARN", "tunnel", "egress full", { dropped: 2 }),
      "2024-01-01T00:00:00.000Z [WARN] [tunnel] egress full dropped=2",
    );
  });

  it("omits the extra section when there is nothing to add", () => {
    assert.equal(
      formatLine("2024-01-01T00:00:00.000Z", "INFO", "dispatcher", "route bound"),
      "2024-01-01T00:00:00.000Z [INFO] [dispatcher] route bound",
    );
  });

  it("emits one JSON object when TLV_RELAY_LOG_JSON=1", () => {
    process.env.TLV_RELAY_LOG_JSON = "1";
    const line = formatLine("2024-01-01T00:00:00.000Z", "ERROR", "dispatcher", "handler failed", { path: "/" });
    assert.deepEqual(JSON.parse(line), {
      ts: "2024-01-01T00:00:00.000Z",
      level: "ERROR",
      component: "dispatcher",
      msg: "handler failed",
      path: "/",
    });
  });
});

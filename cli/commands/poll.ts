import type { Command } from "commander";
import { intOption, loadConfig } from "../config.js";
import { attachConsole, exitWithError, printPacket } from "../console.js";
import { TunnelPoller } from "../poller.js";

interface PollOptions {
  interval?: string;
}

export function registerPollCommand(program: Command) {
  program
    .command("poll <url>")
    .description("act as the agent end of an HTTP tunnel; stdin lines `<type> [text]` are POSTed")
    .option("-i, --interval <ms>", "poll interval in milliseconds")
    .action((url: string, opts: PollOptions) => {
      try {
        const config = loadConfig();
        const poller = new TunnelPoller({
          url,
          intervalMs: intOption(opts.interval, config.pollIntervalMs, "interval"),
          onPacket: (packet) => printPacket(packet, "http"),
          onError: (err) => process.stderr.write(`  Poll error: ${err.message}\n`),
        });

        poller.start();
        attachConsole((packet) => poller.post(packet)).on("close", () => poller.stop());

        for (const sig of ["SIGINT", "SIGTERM"] as const) {
          process.on(sig, () => {
            poller.stop();
            process.exit(0);
          });
        }
      } catch (err) {
        exitWithError(err);
      }
    });
}

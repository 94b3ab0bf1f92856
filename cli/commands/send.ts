import type { Command } from "commander";
import { dial, parseAddress } from "../../shared/dial.js";
import { intOption, loadConfig } from "../config.js";
import { exitWithError, formatPacket, parseCommandLine } from "../console.js";

interface SendOptions {
  wait?: boolean;
  timeout?: string;
}

export function registerSendCommand(program: Command) {
  program
    .command("send <address> <type> [text...]")
    .description("send one packet over TCP and exit")
    .option("-w, --wait", "wait for one reply packet and print it")
    .option("-t, --timeout <ms>", "connect timeout in milliseconds")
    .action(async (address: string, type: string, text: string[], opts: SendOptions) => {
      try {
        const config = loadConfig();
        const packet = parseCommandLine([type, ...text].join(" "));
        if (!packet) throw new Error("packet type is required");

        const { host, port } = parseAddress(address);
        const transport = await dial(host, port, {
          timeoutMs: intOption(opts.timeout, config.connectTimeoutMs, "timeout"),
        });

        try {
          await transport.send(packet);
          process.stderr.write(`Sent ${formatPacket(packet)}\n`);
          if (opts.wait) {
            const reply = await transport.read();
            if (reply) process.stdout.write(`${formatPacket(reply)}\n`);
          }
        } finally {
          transport.close();
        }
      } catch (err) {
        exitWithError(err);
      }
    });
}

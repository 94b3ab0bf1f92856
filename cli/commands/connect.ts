import type { Command } from "commander";
import { dial, parseAddress } from "../../shared/dial.js";
import { boldGreen, cyan } from "../../server/log.js";
import { intOption, loadConfig } from "../config.js";
import { attachConsole, exitWithError, readPackets } from "../console.js";

interface ConnectOptions {
  timeout?: string;
}

export function registerConnectCommand(program: Command) {
  program
    .command("connect <address>")
    .description("connect to a controller over TCP (host:port); stdin lines `<type> [text]` are sent")
    .option("-t, --timeout <ms>", "connect timeout in milliseconds")
    .action(async (address: string, opts: ConnectOptions) => {
      try {
        const config = loadConfig();
        const { host, port } = parseAddress(address);
        const transport = await dial(host, port, {
          timeoutMs: intOption(opts.timeout, config.connectTimeoutMs, "timeout"),
        });
        console.log(`${boldGreen("connected")} ${cyan(`${host}:${port}`)}`);

        const rl = attachConsole((packet) => transport.send(packet));
        rl.on("close", () => {
          if (!transport.closed) transport.close();
        });

        await readPackets(transport, `${host}:${port}`);
        rl.close();
      } catch (err) {
        exitWithError(err);
      }
    });
}

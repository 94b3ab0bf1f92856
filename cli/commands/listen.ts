import type { Command } from "commander";
import { listen } from "../../shared/dial.js";
import type { FramedSocketTransport } from "../../shared/socket-transport.js";
import { boldGreen, cyan } from "../../server/log.js";
import { intOption, loadConfig } from "../config.js";
import { attachConsole, exitWithError, readPackets } from "../console.js";

interface ListenOptions {
  port?: string;
  host?: string;
}

export function registerListenCommand(program: Command) {
  program
    .command("listen")
    .description("accept agents over TCP; stdin lines `<type> [text]` go to the latest agent")
    .option("-p, --port <port>", "port to listen on")
    .option("--host <host>", "interface to bind")
    .action(async (opts: ListenOptions) => {
      try {
        const config = loadConfig();
        const port = intOption(opts.port, config.port, "port");
        const host = opts.host ?? config.host;

        let current: FramedSocketTransport | null = null;

        const server = await listen(port, host, (transport) => {
          const peer = transport.remoteAddress ?? "peer";
          current = transport;
          console.log(`${boldGreen("connected")} ${cyan(peer)}`);
          void readPackets(transport, peer).finally(() => {
            if (current === transport) current = null;
          });
        });

        console.log(`Listening on ${cyan(`${host}:${port}`)}`);

        attachConsole(async (packet) => {
          if (!current) {
            process.stderr.write("No agent connected\n");
            return;
          }
          await current.send(packet);
        }).on("close", () => {
          server.close();
          if (current && !current.closed) current.close();
        });
      } catch (err) {
        exitWithError(err);
      }
    });
}

import type { Command } from "commander";
import type { OverflowPolicy } from "../../shared/types.js";
import { createApp, startHttpServer } from "../../server/app.js";
import { HttpDispatcher } from "../../server/dispatcher.js";
import { HttpTunnelTransport } from "../../server/http-tunnel.js";
import { boldGreen, cyan, dim } from "../../server/log.js";
import { intOption, loadConfig } from "../config.js";
import { attachConsole, exitWithError, printPacket } from "../console.js";

interface HttpOptions {
  port?: string;
  host?: string;
  path?: string;
  maxEgress?: string;
  dropOldest?: boolean;
}

export function registerHttpCommand(program: Command) {
  program
    .command("http")
    .description("serve the TLV tunnel over HTTP; stdin lines `<type> [text]` are queued for the next GET")
    .option("-p, --port <port>", "port to listen on")
    .option("--host <host>", "interface to bind")
    .option("--path <path>", "URL path for GET/POST")
    .option("--max-egress <bytes>", "egress buffer limit in bytes")
    .option("--drop-oldest", "drop the oldest queued packets when egress is full")
    .action(async (opts: HttpOptions) => {
      try {
        const config = loadConfig();
        const port = intOption(opts.port, config.httpPort, "port");
        const host = opts.host ?? config.host;
        const overflowPolicy: OverflowPolicy = opts.dropOldest ? "drop-oldest" : config.overflowPolicy;

        const dispatcher = new HttpDispatcher();
        const tunnel = new HttpTunnelTransport(dispatcher, {
          urlPath: opts.path ?? config.httpPath,
          maxEgressBytes: intOption(opts.maxEgress, config.maxEgressBytes, "max-egress"),
          overflowPolicy,
          callback: (packet) => printPacket(packet, "http"),
        });

        const server = await startHttpServer(createApp(dispatcher), port, host);
        console.log(`\n  ${boldGreen("tlv-relay")} tunnel ready\n`);
        console.log(`  ${dim("URL:")}  ${cyan(`http://${host}:${port}${tunnel.urlPath}`)}\n`);

        attachConsole((packet) => {
          tunnel.send(packet);
          console.log(dim(`queued ${tunnel.pendingPackets} packet(s), ${tunnel.pendingBytes} bytes`));
        }).on("close", () => {
          tunnel.close();
          server.close();
        });
      } catch (err) {
        exitWithError(err);
      }
    });
}

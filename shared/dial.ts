// TCP connection establishment for FramedSocketTransport.

import * as net from "node:net";
import { createLogger, type Logger } from "../server/log.js";
import { ConnectionError } from "./errors.js";
import { FramedSocketTransport, type SocketTransportOptions } from "./socket-transport.js";

export interface DialOptions extends SocketTransportOptions {
  timeoutMs?: number;
}

export interface ListenOptions extends SocketTransportOptions {
  log?: Logger;
}

export interface Address {
  host: string;
  port: number;
}

/** Parse "host:port" (or "[v6]:port"). */
export function parseAddress(addr: string): Address {
  const lastColon = addr.lastIndexOf(":");
  if (lastColon < 0) {
    throw new Error(`Invalid address: ${addr}`);
  }
  const host = addr.slice(0, lastColon).replace(/^\[(.*)\]$/, "$1") || "127.0.0.1";
  const port = Number(addr.slice(lastColon + 1));
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port in address: ${addr}`);
  }
  return { host, port };
}

/** Connect to a peer and wrap the socket once it is established. */
export function dial(host: string, port: number, options: DialOptions = {}): Promise<FramedSocketTransport> {
  const timeoutMs = options.timeoutMs ?? 5000;

  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const timer = setTimeout(() => {
      socket.destroy();
      reject(new ConnectionError(`timed out connecting to ${host}:${port} after ${timeoutMs}ms`));
    }, timeoutMs);

    const onError = (err: Error) => {
      clearTimeout(timer);
      reject(new ConnectionError(`failed to connect to ${host}:${port}: ${err.message}`, { cause: err }));
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      socket.removeListener("error", onError);
      socket.setNoDelay(true);
      resolve(new FramedSocketTransport(socket, options));
    });
  });
}

/**
 * Accept TCP connections, handing each one to `onTransport`.
 * Resolves once the server is listening.
 */
export function listen(
  port: number,
  host: string,
  onTransport: (transport: FramedSocketTransport) => void,
  options: ListenOptions = {},
): Promise<net.Server> {
  const log = options.log ?? createLogger("listen");
  return new Promise((resolve, reject) => {
    const server = net.createServer((socket) => {
      socket.setNoDelay(true);
      onTransport(new FramedSocketTransport(socket, options));
    });
    server.once("error", reject);
    server.listen(port, host, () => {
      server.removeListener("error", reject);
      server.on("error", (err) => log.error("server error", { error: err.message }));
      resolve(server);
    });
  });
}

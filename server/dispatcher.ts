/**
 * Path-routed request dispatcher.
 *
 * Owns the path → handler table. Handlers are objects with `handleGet` and
 * `handlePost`; each returns whether it served the request. Callers hold a
 * RouteRegistration, never the table itself.
 */

import type { IncomingHttpHeaders } from "node:http";
import type { Readable, Writable } from "node:stream";
import { createLogger, type Logger } from "./log.js";

/** One incoming request as the dispatcher hands it to a handler. */
export interface DispatchRequest {
  readonly method: string;
  /** URL path without the query string. */
  readonly path: string;
  readonly headers: IncomingHttpHeaders;
  readonly body: Readable;
  readonly response: Writable;
  /** True once a status line has been written. */
  readonly statusSent: boolean;
  /** Write the status line plus `Content-type: text/html` and end the headers. */
  sendStatus(code: number): void;
}

export interface RouteHandler {
  handleGet(request: DispatchRequest): boolean | Promise<boolean>;
  handlePost(request: DispatchRequest): boolean | Promise<boolean>;
}

export interface RouteRegistration {
  readonly path: string;
  /** Rebind this handler to `path` in one step. */
  moveTo(path: string): void;
  /** Remove the binding if the path still points at this handler. */
  remove(): boolean;
}

export class HttpDispatcher {
  private routes = new Map<string, RouteHandler>();
  private log: Logger;

  constructor(log: Logger = createLogger("dispatcher")) {
    this.log = log;
  }

  register(path: string, handler: RouteHandler): RouteRegistration {
    this.bind(path, handler);

    let current = path;
    return {
      get path() {
        return current;
      },
      moveTo: (next: string) => {
        if (next === current) return;
        this.unbind(current, handler);
        this.bind(next, handler);
        current = next;
      },
      remove: () => this.unbind(current, handler),
    };
  }

  lookup(path: string): RouteHandler | undefined {
    return this.routes.get(path);
  }

  paths(): string[] {
    return [...this.routes.keys()];
  }

  async dispatch(request: DispatchRequest): Promise<void> {
    try {
      const handled = await this.route(request);
      if (!handled) {
        request.sendStatus(404);
      }
    } catch (err) {
      this.log.error("handler failed", {
        method: request.method,
        path: request.path,
        error: err instanceof Error ? err.message : String(err),
      });
      if (!request.statusSent) {
        request.sendStatus(500);
      }
    } finally {
      if (!request.response.writableEnded) {
        request.response.end();
      }
    }
  }

  private async route(request: DispatchRequest): Promise<boolean> {
    const handler = this.routes.get(request.path);
    if (!handler) return false;

    switch (request.method) {
      case "GET":
        return handler.handleGet(request);
      case "POST":
        return handler.handlePost(request);
      default:
        request.sendStatus(501);
        return true;
    }
  }

  private bind(path: string, handler: RouteHandler): void {
    const previous = this.routes.get(path);
    if (previous && previous !== handler) {
      this.log.warn("replacing existing route", { path });
    }
    this.routes.set(path, handler);
    this.log.debug("route bound", { path });
  }

  private unbind(path: string, handler: RouteHandler): boolean {
    if (this.routes.get(path) !== handler) return false;
    this.routes.delete(path);
    this.log.debug("route removed", { path });
    return true;
  }
}

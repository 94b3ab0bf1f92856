import * as http from "node:http";
import express, { type Request, type Response } from "express";
import morgan from "morgan";
import type { DispatchRequest, HttpDispatcher } from "./dispatcher.js";
import { createLogger, type Logger } from "./log.js";

/** Express app that routes every request through the dispatcher. */
export function createApp(dispatcher: HttpDispatcher) {
  const app = express();

  app.disable("x-powered-by");
  app.use(morgan("short"));
  app.use((req, res, next) => {
    dispatcher.dispatch(toDispatchRequest(req, res)).catch(next);
  });

  return app;
}

/** Adapt an express request/response pair to the dispatcher's contract. */
export function toDispatchRequest(req: Request, res: Response): DispatchRequest {
  return {
    method: req.method,
    path: req.path,
    headers: req.headers,
    body: req,
    response: res,
    get statusSent() {
      return res.headersSent;
    },
    sendStatus(code: number) {
      res.writeHead(code, { "Content-type": "text/html" });
    },
  };
}

/** Listen on `port`/`host`; resolves with the server once it is bound. */
export function startHttpServer(
  app: http.RequestListener,
  port: number,
  host: string,
  log: Logger = createLogger("http"),
): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);
    server.once("error", reject);
    server.listen(port, host, () => {
      server.removeListener("error", reject);
      server.on("error", (err) => log.error("server error", { error: err.message }));
      resolve(server);
    });
  });
}

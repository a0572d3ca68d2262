import { serve } from "@hono/node-server";
import { Hono } from "hono";
import type { Logger } from "pino";
import { HOME_RESPONSE_BODY } from "../shared/constants.js";
import { parseListen } from "../shared/net.js";
import type { FrameSender } from "../host/sender.js";

export interface TriggerServerOptions {
  sender: FrameSender;
  logger: Logger;
}

export interface TriggerServerHandle {
  host: string;
  port: number;
  close: () => Promise<void>;
}

/**
 * Sends `action` to the extension as both query and response. Unlike the
 * stdio path there is no query mapping. Empty actions are dropped.
 */
export async function performAction(action: string, options: TriggerServerOptions): Promise<boolean> {
  const { sender, logger } = options;
  if (action === "") {
    logger.info("Action string is empty");
    return false;
  }
  logger.info({ action }, "Performing action");
  return sender.send({ query: action, response: action });
}

export function createTriggerApp(options: TriggerServerOptions): Hono {
  const { logger } = options;
  const app = new Hono();

  // Callers always get an empty 200, whatever happened to the send.
  app.all("/action", async (c) => {
    let body: string;
    try {
      body = await c.req.text();
    } catch (err) {
      logger.warn({ err }, "Error reading action body");
      return c.body(null);
    }
    await performAction(body, options);
    return c.body(null);
  });

  app.all("*", (c) => {
    logger.info({ method: c.req.method, path: c.req.path }, "Endpoint hit: home");
    return c.text(HOME_RESPONSE_BODY);
  });

  return app;
}

/** Resolves once the listener is bound; rejects if it cannot bind. */
export function startTriggerServer(listen: string, options: TriggerServerOptions): Promise<TriggerServerHandle> {
  const { host, port } = parseListen(listen);
  const app = createTriggerApp(options);

  return new Promise((resolve, reject) => {
    const nodeServer = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
      resolve({
        host,
        port: info.port,
        close: () =>
          new Promise((done, fail) => {
            nodeServer.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
    nodeServer.once("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        reject(new Error(`Cannot listen on ${host}:${port} (EADDRINUSE); choose another port with --listen`));
        return;
      }
      reject(err);
    });
  });
}

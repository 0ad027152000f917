/**
 * keyhop HTTP server
 *
 * Express app answering hop queries against the live snapshot.
 *
 * URL structure:
 * - /                   landing page
 * - /ls                 listing of every visible route
 * - /hop?to={query}     resolve a query and redirect, run or 404
 * - /keyhopsearch.xml   OpenSearch description
 */

import express, { type Express, type Request, type Response, type NextFunction } from "express";
import morgan from "morgan";
import {
  describeRoute,
  executeRoute,
  makeNoopLogger,
  renderTemplate,
  resolveHop,
  type HopAction,
  type Logger,
  type SnapshotStore,
} from "@keyhop/core";

import { renderIndexPage, renderListPage, renderOpenSearch } from "./pages.js";

export interface ServerOptions {
  /** Source of the live snapshot; read once per request */
  store: SnapshotStore;
  logger?: Logger;
  /** Log every request instead of only failed ones */
  verbose?: boolean;
}

export const INTERNAL_ERROR_BODY = "Something went wrong :(\n";

/**
 * Create and configure the Express server
 */
export function createServer(options: ServerOptions): Express {
  const { store } = options;
  const logger = options.logger ?? makeNoopLogger();
  const app = express();

  app.disable("x-powered-by");

  // Request logging goes through pino
  const accessLog = {
    write: (line: string) => {
      const message = line.trimEnd();
      if (options.verbose) logger.info(message);
      else logger.warn(message);
    },
  };
  if (options.verbose) {
    app.use(morgan("dev", { stream: accessLog }));
  } else {
    // Minimal logging - only log failed responses
    app.use(
      morgan("dev", {
        stream: accessLog,
        skip: (_req: Request, res: Response) => res.statusCode < 400,
      })
    );
  }

  app.get("/", (_req: Request, res: Response) => {
    res.type("html").send(renderIndexPage(store.current().publicAddress));
  });

  app.get("/ls", (_req: Request, res: Response) => {
    res.type("html").send(renderListPage(store.current().groups));
  });

  app.get("/keyhopsearch.xml", (_req: Request, res: Response) => {
    res
      .type("application/opensearchdescription+xml")
      .send(renderOpenSearch(store.current().publicAddress));
  });

  app.get("/hop", (req: Request, res: Response, next: NextFunction) => {
    handleHop(req, res, store, logger).catch(next);
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).type("text/plain").send("not found");
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, `Unhandled error: ${err.message}`);
    res.status(500).type("text/plain").send(INTERNAL_ERROR_BODY);
  });

  return app;
}

async function handleHop(
  req: Request,
  res: Response,
  store: SnapshotStore,
  logger: Logger
): Promise<void> {
  const query = req.query.to;
  if (typeof query !== "string") {
    res.status(400).type("text/plain").send("expected a single `to` query parameter");
    return;
  }

  // One snapshot for the whole request, even if a reload lands meanwhile
  const snapshot = store.current();
  const resolution = resolveHop(query, snapshot.routes, snapshot.defaultRoute, logger);
  if (resolution.status === "unresolved") {
    res.status(404).type("text/plain").send("not found");
    return;
  }

  const { route, args } = resolution;
  let action: HopAction;
  if (route.kind === "external") {
    action = { type: "redirect", target: route.path };
  } else {
    try {
      action = await executeRoute(route.path, args, { logger });
    } catch (error) {
      logger.error(
        { err: error },
        `Failed to redirect user for ${describeRoute(route)}: ${error instanceof Error ? error.message : String(error)}`
      );
      res.status(500).type("text/plain").send(INTERNAL_ERROR_BODY);
      return;
    }
  }

  if (action.type === "redirect") {
    // Set directly: res.redirect would re-encode the rendered target
    res.status(302).set("Location", renderTemplate(action.target, args)).end();
  } else {
    res.status(200).send(action.body);
  }
}

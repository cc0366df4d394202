import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import fs from "node:fs";
import type { Server } from "node:http";
import path from "node:path";
import { getLogger, type Logger } from "./logger.js";

export type PreviewOptions = {
  outputDir: string;
  /** URL path the site is published under ("/" or "/blog/"). */
  basePath?: string;
  port: number;
  host?: string;
  logger?: Logger;
};

function noCache(_req: Request, res: Response, next: NextFunction) {
  res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate");
  res.setHeader("Pragma", "no-cache");
  res.setHeader("Expires", "0");
  next();
}

/**
 * Static server over the output directory. `/posts/hello/` resolves to its
 * index.html, `/about` to about.html; a miss gets the site's own 404.html when
 * it has one. The directory is read per request, so rebuilds show up at once.
 */
export function createPreviewApp(outputDir: string, basePath = "/"): Express {
  const root = path.resolve(outputDir);
  const mount = basePath === "/" ? "/" : basePath.replace(/\/$/, "");
  const app = express();

  app.disable("x-powered-by");
  app.use(noCache);
  app.use(mount, express.static(root, { extensions: ["html"], etag: false, lastModified: false }));
  if (mount !== "/") app.get("/", (_req, res) => res.redirect(basePath));

  app.use((_req: Request, res: Response) => {
    const notFound = path.join(root, "404.html");
    res.status(404);
    if (fs.existsSync(notFound)) res.sendFile(notFound);
    else res.type("text/plain").send("Not found");
  });

  return app;
}

export function startPreviewServer(options: PreviewOptions): Promise<Server> {
  const logger = options.logger ?? getLogger();
  const host = options.host ?? "127.0.0.1";
  const basePath = options.basePath ?? "/";
  const app = createPreviewApp(options.outputDir, basePath);

  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, host);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : options.port;
      logger.success(`Preview: http://${host === "0.0.0.0" ? "localhost" : host}:${port}${basePath}`);
      resolve(server);
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}

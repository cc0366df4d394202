import type { Server } from "node:http";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { Logger } from "./logger.js";
import { closeServer, startPreviewServer } from "./preview.js";
import { cleanupSites, createSite } from "./test/site.js";

const logger = new Logger({ silent: true });
let server: Server | null = null;

afterEach(async () => {
  if (server) await closeServer(server);
  server = null;
  await cleanupSites();
});

async function serve(files: Record<string, string>, basePath = "/"): Promise<string> {
  const root = await createSite(files);
  server = await startPreviewServer({ outputDir: path.join(root, "_site"), port: 0, basePath, logger });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
  return `http://127.0.0.1:${address.port}`;
}

describe("preview server", () => {
  it("serves pretty URLs from the output directory without caching", async () => {
    const base = await serve({ "_site/posts/hello/index.html": "<h1>Hi</h1>", "_site/about.html": "about" });

    const res = await fetch(`${base}/posts/hello/`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("<h1>Hi</h1>");
    expect(res.headers.get("cache-control")).toBe("no-store, no-cache, must-revalidate");

    const about = await fetch(`${base}/about`);
    expect(await about.text()).toBe("about");
  });

  it("answers misses with the site's 404 page", async () => {
    const base = await serve({ "_site/index.html": "home", "_site/404.html": "lost" });

    const res = await fetch(`${base}/nowhere/`);
    expect(res.status).toBe(404);
    expect(await res.text()).toBe("lost");
  });

  it("falls back to a plain 404 without a 404 page", async () => {
    const base = await serve({ "_site/index.html": "home" });

    const res = await fetch(`${base}/nowhere`);
    expect(res.status).toBe(404);
    expect(await res.text()).toBe("Not found");
  });

  it("mounts the site under its base path", async () => {
    const base = await serve({ "_site/index.html": "home" }, "/blog/");

    const res = await fetch(`${base}/blog/`);
    expect(await res.text()).toBe("home");

    const root = await fetch(`${base}/`, { redirect: "manual" });
    expect(root.status).toBe(302);
    expect(root.headers.get("location")).toBe("/blog/");
  });
});

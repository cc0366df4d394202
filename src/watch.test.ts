import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "./logger.js";
import { cleanupSites, createSite } from "./test/site.js";
import type { BuildResult } from "./types.js";
import { RebuildLoop, watchTargets } from "./watch.js";

function fakeResult(): BuildResult {
  return {
    success: true,
    outputDir: "/site/_site",
    counts: { loaded: 1, drafts: 0, converted: 1, rendered: 1, failed: 0, listings: 0, staticFiles: 0 },
    drafts: [],
    errors: [],
    durationMs: 1,
  };
}

function deferred() {
  let resolve: (r: BuildResult) => void = () => undefined;
  const promise = new Promise<BuildResult>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

const silent = new Logger({ silent: true });

async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 10; i++) await Promise.resolve();
}

describe("RebuildLoop", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts idle and debounces a burst of events into one build", async () => {
    const build = vi.fn(async () => fakeResult());
    const loop = new RebuildLoop({ paths: [], build, debounceMs: 250, logger: silent });
    expect(loop.state).toBe("idle");

    loop.notify("change", "/site/content/a.md");
    loop.notify("add", "/site/content/b.md");
    loop.notify("change", "/site/templates/post.html");
    expect(loop.state).toBe("debouncing");

    await vi.advanceTimersByTimeAsync(249);
    expect(build).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await loop.settled();
    expect(build).toHaveBeenCalledTimes(1);
    expect(loop.state).toBe("idle");
    await loop.stop();
  });

  it("schedules exactly one more build for events during a build", async () => {
    const first = deferred();
    const build = vi
      .fn<() => Promise<BuildResult>>()
      .mockImplementationOnce(() => first.promise)
      .mockImplementation(async () => fakeResult());
    const loop = new RebuildLoop({ paths: [], build, debounceMs: 100, logger: silent });

    loop.notify("change", "/site/content/a.md");
    await vi.advanceTimersByTimeAsync(100);
    expect(loop.state).toBe("building");

    loop.notify("change", "/site/content/a.md");
    loop.notify("change", "/site/content/b.md");
    expect(loop.state).toBe("building");

    first.resolve(fakeResult());
    await flushMicrotasks();
    expect(loop.state).toBe("debouncing");

    await vi.advanceTimersByTimeAsync(100);
    await loop.settled();
    expect(build).toHaveBeenCalledTimes(2);
    expect(loop.state).toBe("idle");
    await loop.stop();
  });

  it("keeps watching after a build throws", async () => {
    const onBuild = vi.fn();
    const build = vi
      .fn<() => Promise<BuildResult>>()
      .mockRejectedValueOnce(new Error("disk on fire"))
      .mockImplementation(async () => fakeResult());
    const loop = new RebuildLoop({ paths: [], build, onBuild, debounceMs: 10, logger: silent });

    loop.notify("change", "/site/content/a.md");
    await vi.advanceTimersByTimeAsync(10);
    await loop.settled();
    expect(loop.state).toBe("idle");
    expect(onBuild).not.toHaveBeenCalled();

    loop.notify("change", "/site/content/a.md");
    await vi.advanceTimersByTimeAsync(10);
    await loop.settled();
    expect(build).toHaveBeenCalledTimes(2);
    expect(onBuild).toHaveBeenCalledTimes(1);
    await loop.stop();
  });

  it("settles only after a pending debounced build has run", async () => {
    const build = vi.fn(async () => fakeResult());
    const loop = new RebuildLoop({ paths: [], build, debounceMs: 100, logger: silent });

    loop.notify("change", "/site/content/a.md");
    let settled = false;
    const settling = loop.settled().then(() => {
      settled = true;
    });
    await flushMicrotasks();
    expect(settled).toBe(false);
    expect(loop.state).toBe("debouncing");

    await vi.advanceTimersByTimeAsync(100);
    await settling;
    expect(build).toHaveBeenCalledTimes(1);
    expect(loop.state).toBe("idle");
    await loop.stop();
  });

  it("settles when stopped with a build still pending", async () => {
    const build = vi.fn(async () => fakeResult());
    const loop = new RebuildLoop({ paths: [], build, debounceMs: 100, logger: silent });

    loop.notify("change", "/site/content/a.md");
    const settling = loop.settled();
    await loop.stop();
    await settling;
    expect(build).not.toHaveBeenCalled();
  });

  it("ignores events from the output directory", async () => {
    const build = vi.fn(async () => fakeResult());
    const loop = new RebuildLoop({ paths: [], ignore: ["/site/_site"], build, debounceMs: 10, logger: silent });

    loop.notify("add", "/site/_site/index.html");
    expect(loop.state).toBe("idle");
    await vi.advanceTimersByTimeAsync(50);
    expect(build).not.toHaveBeenCalled();
    await loop.stop();
  });

  it("stop cancels a pending build and awaits the one in flight", async () => {
    const pending = deferred();
    const build = vi.fn(() => pending.promise);
    const loop = new RebuildLoop({ paths: [], build, debounceMs: 10, logger: silent });

    loop.notify("change", "/site/content/a.md");
    await vi.advanceTimersByTimeAsync(10);
    expect(loop.state).toBe("building");
    loop.notify("change", "/site/content/b.md");

    let stopped = false;
    const stopping = loop.stop().then(() => {
      stopped = true;
    });
    await flushMicrotasks();
    expect(stopped).toBe(false);

    pending.resolve(fakeResult());
    await stopping;
    expect(loop.state).toBe("stopped");

    loop.notify("change", "/site/content/c.md");
    await vi.advanceTimersByTimeAsync(100);
    expect(build).toHaveBeenCalledTimes(1);
  });
});

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe("RebuildLoop on a real directory", () => {
  afterEach(cleanupSites);

  it("rebuilds once for a burst of writes and ignores output and hidden files", async () => {
    const root = await createSite({ "config.yaml": "title: T\n", "content/a.md": "a", "_site/index.html": "old" });
    const build = vi.fn(async () => fakeResult());
    const loop = new RebuildLoop({ ...(await watchTargets(root)), build, debounceMs: 200, logger: silent });
    await loop.start();

    try {
      for (const text of ["one", "two", "three"]) await fs.writeFile(path.join(root, "content/a.md"), text);
      await vi.waitFor(() => expect(build).toHaveBeenCalledTimes(1), { timeout: 3000, interval: 50 });
      await loop.settled();
      await sleep(400);
      expect(build).toHaveBeenCalledTimes(1);

      await fs.writeFile(path.join(root, "_site/index.html"), "new");
      await fs.writeFile(path.join(root, "content/.scratch.md"), "hidden");
      await sleep(600);
      expect(build).toHaveBeenCalledTimes(1);
      expect(loop.state).toBe("idle");
    } finally {
      await loop.stop();
    }
  }, 10_000);
});

describe("watchTargets", () => {
  afterEach(cleanupSites);

  it("watches sources and config, and ignores the output directory", async () => {
    const root = await createSite({ "config.yaml": "output_dir: public\ntemplate_paths: [theme]\n" });
    const targets = await watchTargets(root);
    expect(targets.paths).toEqual([
      path.join(root, "content"),
      path.join(root, "templates"),
      path.join(root, "theme"),
      path.join(root, "static"),
      path.join(root, "config.yaml"),
      path.join(root, "config.yml"),
    ]);
    expect(targets.ignore).toEqual([path.join(root, "public")]);
  });

  it("falls back to the conventional layout when the config is broken", async () => {
    const root = await createSite({ "config.yaml": "paginate: [\n" });
    const targets = await watchTargets(root);
    expect(targets.paths).toContain(path.join(root, "content"));
    expect(targets.ignore).toEqual([path.join(root, "_site")]);
  });
});

import path from "node:path";
import { watch, type FSWatcher } from "chokidar";
import { CONFIG_FILENAMES, loadSiteConfig, type OutputFormat } from "./config.js";
import { TrailingDebounce } from "./debounce.js";
import { ConfigError, errorMessage } from "./errors.js";
import { buildSite, logBuildResult, sitePaths } from "./generate.js";
import { getLogger, type Logger } from "./logger.js";
import type { BuildResult } from "./types.js";

export type WatchState = "idle" | "debouncing" | "building" | "stopped";

export type RebuildLoopOptions = {
  /** Files and directories to watch (content, templates, static, config file). */
  paths: string[];
  /** Never watched; normally the output directory. */
  ignore?: string[];
  debounceMs?: number;
  build: () => Promise<BuildResult>;
  /** Called after every completed rebuild, e.g. to log the result. */
  onBuild?: (result: BuildResult) => void;
  logger?: Logger;
};

export const DEFAULT_DEBOUNCE_MS = 250;

function isInside(target: string, dir: string): boolean {
  const rel = path.relative(dir, target);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Idle -> (event) -> Debouncing -> (window elapses) -> Building -> Idle.
 *
 * Events that arrive while a build runs mark the loop dirty, and one more
 * debounced build follows. A failing build is reported and the loop keeps
 * watching; only stop() ends it.
 */
export class RebuildLoop {
  private current: WatchState = "idle";
  private watcher: FSWatcher | null = null;
  private readonly debounce: TrailingDebounce;
  private inFlight: Promise<void> | null = null;
  private dirty = false;
  private waiters: Array<() => void> = [];
  private releaseStart: (() => void) | null = null;
  private readonly logger: Logger;
  private readonly ignore: string[];

  constructor(private readonly options: RebuildLoopOptions) {
    this.logger = options.logger ?? getLogger();
    this.ignore = (options.ignore ?? []).map(p => path.resolve(p));
    this.debounce = new TrailingDebounce(() => this.startBuild(), options.debounceMs ?? DEFAULT_DEBOUNCE_MS);
  }

  get state(): WatchState {
    return this.current;
  }

  /** Begin watching; resolves once the initial scan is done and events are live. */
  async start(): Promise<void> {
    if (this.watcher || this.current === "stopped") return;

    const watcher = watch(this.options.paths, {
      ignoreInitial: true,
      persistent: true,
      ignored: (p: string) => path.basename(p).startsWith(".") || this.isIgnored(p),
    });
    this.watcher = watcher;
    // "all" covers add, change, unlink, addDir and unlinkDir
    watcher.on("all", (event, p) => this.notify(event, p));
    watcher.on("error", (err: unknown) => this.logger.error(`watcher: ${errorMessage(err)}`));

    // stop() releases a start that is still waiting for the initial scan
    await new Promise<void>(resolve => {
      this.releaseStart = resolve;
      watcher.once("ready", () => resolve());
    });
    this.releaseStart = null;
    if (this.isStopped()) return;
    this.logger.info(`watching ${this.options.paths.length} paths for changes`);
  }

  /** Feed one file-system event into the loop. */
  notify(event: string, filePath: string): void {
    if (this.current === "stopped" || this.isIgnored(filePath)) return;
    this.logger.debug(`${event} ${filePath}`);

    if (this.current === "building") {
      this.dirty = true;
      return;
    }
    this.current = "debouncing";
    this.debounce.trigger();
  }

  /** Resolves once the loop is idle (or stopped) with no build pending or running. */
  settled(): Promise<void> {
    if (this.isSettled()) return Promise.resolve();
    return new Promise(resolve => this.waiters.push(resolve));
  }

  /** Stop accepting events, let an in-flight build finish, then release the watcher. */
  async stop(): Promise<void> {
    if (this.current === "stopped") return;
    this.current = "stopped";
    this.debounce.dispose();
    this.dirty = false;
    this.wakeIfSettled();
    this.releaseStart?.();

    const closing = this.watcher?.close();
    this.watcher = null;
    await Promise.all([closing, this.settled()]);
  }

  private isStopped(): boolean {
    return this.current === "stopped";
  }

  private isSettled(): boolean {
    return this.inFlight === null && (this.current === "idle" || this.current === "stopped");
  }

  private wakeIfSettled(): void {
    if (!this.isSettled()) return;
    for (const resolve of this.waiters.splice(0)) resolve();
  }

  private isIgnored(p: string): boolean {
    const abs = path.resolve(p);
    return this.ignore.some(dir => isInside(abs, dir));
  }

  private startBuild(): void {
    if (this.current === "stopped") return;
    this.current = "building";
    this.dirty = false;
    this.inFlight = this.runBuild().finally(() => {
      this.inFlight = null;
      this.wakeIfSettled();
    });
  }

  private async runBuild(): Promise<void> {
    try {
      const result = await this.options.build();
      this.options.onBuild?.(result);
    } catch (err) {
      this.logger.error(`rebuild failed: ${errorMessage(err)}`);
    }

    if (this.current === "stopped") return;
    if (this.dirty) {
      this.current = "debouncing";
      this.debounce.trigger();
    } else {
      this.current = "idle";
    }
  }
}

export type WatchSiteOptions = {
  drafts?: boolean;
  formats?: readonly OutputFormat[];
  debounceMs?: number;
  logger?: Logger;
};

/**
 * What a site rebuild depends on. Read once when watching starts; when the
 * config cannot be loaded the conventional layout is watched so that fixing
 * the config triggers a build.
 */
export async function watchTargets(siteRoot: string): Promise<{ paths: string[]; ignore: string[] }> {
  const root = path.resolve(siteRoot);
  const configFiles = CONFIG_FILENAMES.map(name => path.join(root, name));
  try {
    const { config, outputDir } = await loadSiteConfig(root);
    const dirs = sitePaths(root, config);
    return { paths: [dirs.content, ...dirs.templates, dirs.static, ...configFiles], ignore: [outputDir] };
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    const fallback = ["content", "templates", "static"].map(d => path.join(root, d));
    return { paths: [...fallback, ...configFiles], ignore: [path.join(root, "_site")] };
  }
}

/** Start a rebuild loop over the site; the caller owns stop(). */
export async function watchSite(siteRoot: string, options: WatchSiteOptions = {}): Promise<RebuildLoop> {
  const logger = options.logger ?? getLogger();
  const { paths, ignore } = await watchTargets(siteRoot);
  const loop = new RebuildLoop({
    paths,
    ignore,
    debounceMs: options.debounceMs,
    logger,
    build: () => buildSite(siteRoot, { drafts: options.drafts, formats: options.formats, logger }),
    onBuild: result => logBuildResult(logger, result),
  });
  await loop.start();
  return loop;
}

import fs from "node:fs";
import type { Server } from "node:http";
import path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import { OUTPUT_FORMATS, isOutputFormat, loadSiteConfig, type LoadedConfig, type OutputFormat } from "./config.js";
import { runDoctor } from "./doctor.js";
import { ConfigError } from "./errors.js";
import { buildSite, logBuildResult } from "./generate.js";
import { getLogger, type Logger } from "./logger.js";
import { createContent } from "./newContent.js";
import { closeServer, startPreviewServer } from "./preview.js";
import type { ContentKind } from "./types.js";
import { watchSite, type RebuildLoop } from "./watch.js";

export const VERSION = "0.1.0";

type GlobalOptions = { root: string; verbose?: boolean };
type WatchCommandOptions = { watch?: boolean; drafts?: boolean };
type BuildCommandOptions = WatchCommandOptions & { formats?: OutputFormat[] };
type ServeCommandOptions = WatchCommandOptions & { port: number };
type NewCommandOptions = { type: string };

export type ProgramDeps = {
  logger?: Logger;
  /** Resolves when a long-running command should shut down. */
  untilShutdown?: () => Promise<void>;
  /** Applied before subcommands are added, so settings such as exitOverride are inherited. */
  configure?: (program: Command) => void;
};

/** Resolves on the first SIGINT or SIGTERM. */
export function untilSignal(): Promise<void> {
  return new Promise(resolve => {
    const done = () => {
      process.off("SIGINT", done);
      process.off("SIGTERM", done);
      resolve();
    };
    process.once("SIGINT", done);
    process.once("SIGTERM", done);
  });
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535 || String(port) !== value.trim()) {
    throw new InvalidArgumentError(`not a valid port: ${value}`);
  }
  return port;
}

/** `html,plain` -> ["html", "plain"]; unknown names are rejected. */
export function parseFormats(value: string): OutputFormat[] {
  const formats: OutputFormat[] = [];
  for (const name of value.split(",").map(f => f.trim()).filter(Boolean)) {
    if (!isOutputFormat(name)) {
      throw new InvalidArgumentError(`unknown format "${name}" (expected ${OUTPUT_FORMATS.join(", ")})`);
    }
    if (!formats.includes(name)) formats.push(name);
  }
  if (formats.length === 0) throw new InvalidArgumentError("no output format given");
  return formats;
}

function toKind(value: string): ContentKind {
  return value === "page" ? "page" : "post";
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const logger = deps.logger ?? getLogger();
  const untilShutdown = deps.untilShutdown ?? untilSignal;
  const program = new Command();
  deps.configure?.(program);

  const siteRoot = () => path.resolve(program.opts<GlobalOptions>().root);

  program
    .name("quire")
    .description("Build a static site from markdown content and templates")
    .version(VERSION)
    .option("-C, --root <dir>", "site root directory", ".")
    .option("-v, --verbose", "print debug output")
    .hook("preAction", () => {
      logger.setVerbose(program.opts<GlobalOptions>().verbose ?? false);
    });

  const runUntilShutdown = async (loop: RebuildLoop | null, server: Server | null) => {
    await untilShutdown();
    logger.info("shutting down");
    await loop?.stop();
    if (server) await closeServer(server);
  };

  program
    .command("build")
    .description("build the site into its output directory")
    .option("-w, --watch", "rebuild when sources change")
    .option("--drafts", "include drafts")
    .option("-f, --formats <list>", `comma-separated output formats (${OUTPUT_FORMATS.join(", ")})`, parseFormats)
    .action(async (opts: BuildCommandOptions) => {
      const root = siteRoot();
      const result = await buildSite(root, { drafts: opts.drafts, formats: opts.formats, logger });
      logBuildResult(logger, result);

      if (!opts.watch) {
        process.exitCode = result.success ? 0 : 1;
        return;
      }
      const loop = await watchSite(root, { drafts: opts.drafts, formats: opts.formats, logger });
      await runUntilShutdown(loop, null);
    });

  program
    .command("serve")
    .description("serve the output directory, optionally rebuilding on change")
    .option("-p, --port <port>", "port to listen on", parsePort, 8000)
    .option("-w, --watch", "rebuild when sources change")
    .option("--drafts", "include drafts")
    .action(async (opts: ServeCommandOptions) => {
      const root = siteRoot();
      let loaded: LoadedConfig;
      try {
        loaded = await loadSiteConfig(root);
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        logger.error(`${err.kind}${err.path ? ` ${err.path}` : ""}: ${err.message}`);
        process.exitCode = 1;
        return;
      }

      if (opts.watch || !fs.existsSync(loaded.outputDir)) {
        logBuildResult(logger, await buildSite(root, { drafts: opts.drafts, logger }));
      }

      const server = await startPreviewServer({
        outputDir: loaded.outputDir,
        basePath: loaded.basePath,
        port: opts.port,
        logger,
      });
      const loop = opts.watch ? await watchSite(root, { drafts: opts.drafts, logger }) : null;
      await runUntilShutdown(loop, server);
    });

  program
    .command("new")
    .description("create a new post or page")
    .argument("<title>", "title of the new content")
    .addOption(new Option("-t, --type <type>", "kind of content").choices(["post", "page"]).default("post"))
    .action(async (title: string, opts: NewCommandOptions) => {
      const created = await createContent(siteRoot(), title, { kind: toKind(opts.type) });
      logger.success(`created content/${created.sourcePath}`);
    });

  program
    .command("doctor")
    .description("check the site setup")
    .action(async () => {
      const checks = await runDoctor(siteRoot());
      for (const check of checks) {
        const line = `${check.name}: ${check.detail}`;
        if (check.ok) logger.success(line);
        else logger.error(line);
      }
      process.exitCode = checks.every(c => c.ok) ? 0 : 1;
    });

  return program;
}

import fs from "node:fs/promises";
import path from "node:path";
import PQueue from "p-queue";
import {
  defaultConcurrency,
  loadSiteConfig,
  type LoadedConfig,
  type OutputFormat,
  type SiteConfig,
} from "./config.js";
import { loadContent, type LoadResult } from "./content.js";
import { byName, entryType, type EntryType } from "./entries.js";
import { ConfigError, LoadError, RenderError, SiteError, WriteError, errorMessage } from "./errors.js";
import { formatDocument, type DocumentFormat } from "./formats.js";
import { compareByDateDesc, outputPathToUrl, tagOutputPath } from "./item.js";
import { getLogger, type Logger } from "./logger.js";
import { convertMarkup, createConverter, type MarkupConverter } from "./markdown.js";
import { Renderer, buildRenderContext, pageData, type PageData } from "./render.js";
import { TemplateResolver } from "./templates.js";
import type { BuildResult, ContentItem, PageKind } from "./types.js";

export type BuildOptions = {
  /** Build drafts as regular items. */
  drafts?: boolean;
  /** Upper bound on concurrent conversions/renders; overrides `concurrency` in the config. */
  concurrency?: number;
  /** Replaces `output_formats` from the config. */
  formats?: readonly OutputFormat[];
  /** Replaces the converter selected by the config. */
  converter?: MarkupConverter;
  logger?: Logger;
};

export type SitePaths = {
  content: string;
  templates: string[];
  static: string;
};

export function sitePaths(siteRoot: string, config: SiteConfig): SitePaths {
  const root = path.resolve(siteRoot);
  return {
    content: path.join(root, "content"),
    templates: [path.join(root, "templates"), ...config.template_paths.map(p => path.resolve(root, p))],
    static: path.join(root, "static"),
  };
}

type ItemOutcome<T> = { ok: true; value: T } | { ok: false; error: SiteError };

type OutputFile = {
  outputPath: string;
  contents: string;
};

/** A listing page not backed by a content file (home, pagination, tags). */
type SyntheticPage = {
  outputPath: string;
  kind: PageKind;
  page: PageData;
};

function emptyResult(outputDir: string): BuildResult {
  return {
    success: false,
    outputDir,
    counts: { loaded: 0, drafts: 0, converted: 0, rendered: 0, failed: 0, listings: 0, staticFiles: 0 },
    drafts: [],
    errors: [],
    durationMs: 0,
  };
}

function toOutcome<T>(err: unknown): ItemOutcome<T> {
  if (err instanceof SiteError && !err.fatal) return { ok: false, error: err };
  throw err;
}

// ---------- output helpers ----------
async function rmrf(p: string) {
  await fs.rm(p, { recursive: true, force: true });
}
async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true });
}
async function writeFile(p: string, content: string) {
  await ensureDir(path.dirname(p));
  await fs.writeFile(p, content, "utf-8");
}

function outputFilePath(outputDir: string, outputPath: string): string {
  return path.join(outputDir, ...outputPath.split("/"));
}

type StaticCopy = { copied: number; broken: LoadError[] };

/** Copy `src` to `dst`, following symbolic links; dangling links are reported, not copied. */
async function copyDir(
  src: string,
  dst: string,
  rel = "static",
  out: StaticCopy = { copied: 0, broken: [] },
): Promise<StaticCopy> {
  await ensureDir(dst);
  const entries = await fs.readdir(src, { withFileTypes: true });
  for (const ent of entries.sort(byName)) {
    const s = path.join(src, ent.name);
    const d = path.join(dst, ent.name);
    let type: EntryType;
    try {
      type = await entryType(s, ent);
    } catch (err) {
      out.broken.push(new LoadError(`${rel}/${ent.name}`, `broken symbolic link: ${errorMessage(err)}`));
      continue;
    }
    if (type === "directory") await copyDir(s, d, `${rel}/${ent.name}`, out);
    else if (type === "file") {
      await fs.copyFile(s, d);
      out.copied++;
    }
  }
  return out;
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

// ---------- listings ----------
function chunk<T>(list: T[], size: number): T[][] {
  if (list.length === 0) return [[]];
  const out: T[][] = [];
  for (let i = 0; i < list.length; i += size) out.push(list.slice(i, i + size));
  return out;
}

function homePageOutputPath(pageNumber: number): string {
  return pageNumber === 1 ? "index.html" : `page/${pageNumber}/index.html`;
}

export function homePages(posts: PageData[], config: SiteConfig, basePath: string): SyntheticPage[] {
  const groups = chunk(posts, config.paginate);
  const urlOf = (n: number) => outputPathToUrl(homePageOutputPath(n), basePath);

  return groups.map((group, i): SyntheticPage => {
    const n = i + 1;
    const outputPath = homePageOutputPath(n);
    return {
      outputPath,
      kind: "index",
      page: {
        title: config.title,
        url: urlOf(n),
        kind: "index",
        tags: [],
        content: "",
        posts: group,
        pagination: {
          page: n,
          total_pages: groups.length,
          prev_url: n > 1 ? urlOf(n - 1) : null,
          next_url: n < groups.length ? urlOf(n + 1) : null,
        },
      },
    };
  });
}

export function tagPages(items: ContentItem[], basePath: string): SyntheticPage[] {
  const groups = new Map<string, { tag: string; items: ContentItem[] }>();
  for (const item of [...items].sort(compareByDateDesc)) {
    for (const tag of item.tags) {
      const outputPath = tagOutputPath(tag);
      if (!outputPath) continue;
      const group = groups.get(outputPath) ?? { tag, items: [] };
      if (!group.items.includes(item)) group.items.push(item);
      groups.set(outputPath, group);
    }
  }

  return [...groups.keys()].sort().map((outputPath): SyntheticPage => {
    const { tag, items: tagged } = groups.get(outputPath) ?? { tag: outputPath, items: [] };
    return {
      outputPath,
      kind: "tag",
      page: {
        title: tag,
        tag,
        url: outputPathToUrl(outputPath, basePath),
        kind: "tag",
        tags: [],
        content: "",
        posts: tagged.map(pageData),
      },
    };
  });
}

// ---------- pipeline ----------
async function runAll<T>(queue: PQueue, tasks: Array<() => Promise<T>>): Promise<T[]> {
  return queue.addAll<T>(tasks, { throwOnTimeout: true });
}

/**
 * Build the site under `siteRoot` into its output directory.
 *
 * Per-item failures (load, conversion, template, render) are collected in the
 * result and the build carries on. A config error stops the build before
 * anything is written; a write error aborts the write phase.
 */
export async function buildSite(siteRoot: string, options: BuildOptions = {}): Promise<BuildResult> {
  const started = Date.now();
  const logger = options.logger ?? getLogger();
  const root = path.resolve(siteRoot);

  let loaded: LoadedConfig;
  try {
    loaded = await loadSiteConfig(root);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    const result = emptyResult(path.join(root, "_site"));
    result.errors.push(err.toBuildError());
    result.durationMs = Date.now() - started;
    return result;
  }

  const { config, outputDir, basePath } = loaded;
  const paths = sitePaths(root, config);
  const result = emptyResult(outputDir);
  const record = (err: SiteError) => {
    result.errors.push(err.toBuildError());
    if (!err.fatal) result.counts.failed++;
  };

  const queue = new PQueue({ concurrency: options.concurrency ?? defaultConcurrency(config) });

  // 1. load
  logger.debug(`loading content from ${paths.content}`);
  let load: LoadResult;
  try {
    load = await loadContent(paths.content, { basePath, includeDrafts: options.drafts });
  } catch (err) {
    // Nothing can be built from an unlistable content root; the previous output stays
    if (!(err instanceof LoadError)) throw err;
    result.errors.push(err.toBuildError());
    result.durationMs = Date.now() - started;
    return result;
  }
  load.errors.forEach(record);
  result.counts.loaded = load.items.length + load.drafts.length;
  result.counts.drafts = load.drafts.length;
  result.drafts = load.drafts.map(d => d.sourcePath);

  // 2. convert
  const converter = options.converter ?? createConverter(config);
  logger.debug(`converting ${load.items.length} items with ${converter.name}`);
  const conversions = await runAll(
    queue,
    load.items.map(item => async (): Promise<ItemOutcome<ContentItem>> => {
      try {
        item.renderedHtml = await convertMarkup(converter, item.body, {
          path: item.sourcePath,
          from: config.markup,
          timeoutMs: config.converter_timeout_ms,
        });
        return { ok: true, value: item };
      } catch (err) {
        return toOutcome(err);
      }
    }),
  );

  const claimed = new Map<string, string>();
  const items: ContentItem[] = [];
  for (const outcome of conversions) {
    if (!outcome.ok) {
      record(outcome.error);
      continue;
    }
    const item = outcome.value;
    const owner = claimed.get(item.outputPath);
    if (owner) {
      record(new RenderError(`output path ${item.outputPath} is already produced by ${owner}`, item.sourcePath));
      continue;
    }
    claimed.set(item.outputPath, item.sourcePath);
    items.push(item);
  }
  result.counts.converted = items.length;

  // 3. aggregates
  const posts = items.filter(i => i.kind === "post").sort(compareByDateDesc).map(pageData);
  const resolver = await TemplateResolver.load(paths.templates);
  const renderer = new Renderer(paths.templates, { basePath });
  logger.debug(`templates: ${resolver.templates.join(", ") || "(none)"}`);

  const renderPage = (kind: PageKind, page: PageData, sourcePath: string, layout?: string): string => {
    const templateId = resolver.resolve({ layout, kind, sourcePath });
    return renderer.render(templateId, buildRenderContext(config, page, posts), sourcePath);
  };

  // 4. render content items
  const formats = options.formats ?? config.output_formats;
  const wantsHtml = formats.includes("html");
  const documents = [...new Set(formats)].filter((f): f is DocumentFormat => f !== "html");

  const rendered = await runAll(
    queue,
    items.map(item => async (): Promise<ItemOutcome<OutputFile[]>> => {
      try {
        const files: OutputFile[] = [];
        if (wantsHtml) {
          const html = renderPage(item.kind, pageData(item), item.sourcePath, item.metadata.layout);
          files.push({ outputPath: item.outputPath, contents: html });
        }
        for (const format of documents) files.push(formatDocument(format, item));
        return { ok: true, value: files };
      } catch (err) {
        return toOutcome(err);
      }
    }),
  );

  const files: OutputFile[] = [];
  for (const outcome of rendered) {
    if (!outcome.ok) {
      record(outcome.error);
      continue;
    }
    files.push(...outcome.value);
    result.counts.rendered++;
  }

  // 5. listing pages
  if (wantsHtml) {
    const listings: SyntheticPage[] = [];
    if (claimed.has("index.html")) {
      logger.debug(`index.html comes from ${claimed.get("index.html")}; skipping generated home pages`);
    } else {
      listings.push(...homePages(posts, config, basePath));
    }
    if (resolver.has("tag")) listings.push(...tagPages(items, basePath));

    for (const listing of listings) {
      const owner = claimed.get(listing.outputPath);
      if (owner) {
        record(new RenderError(`output path ${listing.outputPath} is already produced by ${owner}`, listing.outputPath));
        continue;
      }
      try {
        files.push({ outputPath: listing.outputPath, contents: renderPage(listing.kind, listing.page, listing.outputPath) });
        claimed.set(listing.outputPath, listing.outputPath);
        result.counts.listings++;
      } catch (err) {
        const outcome = toOutcome<never>(err);
        if (!outcome.ok) record(outcome.error);
      }
    }
  }

  // 6. write: the output directory is regenerated from scratch
  try {
    const copy = await writeOutput(outputDir, paths.static, files);
    result.counts.staticFiles = copy.copied;
    copy.broken.forEach(record);
  } catch (err) {
    if (!(err instanceof WriteError)) throw err;
    record(err);
    result.durationMs = Date.now() - started;
    return result;
  }

  result.success = result.counts.rendered > 0;
  result.durationMs = Date.now() - started;
  return result;
}

async function writeOutput(outputDir: string, staticDir: string, files: OutputFile[]): Promise<StaticCopy> {
  const attempt = async <T>(target: string, op: () => Promise<T>): Promise<T> => {
    try {
      return await op();
    } catch (err) {
      throw new WriteError(target, errorMessage(err));
    }
  };

  await attempt(outputDir, async () => {
    await rmrf(outputDir);
    await ensureDir(outputDir);
  });

  let copy: StaticCopy = { copied: 0, broken: [] };
  if (await isDirectory(staticDir)) {
    const target = path.join(outputDir, "static");
    copy = await attempt(target, () => copyDir(staticDir, target));
  }

  const sorted = [...files].sort((a, b) => (a.outputPath < b.outputPath ? -1 : a.outputPath > b.outputPath ? 1 : 0));
  for (const file of sorted) {
    const target = outputFilePath(outputDir, file.outputPath);
    await attempt(target, () => writeFile(target, file.contents));
  }
  return copy;
}

export function logBuildResult(logger: Logger, result: BuildResult): void {
  const { counts } = result;
  const summary =
    `built ${counts.rendered} page${counts.rendered === 1 ? "" : "s"} ` +
    `(${counts.listings} listing, ${counts.staticFiles} static), ` +
    `${counts.failed} failed in ${result.durationMs}ms`;

  if (result.success) logger.success(summary);
  else logger.error(`build failed: ${summary}`);

  for (const e of result.errors) {
    logger.warn(`${e.kind}${e.path ? ` ${e.path}` : ""}: ${e.message}`);
  }
  if (result.drafts.length) {
    logger.info(`skipped ${result.drafts.length} draft${result.drafts.length === 1 ? "" : "s"}`);
    logger.debug(`drafts: ${result.drafts.join(", ")}`);
  }
  logger.debug(`output: ${result.outputDir}`);
}

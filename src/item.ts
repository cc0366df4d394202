import path from "node:path";
import type { ContentItem, ContentKind, FrontMatter } from "./types.js";

export const CONTENT_EXTENSIONS = [".md", ".markdown"] as const;

export function isContentFile(name: string): boolean {
  const ext = path.extname(name).toLowerCase();
  return CONTENT_EXTENSIONS.some(e => e === ext);
}

function normalizeSlug(s: string): string {
  return s.trim().replace(/\s+/g, "-");
}

function stripExtension(p: string): string {
  const ext = path.posix.extname(p);
  return ext ? p.slice(0, -ext.length) : p;
}

/** Files under a top-level `posts/` directory are posts; everything else is a page. */
export function deriveKind(sourcePath: string, meta: FrontMatter): ContentKind {
  if (meta.kind) return meta.kind;
  return sourcePath.split("/")[0] === "posts" ? "post" : "page";
}

/**
 * Pretty-URL output path, relative to the output directory:
 *   "posts/hello.md"  -> "posts/hello/index.html"
 *   "docs/index.md"   -> "docs/index.html"
 *   "index.md"        -> "index.html"
 * A `permalink` in the header overrides the convention.
 */
export function deriveOutputPath(sourcePath: string, meta: FrontMatter): string {
  if (meta.permalink !== undefined) return permalinkToOutputPath(meta.permalink);

  const parts = stripExtension(sourcePath).split("/").filter(Boolean).map(normalizeSlug);
  if (parts[parts.length - 1]?.toLowerCase() === "index") parts.pop();
  return [...parts, "index.html"].join("/");
}

/** Throws when the permalink would land outside the output directory. */
export function permalinkToOutputPath(permalink: string): string {
  const trimmed = permalink.trim();
  const normalized = path.posix.normalize(trimmed.replace(/^\/+/, "") || ".");
  if (normalized.split("/").includes("..")) {
    throw new Error(`permalink "${permalink}" escapes the output directory`);
  }
  const clean = normalized.replace(/\/+$/, "");
  if (!clean || clean === ".") return "index.html";
  if (trimmed.endsWith("/") || !path.posix.extname(clean)) return `${clean}/index.html`;
  return clean;
}

/** "posts/hello/index.html" -> "/posts/hello/", "feed.xml" -> "/feed.xml" (under the base path). */
export function outputPathToUrl(outputPath: string, basePath: string): string {
  const p = outputPath === "index.html"
    ? ""
    : outputPath.endsWith("/index.html")
      ? outputPath.slice(0, -"index.html".length)
      : outputPath;
  return basePath + p;
}

export function tagSlug(tag: string): string {
  return tag.trim().toLowerCase().replace(/[\s/\\]+/g, "-");
}

/** Where the listing page for `tag` is written; empty when the tag has no usable slug. */
export function tagOutputPath(tag: string): string {
  const slug = tagSlug(tag);
  return slug ? `tags/${slug}/index.html` : "";
}

export type ItemSource = {
  sourcePath: string;
  filePath: string;
  metadata: FrontMatter;
  body: string;
};

export function createContentItem(src: ItemSource, basePath: string): ContentItem {
  const { sourcePath, filePath, metadata, body } = src;
  const outputPath = deriveOutputPath(sourcePath, metadata);
  return {
    sourcePath,
    filePath,
    metadata,
    body,
    title: metadata.title ?? path.posix.basename(stripExtension(sourcePath)),
    date: metadata.date,
    tags: metadata.tags ?? [],
    draft: metadata.draft ?? false,
    kind: deriveKind(sourcePath, metadata),
    outputPath,
    url: outputPathToUrl(outputPath, basePath),
    renderedHtml: "",
  };
}

/** Newest first; undated items last; ties broken by source path so ordering is stable. */
export function compareByDateDesc(a: ContentItem, b: ContentItem): number {
  const at = a.date?.getTime();
  const bt = b.date?.getTime();
  if (at !== bt) {
    if (at === undefined) return 1;
    if (bt === undefined) return -1;
    return bt - at;
  }
  return a.sourcePath.localeCompare(b.sourcePath);
}

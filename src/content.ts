import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import matter from "gray-matter";
import { z } from "zod";
import { byName, entryType, type EntryType } from "./entries.js";
import { LoadError, errorMessage } from "./errors.js";
import { createContentItem, isContentFile } from "./item.js";
import type { ContentItem, FrontMatter } from "./types.js";

// Recognised header keys are checked; anything else passes through untouched.
const frontMatterSchema = z
  .object({
    // An empty `title:` is YAML null and falls back to the file stem
    title: z.preprocess(v => (v === null ? undefined : v), z.coerce.string().optional()),
    date: z
      .union([z.date(), z.string()])
      .transform((v, ctx) => {
        const d = v instanceof Date ? v : new Date(v);
        if (Number.isNaN(d.getTime())) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not an ISO 8601 date: ${String(v)}` });
          return z.NEVER;
        }
        return d;
      })
      .optional(),
    layout: z.string().min(1).optional(),
    tags: z
      .union([z.array(z.coerce.string()), z.string()])
      .transform(v => (typeof v === "string" ? [v] : v))
      .optional(),
    draft: z.boolean().optional(),
    kind: z.enum(["post", "page"]).optional(),
    permalink: z.string().optional(),
  })
  .passthrough();

const utf8 = new TextDecoder("utf-8", { fatal: true });

export type LoadOptions = {
  /** Root every generated URL hangs off, e.g. "/" or "/blog/". */
  basePath?: string;
  /** Yield drafts as buildable items instead of holding them back. */
  includeDrafts?: boolean;
};

export type LoadResult = {
  items: ContentItem[];
  /** Drafts that were loaded but held back from the build. */
  drafts: ContentItem[];
  errors: LoadError[];
};

export type ParsedSource = { metadata: FrontMatter; body: string };

/**
 * Split a content file into its YAML header and body. A file without a
 * header has empty metadata and the whole text as body.
 */
export function parseSource(raw: string): ParsedSource {
  // Passing options keeps gray-matter from caching (and sharing) parsed objects
  const parsed = matter(raw, { language: "yaml" });
  const data: unknown = parsed.data ?? {};
  const result = frontMatterSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `${i.path.length ? i.path.join(".") : "header"}: ${i.message}`)
      .join("; ");
    throw new Error(`invalid header: ${issues}`);
  }
  return { metadata: result.data, body: parsed.content };
}

type ContentScan = { files: string[]; errors: LoadError[] };

/**
 * Collect content files below `dirPath`. Symbolic links are followed; a link
 * back into one of its own ancestors is reported instead of walked. An
 * unreadable subdirectory is reported and skipped; only a failure on the
 * content root itself is thrown.
 */
async function listContentFiles(
  dirPath: string,
  relativePath: string,
  ancestors: string[],
  scan: ContentScan,
): Promise<void> {
  let real: string;
  let entries: Dirent[];
  try {
    real = await fs.realpath(dirPath);
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (err) {
    if (!relativePath) throw err;
    scan.errors.push(new LoadError(relativePath, `cannot read directory: ${errorMessage(err)}`));
    return;
  }
  if (ancestors.includes(real)) {
    scan.errors.push(new LoadError(relativePath, "symbolic link loops back to a parent directory"));
    return;
  }
  entries.sort(byName);

  for (const e of entries) {
    if (e.name.startsWith(".")) continue;
    const rel = relativePath ? `${relativePath}/${e.name}` : e.name;
    const full = path.join(dirPath, e.name);

    let type: EntryType;
    try {
      type = await entryType(full, e);
    } catch (err) {
      scan.errors.push(new LoadError(rel, `broken symbolic link: ${errorMessage(err)}`));
      continue;
    }

    if (type === "directory") await listContentFiles(full, rel, [...ancestors, real], scan);
    else if (type === "file" && isContentFile(e.name)) scan.files.push(rel);
  }
}

async function loadOne(contentRoot: string, sourcePath: string, basePath: string): Promise<ContentItem> {
  const filePath = path.join(contentRoot, ...sourcePath.split("/"));

  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (err) {
    throw new LoadError(sourcePath, `cannot read file: ${errorMessage(err)}`);
  }

  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    throw new LoadError(sourcePath, "file is not valid UTF-8 text");
  }

  try {
    const { metadata, body } = parseSource(text);
    return createContentItem({ sourcePath, filePath, metadata, body }, basePath);
  } catch (err) {
    throw new LoadError(sourcePath, errorMessage(err));
  }
}

/**
 * Scan the content root and build one ContentItem per markdown file.
 * Bad files and unreadable subdirectories become LoadErrors; the scan never
 * stops for one of them. A content root that exists but cannot be listed
 * rejects with a LoadError. Order is traversal order (entries visited by name).
 */
export async function loadContent(contentRoot: string, options: LoadOptions = {}): Promise<LoadResult> {
  const basePath = options.basePath ?? "/";
  const result: LoadResult = { items: [], drafts: [], errors: [] };

  const scan: ContentScan = { files: [], errors: result.errors };
  try {
    await listContentFiles(contentRoot, "", [], scan);
  } catch (err) {
    // A site without a content directory simply has nothing to build
    if (isNotFound(err)) return result;
    throw new LoadError(contentRoot, `cannot read content directory: ${errorMessage(err)}`);
  }

  for (const sourcePath of scan.files) {
    try {
      const item = await loadOne(contentRoot, sourcePath, basePath);
      if (item.draft && !options.includeDrafts) result.drafts.push(item);
      else result.items.push(item);
    } catch (err) {
      if (err instanceof LoadError) result.errors.push(err);
      else throw err;
    }
  }

  return result;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

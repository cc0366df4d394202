import fs from "node:fs/promises";
import path from "node:path";
import matter from "gray-matter";
import { findConfigFile } from "./config.js";
import type { ContentKind } from "./types.js";

export type NewContentOptions = {
  kind?: ContentKind;
  now?: Date;
};

export type CreatedContent = {
  /** Absolute path of the new file. */
  filePath: string;
  /** Path relative to the content root. */
  sourcePath: string;
};

/** "Hello, World!" -> "hello-world". Letters and digits outside ASCII are kept. */
export function slugify(title: string): string {
  return title
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
}

function isoDay(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/**
 * Write a new post (`content/posts/YYYY-MM-DD-<slug>.md`) or page
 * (`content/<slug>.md`) with a starter header. Refuses to overwrite, and
 * refuses to run outside a site (no config file at the root).
 */
export async function createContent(siteRoot: string, title: string, options: NewContentOptions = {}): Promise<CreatedContent> {
  const root = path.resolve(siteRoot);
  const kind = options.kind ?? "post";
  const now = options.now ?? new Date();

  if (!(await findConfigFile(root))) {
    throw new Error(`${root} is not a site: no config.yaml found`);
  }

  const slug = slugify(title);
  if (!slug) throw new Error(`cannot derive a file name from title "${title}"`);

  const sourcePath = kind === "post" ? `posts/${isoDay(now)}-${slug}.md` : `${slug}.md`;
  const filePath = path.join(root, "content", ...sourcePath.split("/"));

  const header = kind === "post" ? { title, date: now, layout: "post" } : { title, layout: "default" };
  const text = matter.stringify(`\nWrite your ${kind} here.\n`, header);

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  try {
    // "wx" fails when the file already exists
    await fs.writeFile(filePath, text, { encoding: "utf-8", flag: "wx" });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      throw new Error(`content/${sourcePath} already exists`);
    }
    throw err;
  }

  return { filePath, sourcePath };
}

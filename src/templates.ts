import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { TemplateNotFoundError } from "./errors.js";
import type { PageKind } from "./types.js";

export const TEMPLATE_EXT = ".html";

/** Conventional template for each kind, tried when no explicit layout is set. */
export const KIND_TEMPLATES: Record<PageKind, string> = {
  post: "post",
  page: "default",
  index: "index",
  tag: "tag",
};

export const FALLBACK_TEMPLATE = "default";

export type Resolvable = {
  layout?: string;
  kind: PageKind;
  /** Used in error reports. */
  sourcePath: string;
};

function toTemplateId(name: string): string {
  const n = name.trim().replace(/^\/+/, "");
  return n.endsWith(TEMPLATE_EXT) ? n : n + TEMPLATE_EXT;
}

async function listTemplates(dir: string, rel: string, out: Set<string>): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return;
    throw err;
  }
  for (const e of entries) {
    if (e.name.startsWith(".")) continue;
    const r = rel ? `${rel}/${e.name}` : e.name;
    if (e.isDirectory()) await listTemplates(path.join(dir, e.name), r, out);
    else if (e.isFile() && e.name.endsWith(TEMPLATE_EXT)) out.add(r);
  }
}

/**
 * Picks the template for a page: explicit `layout`, then the kind's
 * convention, then `default`. The search path is listed once, on load,
 * and the resolver is reused for the whole build.
 */
export class TemplateResolver {
  private constructor(
    readonly searchPath: readonly string[],
    private readonly available: ReadonlySet<string>,
  ) {}

  static async load(searchPath: readonly string[]): Promise<TemplateResolver> {
    const names = new Set<string>();
    for (const dir of searchPath) await listTemplates(dir, "", names);
    return new TemplateResolver(searchPath, names);
  }

  get templates(): string[] {
    return [...this.available].sort();
  }

  has(name: string): boolean {
    return this.available.has(toTemplateId(name));
  }

  /** Returns the template id (search-path-relative file name) or throws TemplateNotFoundError. */
  resolve(item: Resolvable): string {
    if (item.layout) {
      // An explicit layout never falls back
      const id = toTemplateId(item.layout);
      if (this.available.has(id)) return id;
      throw new TemplateNotFoundError(item.layout, item.sourcePath);
    }

    const conventional = toTemplateId(KIND_TEMPLATES[item.kind]);
    if (this.available.has(conventional)) return conventional;

    const fallback = toTemplateId(FALLBACK_TEMPLATE);
    if (this.available.has(fallback)) return fallback;

    throw new TemplateNotFoundError(KIND_TEMPLATES[item.kind], item.sourcePath);
  }
}

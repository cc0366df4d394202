import nunjucks from "nunjucks";
import type { Environment } from "nunjucks";
import type { SiteConfig } from "./config.js";
import { RenderError, errorMessage } from "./errors.js";
import { outputPathToUrl, tagOutputPath } from "./item.js";
import type { ContentItem, PageKind } from "./types.js";

/** What a template sees as `page`: the header keys plus the derived fields. */
export type PageData = {
  [key: string]: unknown;
  title: string;
  url: string;
  kind: PageKind;
  tags: string[];
  date?: Date;
  source_path?: string;
  /** Rendered body HTML. */
  content: string;
};

export type RenderContext = {
  site: SiteConfig;
  page: PageData;
  /** Every post, newest first. */
  content: PageData[];
};

export function pageData(item: ContentItem): PageData {
  return {
    ...item.metadata,
    title: item.title,
    date: item.date,
    tags: item.tags,
    kind: item.kind,
    url: item.url,
    source_path: item.sourcePath,
    content: item.renderedHtml,
  };
}

export function buildRenderContext(site: SiteConfig, page: PageData, posts: PageData[]): RenderContext {
  return { site, page, content: posts };
}

type DateStyle = "iso" | "long" | "short";

/** `{{ page.date | date("long") }}`. Dates are formatted in UTC so output does not depend on the host. */
export function formatDate(value: unknown, style: DateStyle = "iso"): string {
  const d = value instanceof Date ? value : new Date(String(value));
  if (Number.isNaN(d.getTime())) return "";

  switch (style) {
    case "long":
      return d.toLocaleDateString("en-US", { timeZone: "UTC", year: "numeric", month: "long", day: "numeric" });
    case "short":
      return d.toLocaleDateString("en-US", { timeZone: "UTC", year: "numeric", month: "short", day: "numeric" });
    case "iso":
    default:
      return d.toISOString().slice(0, 10);
  }
}

/**
 * Thin wrapper over a nunjucks environment rooted at the template search
 * path. Inheritance (`{% extends %}`) and includes are nunjucks' business;
 * this only passes the context through and types the failures.
 */
export type RendererOptions = {
  /** Prefix for the `url` and `tag_url` filters, e.g. "/" or "/blog/". */
  basePath?: string;
};

/** `{{ 'static/site.css' | url }}`: a site-relative path rooted at the base path. */
export function siteUrl(target: unknown, basePath = "/"): string {
  return basePath + String(target).replace(/^\/+/, "");
}

export class Renderer {
  private readonly env: Environment;

  constructor(searchPath: readonly string[], options: RendererOptions = {}) {
    const basePath = options.basePath ?? "/";
    const loader = new nunjucks.FileSystemLoader([...searchPath], { noCache: true });
    this.env = new nunjucks.Environment(loader, { autoescape: true, throwOnUndefined: true });
    this.env.addFilter("date", formatDate);
    this.env.addFilter("url", (target: unknown) => siteUrl(target, basePath));
    // Same path the generated tag pages are written to
    this.env.addFilter("tag_url", (tag: unknown) => outputPathToUrl(tagOutputPath(String(tag)), basePath));
  }

  render(templateId: string, context: RenderContext, itemPath?: string): string {
    try {
      return this.env.render(templateId, context);
    } catch (err) {
      throw new RenderError(errorMessage(err), itemPath, templateId);
    }
  }
}

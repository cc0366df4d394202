import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";

export const CONFIG_FILENAMES = ["config.yaml", "config.yml"] as const;

/** Per-item outputs: the templated page plus machine-readable copies beside it. */
export const OUTPUT_FORMATS = ["html", "json", "plain", "xml"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(f => f === value);
}

const siteConfigSchema = z
  .object({
    title: z.string().default("My Site"),
    url: z.string().default("http://localhost:8000"),
    description: z.string().default(""),
    author: z.string().default(""),
    output_dir: z.string().min(1).default("_site"),
    paginate: z.number().int().positive().default(10),
    output_formats: z.array(z.enum(OUTPUT_FORMATS)).min(1).default(["html"]),
    converter: z.enum(["marked", "pandoc"]).default("marked"),
    markup: z.string().min(1).default("markdown"),
    converter_timeout_ms: z.number().int().positive().default(10_000),
    pandoc_args: z.array(z.string()).default([]),
    concurrency: z.number().int().positive().optional(),
    template_paths: z.array(z.string()).default([]),
  })
  .passthrough();

export type SiteConfig = Readonly<z.infer<typeof siteConfigSchema>>;

export type LoadedConfig = {
  config: SiteConfig;
  /** Absolute path of the file the config came from; undefined when defaults were used. */
  configPath?: string;
  outputDir: string;
  basePath: string;
};

/**
 * Turn the site URL into the path every generated link is rooted at:
 * "https://example.com/blog" -> "/blog/". Anything unparsable maps to "/".
 */
export function basePathFromUrl(siteUrl: string): string {
  let b: string;
  try {
    b = new URL(siteUrl).pathname;
  } catch {
    return "/";
  }
  b = b.trim();
  if (!b) return "/";
  if (!b.startsWith("/")) b = "/" + b;
  if (!b.endsWith("/")) b = b + "/";
  return b;
}

export async function findConfigFile(siteRoot: string): Promise<string | undefined> {
  for (const name of CONFIG_FILENAMES) {
    const candidate = path.join(siteRoot, name);
    try {
      const st = await fs.stat(candidate);
      if (st.isFile()) return candidate;
    } catch {
      // not present; try the next name
    }
  }
  return undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Parse configuration text. Throws ConfigError for anything that is not a valid mapping. */
export function parseSiteConfig(raw: string, source = "config"): SiteConfig {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`invalid YAML: ${errorMessage(err)}`, source);
  }
  // An empty file is a valid, empty configuration
  if (doc === undefined || doc === null) doc = {};
  if (typeof doc !== "object" || Array.isArray(doc)) {
    throw new ConfigError("configuration must be a mapping of keys to values", source);
  }

  const parsed = siteConfigSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigError(`invalid configuration: ${formatIssues(parsed.error)}`, source);
  }
  return Object.freeze(parsed.data);
}

export function resolveOutputDir(siteRoot: string, config: SiteConfig): string {
  const root = path.resolve(siteRoot);
  const out = path.resolve(root, config.output_dir);
  const rel = path.relative(root, out);
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new ConfigError(`output_dir "${config.output_dir}" must be a directory inside the site root`);
  }
  return out;
}

export function defaultConcurrency(config: SiteConfig): number {
  return config.concurrency ?? Math.max(1, os.availableParallelism());
}

/** Load config.yaml (or config.yml) from the site root, applying defaults for missing keys. */
export async function loadSiteConfig(siteRoot: string): Promise<LoadedConfig> {
  const configPath = await findConfigFile(siteRoot);

  let raw = "";
  if (configPath) {
    try {
      raw = await fs.readFile(configPath, "utf-8");
    } catch (err) {
      throw new ConfigError(`cannot read configuration: ${errorMessage(err)}`, configPath);
    }
  }

  const config = parseSiteConfig(raw, configPath ?? "config");
  return {
    config,
    configPath,
    outputDir: resolveOutputDir(siteRoot, config),
    basePath: basePathFromUrl(config.url),
  };
}

export type FrontMatter = {
  title?: string;
  date?: Date;
  layout?: string;
  tags?: string[];
  draft?: boolean;
  kind?: ContentKind;
  permalink?: string;
  [key: string]: unknown;
};

export type ContentKind = "post" | "page";

/** Kinds the template resolver knows about; `index` and `tag` are synthesised listing pages. */
export type PageKind = ContentKind | "index" | "tag";

export type ContentItem = {
  /** Path relative to the content root, always `/`-separated. */
  sourcePath: string;
  filePath: string;
  metadata: FrontMatter;
  body: string;
  title: string;
  date?: Date;
  tags: string[];
  draft: boolean;
  kind: ContentKind;
  /** Path relative to the output directory, e.g. `posts/hello/index.html`. */
  outputPath: string;
  url: string;
  /** Empty until the conversion phase has run for this item. */
  renderedHtml: string;
};

export type ErrorKind =
  | "ConfigError"
  | "LoadError"
  | "ConversionError"
  | "TemplateNotFoundError"
  | "RenderError"
  | "WriteError";

export type BuildError = {
  kind: ErrorKind;
  path?: string;
  message: string;
};

export type BuildCounts = {
  loaded: number;
  drafts: number;
  converted: number;
  rendered: number;
  failed: number;
  /** Listing pages (home, pagination, tags) not tied to a single content item. */
  listings: number;
  staticFiles: number;
};

export type BuildResult = {
  success: boolean;
  outputDir: string;
  counts: BuildCounts;
  drafts: string[];
  errors: BuildError[];
  durationMs: number;
};

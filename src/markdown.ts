import { Marked } from "marked";
import type { SiteConfig } from "./config.js";
import { ConversionError, errorMessage } from "./errors.js";
import { PandocConverter } from "./markdown/pandoc.js";

export type ConvertRequest = {
  from: string;
  to: string;
  /** Aborted when the adapter's timeout fires. */
  signal: AbortSignal;
};

/** A document converter: markup string in, converted markup out. */
export interface MarkupConverter {
  readonly name: string;
  convert(source: string, request: ConvertRequest): Promise<string>;
}

const MARKDOWN_FORMATS = new Set(["markdown", "md", "gfm", "commonmark"]);

/** In-process markdown to HTML through marked. */
export class MarkedConverter implements MarkupConverter {
  readonly name = "marked";
  private readonly marked = new Marked({ gfm: true, async: false });

  async convert(source: string, { from, to, signal }: ConvertRequest): Promise<string> {
    if (!MARKDOWN_FORMATS.has(from.toLowerCase())) {
      throw new Error(`marked cannot read "${from}"`);
    }
    if (to.toLowerCase() !== "html") {
      throw new Error(`marked cannot write "${to}"`);
    }
    signal.throwIfAborted();
    return await this.marked.parse(source);
  }
}

export function createConverter(config: SiteConfig): MarkupConverter {
  if (config.converter === "pandoc") return new PandocConverter({ extraArgs: config.pandoc_args });
  return new MarkedConverter();
}

export type ConvertOptions = {
  /** Source path of the item, used in error reports. */
  path: string;
  from?: string;
  to?: string;
  timeoutMs: number;
};

/**
 * Run one conversion. Any failure, including the timeout, comes back as a
 * ConversionError for the item.
 */
export async function convertMarkup(
  converter: MarkupConverter,
  body: string,
  { path, from = "markdown", to = "html", timeoutMs }: ConvertOptions,
): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timedOut = new ConversionError(path, `${converter.name} timed out after ${timeoutMs}ms`);
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(timedOut);
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([converter.convert(body, { from, to, signal: controller.signal }), timeout]);
  } catch (err) {
    // A converter reacting to the abort must not mask the timeout
    if (controller.signal.aborted) throw timedOut;
    if (err instanceof ConversionError) throw err;
    throw new ConversionError(path, `${converter.name}: ${errorMessage(err)}`);
  } finally {
    clearTimeout(timer);
  }
}

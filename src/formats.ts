import path from "node:path";
import type { OutputFormat } from "./config.js";
import type { ContentItem } from "./types.js";

/** Formats written straight from the item, without a template. */
export type DocumentFormat = Exclude<OutputFormat, "html">;

export const DOCUMENT_EXTENSIONS: Record<DocumentFormat, string> = {
  json: ".json",
  plain: ".txt",
  xml: ".xml",
};

const RULE = "=".repeat(80);
const XML_NAME = /^[A-Za-z_][\w.-]*$/;

/** Header fields with the resolved title first; absent values are left out. */
export function documentFields(item: ContentItem): Array<[string, unknown]> {
  const fields = new Map<string, unknown>([["title", item.title]]);
  for (const [key, value] of Object.entries(item.metadata)) {
    if (!fields.has(key)) fields.set(key, value);
  }
  return [...fields].filter(([, value]) => value !== undefined && value !== null);
}

function fieldText(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(fieldText).join(", ");
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function jsonDocument(item: ContentItem): string {
  return JSON.stringify({ metadata: item.metadata, url: item.url, content: item.renderedHtml }, null, 2) + "\n";
}

/** `METADATA:` lines, then the markup source under a `CONTENT:` rule. */
function plainDocument(item: ContentItem): string {
  const header = documentFields(item).map(
    ([key, value]) => `${key.charAt(0).toUpperCase()}${key.slice(1)}: ${fieldText(value)}`,
  );
  return ["METADATA:", ...header, "", "CONTENT:", RULE, "", item.body.trim(), ""].join("\n");
}

function xmlField([key, value]: [string, unknown]): string {
  const [open, close] = XML_NAME.test(key)
    ? [`<${key}>`, `</${key}>`]
    : [`<field name="${escapeXml(key)}">`, "</field>"];
  const inner = Array.isArray(value)
    ? value.map(v => `<item>${escapeXml(fieldText(v))}</item>`).join("")
    : escapeXml(fieldText(value));
  return `    ${open}${inner}${close}`;
}

/** The rendered HTML goes in verbatim as CDATA; it need not be well-formed XML. */
function xmlDocument(item: ContentItem): string {
  const cdata = item.renderedHtml.split("]]>").join("]]]]><![CDATA[>");
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<document url="${escapeXml(item.url)}">`,
    "  <meta>",
    ...documentFields(item).map(xmlField),
    "  </meta>",
    `  <content><![CDATA[${cdata}]]></content>`,
    "</document>",
    "",
  ].join("\n");
}

function withExtension(outputPath: string, ext: string): string {
  const cur = path.posix.extname(outputPath);
  return (cur ? outputPath.slice(0, -cur.length) : outputPath) + ext;
}

export type DocumentFile = { outputPath: string; contents: string };

/** The file one item produces in `format`, next to its HTML page. */
export function formatDocument(format: DocumentFormat, item: ContentItem): DocumentFile {
  const outputPath = withExtension(item.outputPath, DOCUMENT_EXTENSIONS[format]);
  switch (format) {
    case "json":
      return { outputPath, contents: jsonDocument(item) };
    case "plain":
      return { outputPath, contents: plainDocument(item) };
    case "xml":
      return { outputPath, contents: xmlDocument(item) };
  }
}

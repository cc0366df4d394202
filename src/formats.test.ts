import { describe, expect, it } from "vitest";
import { documentFields, escapeXml, formatDocument } from "./formats.js";
import { createContentItem } from "./item.js";
import type { ContentItem, FrontMatter } from "./types.js";

function item(sourcePath: string, metadata: FrontMatter, body = "", renderedHtml = ""): ContentItem {
  const created = createContentItem({ sourcePath, filePath: `/site/content/${sourcePath}`, metadata, body }, "/");
  return { ...created, renderedHtml };
}

describe("documentFields", () => {
  it("puts the resolved title first and drops empty values", () => {
    const fields = documentFields(item("notes/first.md", { summary: null, tags: ["x"], extra: undefined }));
    expect(fields).toEqual([
      ["title", "first"],
      ["tags", ["x"]],
    ]);
  });
});

describe("formatDocument", () => {
  it("writes plain text beside the page", () => {
    const doc = formatDocument("plain", item("notes/first.md", { tags: ["x", "y"] }, "  text  \n"));
    expect(doc.outputPath).toBe("notes/first/index.txt");
    expect(doc.contents).toBe(`METADATA:\nTitle: first\nTags: x, y\n\nCONTENT:\n${"=".repeat(80)}\n\ntext\n`);
  });

  it("keeps a CDATA terminator inside the XML content intact", () => {
    const doc = formatDocument("xml", item("a.md", {}, "", "<p>a]]>b</p>"));
    expect(doc.outputPath).toBe("a/index.xml");
    expect(doc.contents).toContain("  <content><![CDATA[<p>a]]]]><![CDATA[>b</p>]]></content>\n");
  });

  it("uses a field element for keys that are not XML names", () => {
    const doc = formatDocument("xml", item("a.md", { "2nd key": "v" }));
    expect(doc.contents).toContain('    <field name="2nd key">v</field>\n');
  });

  it("serialises json with metadata, url and content", () => {
    const doc = formatDocument("json", item("a.md", { title: "A" }, "", "<p>x</p>"));
    expect(doc.outputPath).toBe("a/index.json");
    expect(JSON.parse(doc.contents)).toEqual({ metadata: { title: "A" }, url: "/a/", content: "<p>x</p>" });
  });
});

describe("escapeXml", () => {
  it("escapes markup and quotes", () => {
    expect(escapeXml(`<a href="x">Fish & 'Chips'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Fish &amp; &apos;Chips&apos;&lt;/a&gt;",
    );
  });
});

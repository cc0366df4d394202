import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { runDoctor } from "./doctor.js";
import { cleanupSites, createSite } from "./test/site.js";

afterEach(cleanupSites);

describe("runDoctor", () => {
  it("passes a complete site using the built-in converter", async () => {
    const root = await createSite({
      "config.yaml": "title: Test\n",
      "content/a.md": "a",
      "templates/default.html": "",
      "static/x.css": "",
    });

    const checks = await runDoctor(root);

    expect(checks.map(c => [c.name, c.ok])).toEqual([
      ["config", true],
      ["content", true],
      ["templates", true],
      ["static", true],
      ["converter", true],
    ]);
    expect(checks[0]?.detail).toBe("config.yaml (Test)");
  });

  it("flags missing directories; static is optional", async () => {
    const root = await createSite({ "config.yaml": "title: Test\n" });

    const checks = await runDoctor(root);

    expect(checks.find(c => c.name === "content")).toEqual({
      name: "content",
      ok: false,
      detail: `${path.join(root, "content")} does not exist`,
    });
    expect(checks.find(c => c.name === "static")?.ok).toBe(true);
  });

  it("stops at a broken config", async () => {
    const root = await createSite({ "config.yaml": "paginate: nope\n" });

    const checks = await runDoctor(root);

    expect(checks).toHaveLength(1);
    expect(checks[0]?.ok).toBe(false);
    expect(checks[0]?.detail).toMatch(/^invalid configuration: paginate:/);
  });

  it("reports an unavailable pandoc", async () => {
    const root = await createSite({
      "config.yaml": "converter: pandoc\n",
      "content/a.md": "a",
      "templates/default.html": "",
    });

    const checks = await runDoctor(root, "quire-no-such-converter");

    expect(checks.at(-1)).toEqual({ name: "converter", ok: false, detail: "quire-no-such-converter not found on PATH" });
  });
});

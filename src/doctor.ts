import fs from "node:fs/promises";
import path from "node:path";
import { loadSiteConfig, type LoadedConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { sitePaths } from "./generate.js";
import { PandocConverter } from "./markdown/pandoc.js";

export type Check = {
  name: string;
  ok: boolean;
  detail: string;
};

async function dirCheck(name: string, dir: string, required: boolean): Promise<Check> {
  try {
    const st = await fs.stat(dir);
    if (st.isDirectory()) return { name, ok: true, detail: dir };
    return { name, ok: false, detail: `${dir} is not a directory` };
  } catch {
    return { name, ok: !required, detail: `${dir} does not exist` };
  }
}

/** Pre-flight checks for a site root; never throws for a broken site. */
export async function runDoctor(siteRoot: string, pandocCommand = "pandoc"): Promise<Check[]> {
  const root = path.resolve(siteRoot);
  const checks: Check[] = [];

  let loaded: LoadedConfig;
  try {
    loaded = await loadSiteConfig(root);
    checks.push({
      name: "config",
      ok: true,
      detail: loaded.configPath ? `${path.relative(root, loaded.configPath)} (${loaded.config.title})` : "no config file, using defaults",
    });
  } catch (err) {
    checks.push({ name: "config", ok: false, detail: errorMessage(err) });
    return checks;
  }

  const paths = sitePaths(root, loaded.config);
  checks.push(await dirCheck("content", paths.content, true));
  for (const dir of paths.templates) checks.push(await dirCheck("templates", dir, true));
  checks.push(await dirCheck("static", paths.static, false));

  if (loaded.config.converter === "pandoc") {
    try {
      const version = await new PandocConverter({ command: pandocCommand }).version();
      checks.push({ name: "converter", ok: true, detail: version });
    } catch (err) {
      checks.push({ name: "converter", ok: false, detail: errorMessage(err) });
    }
  } else {
    checks.push({ name: "converter", ok: true, detail: "marked (built in)" });
  }

  return checks;
}

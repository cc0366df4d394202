// External converter: pipes the body through a `pandoc` process.
// The adapter's AbortSignal kills the process on timeout.

import { spawn } from "node:child_process";
import type { ConvertRequest, MarkupConverter } from "../markdown.js";

export type PandocOptions = {
  command?: string;
  extraArgs?: readonly string[];
};

type RunResult = { code: number | null; stdout: string; stderr: string };

function run(command: string, args: readonly string[], input: string, signal?: AbortSignal): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { signal });
    const out: Buffer[] = [];
    const err: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => out.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => err.push(chunk));
    child.on("error", (e: Error) => {
      if ("code" in e && e.code === "ENOENT") reject(new Error(`${command} not found on PATH`));
      else reject(e);
    });
    child.on("close", code => {
      resolve({
        code,
        stdout: Buffer.concat(out).toString("utf-8"),
        stderr: Buffer.concat(err).toString("utf-8").trim(),
      });
    });

    child.stdin.on("error", (e: Error) => {
      // EPIPE: the process exited before reading its input; "close" carries the exit status
      if (!("code" in e && e.code === "EPIPE")) reject(e);
    });
    child.stdin.end(input, "utf-8");
  });
}

export class PandocConverter implements MarkupConverter {
  readonly name = "pandoc";
  private readonly command: string;
  private readonly extraArgs: readonly string[];

  constructor(options: PandocOptions = {}) {
    this.command = options.command ?? "pandoc";
    this.extraArgs = options.extraArgs ?? [];
  }

  async convert(source: string, { from, to, signal }: ConvertRequest): Promise<string> {
    const res = await run(this.command, ["--from", from, "--to", to, ...this.extraArgs], source, signal);
    if (res.code !== 0) {
      throw new Error(res.stderr || `${this.command} exited with code ${res.code}`);
    }
    return res.stdout;
  }

  /** First line of `pandoc --version`; rejects when pandoc is unavailable. */
  async version(): Promise<string> {
    const res = await run(this.command, ["--version"], "");
    if (res.code !== 0) throw new Error(res.stderr || `${this.command} exited with code ${res.code}`);
    return res.stdout.split("\n")[0]?.trim() ?? "";
  }
}

import type { Dirent } from "node:fs";
import fs from "node:fs/promises";

export type EntryType = "file" | "directory" | "other";

/** What a directory entry is, following symbolic links. Rejects for a dangling link. */
export async function entryType(fullPath: string, entry: Dirent): Promise<EntryType> {
  if (!entry.isSymbolicLink()) return entry.isDirectory() ? "directory" : entry.isFile() ? "file" : "other";
  const target = await fs.stat(fullPath);
  return target.isDirectory() ? "directory" : target.isFile() ? "file" : "other";
}

export function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

import path from "node:path";
import fs from "node:fs/promises";
import type { Dirent, Stats } from "node:fs";
import { InputNotFoundError, errorMessage } from "./errors.js";
import { hasExtension } from "./utils.js";
import type { CatalogEntry } from "./types.js";

/**
 * Lists every candidate file under `input`, skipping files that already carry
 * `targetExtension`. A file input yields a one-entry catalog rooted at its
 * directory. Symlinked directories are not followed; other symlinks, dangling
 * ones included, are kept for the worker to report on. Unreadable
 * subdirectories are reported and skipped; only a missing root is fatal.
 */
export async function catalog(input: string, targetExtension: string): Promise<CatalogEntry> {
  const root = path.resolve(input);

  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new InputNotFoundError(root);
    }
    throw err;
  }

  if (stat.isFile()) {
    return {
      inputRoot: path.dirname(root),
      files: hasExtension(root, targetExtension) ? [] : [root],
    };
  }

  if (!stat.isDirectory()) {
    throw new Error(`Input is neither a file nor a directory: ${root}`);
  }

  const files: string[] = [];
  await walk(root, targetExtension, files, true);
  return { inputRoot: root, files };
}

async function walk(dir: string, targetExtension: string, files: string[], isRoot = false): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isRoot) throw err;
    console.warn(`Warning: could not read directory ${dir}: ${errorMessage(err)}`);
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      await walk(fullPath, targetExtension, files);
      continue;
    }

    if (hasExtension(entry.name, targetExtension)) continue;

    if (entry.isFile() || (entry.isSymbolicLink() && !(await isDirectoryLink(fullPath)))) {
      files.push(fullPath);
    }
  }
}

async function isDirectoryLink(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isDirectory();
  } catch {
    return false; // dangling: kept so the worker reports it
  }
}

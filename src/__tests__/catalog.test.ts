import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { catalog } from "../catalog.js";
import { InputNotFoundError } from "../errors.js";
import { cleanup, tmpDir, writeFile } from "./helpers.js";

describe("catalog", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir();
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanup(workDir);
  });

  it("lists files recursively in name order", async () => {
    await writeFile(path.join(workDir, "b.png"), "x");
    await writeFile(path.join(workDir, "a.jpg"), "x");
    await writeFile(path.join(workDir, "sub", "deep", "c.gif"), "x");
    await writeFile(path.join(workDir, "notes.txt"), "x");

    const result = await catalog(workDir, ".webp");

    expect(result.inputRoot).toBe(path.resolve(workDir));
    expect(result.files).toEqual([
      path.join(workDir, "a.jpg"),
      path.join(workDir, "b.png"),
      path.join(workDir, "notes.txt"),
      path.join(workDir, "sub", "deep", "c.gif"),
    ]);
  });

  it("excludes files with the target extension regardless of case", async () => {
    await writeFile(path.join(workDir, "keep.png"), "x");
    await writeFile(path.join(workDir, "done.webp"), "x");
    await writeFile(path.join(workDir, "DONE2.WEBP"), "x");

    const result = await catalog(workDir, ".webp");

    expect(result.files).toEqual([path.join(workDir, "keep.png")]);
  });

  it("returns an empty list for an empty directory", async () => {
    const result = await catalog(workDir, ".webp");
    expect(result.files).toEqual([]);
  });

  it("throws InputNotFoundError for a missing root", async () => {
    const missing = path.join(workDir, "nope");
    await expect(catalog(missing, ".webp")).rejects.toBeInstanceOf(InputNotFoundError);
    await expect(catalog(missing, ".webp")).rejects.toThrow(`The input path ${missing} does not exist`);
  });

  it("treats a file input as a one-entry catalog rooted at its directory", async () => {
    const file = path.join(workDir, "single.png");
    await writeFile(file, "x");

    const result = await catalog(file, ".webp");

    expect(result).toEqual({ inputRoot: workDir, files: [file] });
  });

  it("keeps symlinked files and dangling links but not symlinked directories", async () => {
    const target = path.join(workDir, "real.png");
    await writeFile(target, "x");
    await fs.symlink(target, path.join(workDir, "link.png"));
    await fs.symlink(path.join(workDir, "gone.png"), path.join(workDir, "dangling.png"));
    await writeFile(path.join(workDir, "elsewhere", "inside.png"), "x");
    await fs.symlink(path.join(workDir, "elsewhere"), path.join(workDir, "linked-dir"));

    const result = await catalog(workDir, ".webp");

    expect(result.files).toEqual([
      path.join(workDir, "dangling.png"),
      path.join(workDir, "elsewhere", "inside.png"),
      path.join(workDir, "link.png"),
      target,
    ]);
  });

  it("skips an unreadable subdirectory and keeps listing the rest", async () => {
    await writeFile(path.join(workDir, "a.png"), "x");
    await writeFile(path.join(workDir, "locked", "hidden.png"), "x");
    await writeFile(path.join(workDir, "zz", "c.png"), "x");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const denied = Object.assign(new Error("EACCES: permission denied, scandir"), { code: "EACCES" });
    const readdir = fs.readdir;
    // root listing goes through, then "locked" is refused
    vi.spyOn(fs, "readdir").mockImplementationOnce(readdir).mockRejectedValueOnce(denied);

    const result = await catalog(workDir, ".webp");

    expect(result.files).toEqual([path.join(workDir, "a.png"), path.join(workDir, "zz", "c.png")]);
    expect(warn).toHaveBeenCalledWith(
      `Warning: could not read directory ${path.join(workDir, "locked")}: EACCES: permission denied, scandir`
    );
  });

  it("still aborts when the root itself cannot be listed", async () => {
    await writeFile(path.join(workDir, "a.png"), "x");
    vi.spyOn(fs, "readdir").mockRejectedValueOnce(new Error("EACCES: permission denied, scandir"));

    await expect(catalog(workDir, ".webp")).rejects.toThrow("EACCES: permission denied, scandir");
  });
});

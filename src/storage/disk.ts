/**
 * Local filesystem artifact storage.
 */
import { copyFile, link, mkdir, open, stat, unlink } from "node:fs/promises";
import { dirname, resolve, sep } from "node:path";
import { createInterface } from "node:readline";

import { ArtifactExistsError } from "../core/exceptions.js";
import { randomString } from "../core/paths.js";
import type { ArtifactStorage } from "./backend.js";

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

/** Removal after the artifact is already in place. */
async function discard(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch {
    // Ignore: leftovers in the scratch dir are cleaned externally
  }
}

/** link() never replaces an existing file, so a promoted artifact stays as it is. */
async function linkNew(from: string, target: string, key: string): Promise<void> {
  try {
    await link(from, target);
  } catch (err) {
    if (errorCode(err) === "EEXIST") throw new ArtifactExistsError(key);
    throw err;
  }
}

export class DiskStorage implements ArtifactStorage {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  path(key: string): string {
    const full = resolve(this.basePath, key);
    if (full !== this.basePath && !full.startsWith(this.basePath + sep)) {
      throw new Error(`Artifact key escapes storage root: ${key}`);
    }
    return full;
  }

  async exists(key: string): Promise<boolean> {
    try {
      return (await stat(this.path(key))).isFile();
    } catch (err) {
      if (errorCode(err) === "ENOENT") return false;
      throw err;
    }
  }

  async promote(scratchPath: string, key: string): Promise<void> {
    const target = this.path(key);
    await mkdir(dirname(target), { recursive: true });
    try {
      await linkNew(scratchPath, target, key);
    } catch (err) {
      if (errorCode(err) !== "EXDEV") throw err;
      // Different file system: stage a copy next to the target, then link it.
      const sibling = `${target}.${randomString(8)}.partial`;
      try {
        await copyFile(scratchPath, sibling);
        await linkNew(sibling, target, key);
      } finally {
        await discard(sibling);
      }
    }
    await discard(scratchPath);
  }

  async *lines(key: string): AsyncIterable<string> {
    // open() first: a missing artifact rejects here, not as a stream error
    const handle = await open(this.path(key), "r");
    const input = handle.createReadStream({ encoding: "utf8" });
    const rl = createInterface({ input, crlfDelay: Infinity });
    try {
      for await (const line of rl) {
        yield line;
      }
    } finally {
      rl.close();
      input.destroy();
    }
  }
}

/**
 * Fingerprints and canonical artifact paths derived from stage parameters.
 */
import { randomInt } from "node:crypto";
import { join } from "node:path";

import type { StageParameters } from "./types.js";

const LETTERS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";

export const DEFAULT_FINGERPRINT = "artefact";

/** Lowercase ASCII slug: diacritics dropped, other runs of non-alphanumerics become `-`. */
export function slug(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Deterministic name for a parameter set: `name-slug(value)` pairs sorted
 * by name and joined with `-`.
 */
export function fingerprint(
  params: StageParameters,
  fallback: string = DEFAULT_FINGERPRINT,
): string {
  // sort() is stable, so duplicate names keep declaration order
  const parts = [...params]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((p) => `${p.name}-${slug(p.value)}`);
  const joined = parts.join("-");
  return joined.length === 0 ? fallback : joined;
}

/** `GndDump` → `gnd-dump`. */
export function stageKindSlug(typeName: string): string {
  return typeName.replace(/([a-z])([A-Z])/g, "$1-$2").toLowerCase();
}

export interface ArtifactAddress {
  tag: string;
  kind: string;
  parameters: StageParameters;
  ext: string;
}

/** `tag/kind-slug/fingerprint.ext`, always with forward slashes. */
export function artifactKey(addr: ArtifactAddress): string {
  return [
    addr.tag,
    stageKindSlug(addr.kind),
    `${fingerprint(addr.parameters)}.${addr.ext}`,
  ].join("/");
}

export function canonicalPath(baseDir: string, addr: ArtifactAddress): string {
  return join(baseDir, ...artifactKey(addr).split("/"));
}

export function randomString(length = 16): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += LETTERS[randomInt(LETTERS.length)];
  }
  return out;
}

/** A fresh path under `tmpDir`. Nothing is created on disk. */
export function scratchPath(tmpDir: string): string {
  return join(tmpDir, `tasktree-${randomString()}`);
}

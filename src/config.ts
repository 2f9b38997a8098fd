/**
 * Configuration validation.
 */
import { tmpdir } from "node:os";
import { z } from "zod";

import { DEFAULT_PROGRESS_INTERVAL } from "./extract/records.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

export const GND_DUMP_URL = "http://datendienst.dnb.de/cgi-bin/mabit.pl";

export const GND_DUMP_QUERY: Record<string, string> = {
  cmd: "fetch",
  userID: "opendata",
  pass: "opendata",
  mabheft: "GND.rdf.gz",
};

const SourceConfigSchema = z.object({
  url: z.string().url().default(GND_DUMP_URL),
  query: z.record(z.string()).default(GND_DUMP_QUERY),
});

const ToolsConfigSchema = z.object({
  download: z.string().min(1).default("wget"),
  decompress: z.string().min(1).default("gunzip"),
});

export const ConfigSchema = z.object({
  baseDir: z.string().min(1).default("./data"),
  tmpDir: z.string().min(1).default(() => tmpdir()),
  tag: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "tag must be a single path segment")
    .default("gndzero"),
  source: SourceConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  progressInterval: z.number().int().positive().default(DEFAULT_PROGRESS_INTERVAL),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw ?? {});
}

/** Full download URL with the fixed query appended in declaration order. */
export function sourceUrl(source: Config["source"]): string {
  const url = new URL(source.url);
  for (const [name, value] of Object.entries(source.query)) {
    url.searchParams.set(name, value);
  }
  return url.toString();
}

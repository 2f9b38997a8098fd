#!/usr/bin/env node
/**
 * CLI entrypoint for gnd-pipeline.
 *
 * Usage:
 *   gnd-pipeline run --date 2024-05-01 --base-dir ./data
 *   gnd-pipeline lookup 118540238 --date 2024-05-01
 */
import { parseArgs } from "node:util";
import { GndPipeline } from "./index.js";

const USAGE = `
gnd-pipeline — load the GND authority dump into an id-addressed SQLite store

Usage:
  gnd-pipeline run [options]
  gnd-pipeline lookup <id> [options]

Options:
  --date <YYYY-MM-DD>    Dump date                (default: today)
  --base-dir <dir>       Artifact directory       (default: ./data)
  --tmp-dir <dir>        Scratch directory        (default: OS temp dir)
  --tag <tag>            Source tag               (default: gndzero)
  --help                 Show this help
`.trim();

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  options: {
    date: { type: "string" },
    "base-dir": { type: "string" },
    "tmp-dir": { type: "string" },
    tag: { type: "string" },
    help: { type: "boolean", short: "h", default: false },
  },
  allowPositionals: true,
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const [command, ...rest] = positionals;

if (command !== "run" && command !== "lookup") {
  console.error(USAGE);
  process.exit(1);
}

try {
  const pipeline = GndPipeline.fromConfig({
    baseDir: values["base-dir"],
    tmpDir: values["tmp-dir"],
    tag: values.tag,
  });

  if (command === "run") {
    const result = await pipeline.build(values.date);
    console.log(
      `Ran ${result.completed.length} stage(s), skipped ${result.skipped.length}.`,
    );
    console.log(result.databasePath);
  } else {
    const [id] = rest;
    if (!id) {
      console.error(USAGE);
      process.exit(1);
    }
    const contents = await pipeline.lookup(id, values.date);
    if (contents.length === 0) {
      console.error(`No record with id ${id}`);
      process.exit(1);
    }
    console.log(contents.join("\n\n"));
  }
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

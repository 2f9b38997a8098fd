/**
 * Shared test fixtures: sample dump text, fake subprocesses, temp dirs.
 */
import { copyFileSync, mkdtempSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import type { CommandRunner, CommandSpec, ExecutableProbe } from "../src/core/process.js";
import type { Logger } from "../src/core/types.js";
import { GndPipeline } from "../src/index.js";

export const DATE = "2024-05-01";

// ---------------------------------------------------------------------------
// Mini RDF/XML dump
// ---------------------------------------------------------------------------

export const PERSON_BLOCK = [
  '  <rdf:Description rdf:about="http://d-nb.info/gnd/100000001">',
  "    <gndo:preferredNameForThePerson>Example, Erika</gndo:preferredNameForThePerson>",
  "  </rdf:Description>",
];

export const SUBJECT_BLOCK = [
  '  <rdf:Description rdf:about="http://d-nb.info/gnd/4000002-X">',
  "    <gndo:preferredNameForTheSubjectHeading>Testing</gndo:preferredNameForTheSubjectHeading>",
  "  </rdf:Description>",
];

export const DUPLICATE_BLOCK = [
  '  <rdf:Description rdf:about="http://d-nb.info/gnd/100000001">',
  "    <gndo:variantNameForThePerson>Example, E.</gndo:variantNameForThePerson>",
  "  </rdf:Description>",
];

/**
 * Nine runs: header (no id), blank, person, blank, subject, two blanks,
 * duplicate person, blank, footer (no id).
 */
export const SAMPLE_LINES = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">',
  "",
  ...PERSON_BLOCK,
  "",
  ...SUBJECT_BLOCK,
  "",
  "   ",
  ...DUPLICATE_BLOCK,
  "",
  "</rdf:RDF>",
];

export const SAMPLE_RDF = SAMPLE_LINES.join("\n") + "\n";

export const PERSON_CONTENT = [
  '<rdf:Description rdf:about="http://d-nb.info/gnd/100000001">',
  "<gndo:preferredNameForThePerson>Example, Erika</gndo:preferredNameForThePerson>",
  "</rdf:Description>",
].join("\n");

export const SUBJECT_CONTENT = [
  '<rdf:Description rdf:about="http://d-nb.info/gnd/4000002-X">',
  "<gndo:preferredNameForTheSubjectHeading>Testing</gndo:preferredNameForTheSubjectHeading>",
  "</rdf:Description>",
].join("\n");

export const DUPLICATE_CONTENT = [
  '<rdf:Description rdf:about="http://d-nb.info/gnd/100000001">',
  "<gndo:variantNameForThePerson>Example, E.</gndo:variantNameForThePerson>",
  "</rdf:Description>",
].join("\n");

// ---------------------------------------------------------------------------
// Temp dirs
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "gnd-pipeline-test-"));
}

// ---------------------------------------------------------------------------
// Fake collaborators
// ---------------------------------------------------------------------------

export class MemoryLogger implements Logger {
  lines: string[] = [];
  errors: string[] = [];

  log(message: string): void {
    this.lines.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}

export class FakeProbe implements ExecutableProbe {
  private available: Set<string>;

  constructor(available: string[] = ["wget", "gunzip"]) {
    this.available = new Set(available);
  }

  async resolve(name: string): Promise<string | null> {
    return this.available.has(name) ? `/usr/bin/${name}` : null;
  }
}

/**
 * Stands in for wget and gunzip. The "download" writes `payload` to the
 * `-O` target; "decompression" copies its input to the stdout file.
 */
export class FakeRunner implements CommandRunner {
  calls: CommandSpec[] = [];
  exitCodes: Record<string, number | null> = {};
  payload: string;

  constructor(payload: string = SAMPLE_RDF) {
    this.payload = payload;
  }

  async run(spec: CommandSpec): Promise<number | null> {
    this.calls.push(spec);
    const code = spec.command in this.exitCodes ? this.exitCodes[spec.command] : 0;

    if (spec.command === "wget") {
      const target = spec.args[spec.args.indexOf("-O") + 1];
      writeFileSync(target, code === 0 ? this.payload : "partial");
    } else if (spec.command === "gunzip" && spec.stdoutPath) {
      copyFileSync(spec.args[spec.args.length - 1], spec.stdoutPath);
    }
    return code;
  }
}

export function makePipeline(
  dir: string,
  opts: { runner?: FakeRunner; probe?: FakeProbe; logger?: MemoryLogger } = {},
): { pipeline: GndPipeline; runner: FakeRunner; probe: FakeProbe; logger: MemoryLogger } {
  const runner = opts.runner ?? new FakeRunner();
  const probe = opts.probe ?? new FakeProbe();
  const logger = opts.logger ?? new MemoryLogger();
  const scratch = join(dir, "tmp");
  const pipeline = GndPipeline.fromConfig(
    { baseDir: join(dir, "data"), tmpDir: scratch },
    { runner, probe, logger },
  );
  return { pipeline, runner, probe, logger };
}

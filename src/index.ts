/**
 * gnd-pipeline – staged loader that turns the GND authority dump into an
 * id-addressed SQLite store.
 */
import { parseConfig, sourceUrl, type Config } from "./config.js";
import { StorageError } from "./core/exceptions.js";
import {
  SpawnCommandRunner,
  WhichProbe,
  type CommandRunner,
  type ExecutableProbe,
} from "./core/process.js";
import { Scheduler } from "./core/scheduler.js";
import type { BuildResult, Logger } from "./core/types.js";
import { RecordStore } from "./db/store.js";
import { dateParameters, type GndContext } from "./stages/context.js";
import { GndDatabase } from "./stages/database.js";
import { GndDump } from "./stages/dump.js";
import { GndExtract } from "./stages/extract.js";
import { DiskStorage } from "./storage/disk.js";

export { ConfigSchema, parseConfig, type Config, type ConfigInput } from "./config.js";
export * from "./core/exceptions.js";
export type { AuthorityRecord, BuildResult, ExtractionSummary, Logger, StageParameters } from "./core/types.js";
export { fingerprint, stageKindSlug, canonicalPath } from "./core/paths.js";
export { Scheduler } from "./core/scheduler.js";
export { ArtifactStage, type Task, type StageContext } from "./core/stage.js";
export { RecordExtractor, segment, parseBlock, GND_ID_PATTERN } from "./extract/records.js";
export { RecordStore } from "./db/store.js";
export { GndDump, GndExtract, GndDatabase };

export interface PipelineDeps {
  runner?: CommandRunner;
  probe?: ExecutableProbe;
  logger?: Logger;
}

export interface PipelineStages {
  dump: GndDump;
  extract: GndExtract;
  database: GndDatabase;
}

export class GndPipeline {
  private context: GndContext;
  private scheduler: Scheduler;

  constructor(config: Config, deps: PipelineDeps = {}) {
    const logger = deps.logger ?? console;
    this.context = {
      storage: new DiskStorage(config.baseDir),
      tmpDir: config.tmpDir,
      tag: config.tag,
      logger,
      runner: deps.runner ?? new SpawnCommandRunner(),
      probe: deps.probe ?? new WhichProbe(),
      sourceUrl: sourceUrl(config.source),
      tools: config.tools,
      progressInterval: config.progressInterval,
    };
    this.scheduler = new Scheduler(logger);
  }

  /** Construct from a configuration dict (validates with Zod). */
  static fromConfig(raw: unknown, deps: PipelineDeps = {}): GndPipeline {
    return new GndPipeline(parseConfig(raw), deps);
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /** The stage chain for one dump date (defaults to today). */
  stages(date?: string): PipelineStages {
    const params = dateParameters(date);
    return {
      dump: new GndDump(this.context, params),
      extract: new GndExtract(this.context, params),
      database: new GndDatabase(this.context, params),
    };
  }

  /** Build the store for `date`, running only the stages that are not complete. */
  async build(date?: string): Promise<BuildResult & { databasePath: string }> {
    const { database } = this.stages(date);
    const result = await this.scheduler.build([database]);
    return { ...result, databasePath: database.output() };
  }

  /** Open the finished store for `date` read-only. */
  async openStore(date?: string): Promise<RecordStore> {
    const { database } = this.stages(date);
    if (!(await database.isComplete())) {
      throw new StorageError(`No store built for ${database.id} at ${database.output()}`);
    }
    return RecordStore.open(database.output());
  }

  /** All contents stored under `id`, in dump order. */
  async lookup(id: string, date?: string): Promise<string[]> {
    const store = await this.openStore(date);
    try {
      return await store.lookup(id);
    } finally {
      await store.close();
    }
  }
}

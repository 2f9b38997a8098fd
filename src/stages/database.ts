/**
 * Load of the raw dump into an (id, content) SQLite store.
 */
import { ArtifactStage, type Task } from "../core/stage.js";
import type { ExtractionSummary, StageParameters } from "../core/types.js";
import { RecordStore } from "../db/store.js";
import { RecordExtractor } from "../extract/records.js";
import type { GndContext } from "./context.js";
import { GndExtract } from "./extract.js";

export class GndDatabase extends ArtifactStage {
  readonly kind = "GndDatabase";
  readonly ext = "db";
  private gnd: GndContext;
  private extract: GndExtract;

  constructor(gnd: GndContext, parameters: StageParameters) {
    super(gnd, parameters);
    this.gnd = gnd;
    this.extract = new GndExtract(gnd, parameters);
  }

  requires(): Task[] {
    return [this.extract];
  }

  protected async produce(scratch: string): Promise<void> {
    const extractor = new RecordExtractor({
      progressInterval: this.gnd.progressInterval,
      logger: this.ctx.logger,
    });
    const store = await RecordStore.create(scratch);
    try {
      await store.load(extractor.extract(this.ctx.storage.lines(this.extract.key)));
    } finally {
      await store.close();
    }
    this.ctx.logger.log(formatSummary(extractor.summary));
  }
}

export function formatSummary(summary: ExtractionSummary): string {
  return `Inserted ${summary.records} of ${summary.blocks} blocks (${summary.skipped} without identifier).`;
}

/**
 * Decompression of the downloaded dump into raw RDF/XML.
 */
import { ExternalToolError } from "../core/exceptions.js";
import { ArtifactStage, type Task } from "../core/stage.js";
import type { StageParameters } from "../core/types.js";
import type { GndContext } from "./context.js";
import { GndDump } from "./dump.js";
import { ExecutableCheck } from "./executable.js";

export class GndExtract extends ArtifactStage {
  readonly kind = "GndExtract";
  readonly ext = "rdf";
  private gnd: GndContext;
  private dump: GndDump;

  constructor(gnd: GndContext, parameters: StageParameters) {
    super(gnd, parameters);
    this.gnd = gnd;
    this.dump = new GndDump(gnd, parameters);
  }

  requires(): Task[] {
    return [this.dump, new ExecutableCheck(this.gnd.probe, this.gnd.tools.decompress)];
  }

  protected async produce(scratch: string): Promise<void> {
    const tool = this.gnd.tools.decompress;
    const args = ["-c", this.dump.output()];
    this.ctx.logger.log(`${tool} ${args.join(" ")} > ${scratch}`);
    const code = await this.gnd.runner.run({ command: tool, args, stdoutPath: scratch });
    if (code !== 0) {
      throw new ExternalToolError(tool, code, `Could not decompress GND dump (${tool} exit ${code})`);
    }
  }
}

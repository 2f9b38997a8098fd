/**
 * Download of the compressed GND dump.
 */
import { ExternalToolError, MissingExecutableError } from "../core/exceptions.js";
import { ArtifactStage, type Task } from "../core/stage.js";
import type { StageParameters } from "../core/types.js";
import type { GndContext } from "./context.js";
import { ExecutableCheck } from "./executable.js";

export class GndDump extends ArtifactStage {
  readonly kind = "GndDump";
  readonly ext = "rdf.gz";
  private gnd: GndContext;

  constructor(gnd: GndContext, parameters: StageParameters) {
    super(gnd, parameters);
    this.gnd = gnd;
  }

  requires(): Task[] {
    return [new ExecutableCheck(this.gnd.probe, this.gnd.tools.download)];
  }

  protected async produce(scratch: string): Promise<void> {
    const tool = this.gnd.tools.download;
    if ((await this.gnd.probe.resolve(tool)) === null) {
      throw new MissingExecutableError(tool);
    }

    const args = [this.gnd.sourceUrl, "-O", scratch];
    this.ctx.logger.log(`${tool} ${args.join(" ")}`);
    const code = await this.gnd.runner.run({ command: tool, args });
    if (code !== 0) {
      throw new ExternalToolError(tool, code, `Could not download GND dump (${tool} exit ${code})`);
    }
  }
}

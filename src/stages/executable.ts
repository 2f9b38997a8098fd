/**
 * Requirement on an external program being available on the search path.
 */
import { MissingExecutableError } from "../core/exceptions.js";
import type { ExecutableProbe } from "../core/process.js";
import type { Task } from "../core/stage.js";

export class ExecutableCheck implements Task {
  readonly name: string;
  private probe: ExecutableProbe;

  constructor(probe: ExecutableProbe, name: string) {
    this.probe = probe;
    this.name = name;
  }

  get id(): string {
    return `Executable(${this.name})`;
  }

  requires(): Task[] {
    return [];
  }

  async isComplete(): Promise<boolean> {
    return (await this.probe.resolve(this.name)) !== null;
  }

  /** Only reached when the program is missing: complain explicitly. */
  async run(): Promise<void> {
    if (!(await this.isComplete())) {
      throw new MissingExecutableError(this.name);
    }
  }
}

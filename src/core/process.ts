/**
 * External program execution: argv-only subprocesses and PATH lookup.
 */
import { spawn } from "node:child_process";
import { open } from "node:fs/promises";
import which from "which";

export interface CommandSpec {
  command: string;
  args: readonly string[];
  /** Redirect the child's stdout into this file (created or truncated). */
  stdoutPath?: string;
}

/** Runs a command to completion and resolves with its exit code (`null` when killed). */
export interface CommandRunner {
  run(spec: CommandSpec): Promise<number | null>;
}

/** Resolves an executable name against the search path. */
export interface ExecutableProbe {
  resolve(name: string): Promise<string | null>;
}

export class WhichProbe implements ExecutableProbe {
  async resolve(name: string): Promise<string | null> {
    return which(name, { nothrow: true });
  }
}

export class SpawnCommandRunner implements CommandRunner {
  async run(spec: CommandSpec): Promise<number | null> {
    const out = spec.stdoutPath ? await open(spec.stdoutPath, "w") : null;
    try {
      return await new Promise<number | null>((resolve, reject) => {
        const child = spawn(spec.command, [...spec.args], {
          shell: false,
          stdio: ["ignore", out ? out.fd : "inherit", "inherit"],
        });
        child.once("error", reject);
        child.once("close", (code) => resolve(code));
      });
    } finally {
      await out?.close();
    }
  }
}

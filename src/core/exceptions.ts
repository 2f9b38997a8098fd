/**
 * Custom errors for pipeline stages.
 */

export class MissingExecutableError extends Error {
  executable: string;

  constructor(executable: string) {
    super(`External program ${executable} required`);
    this.name = "MissingExecutableError";
    this.executable = executable;
  }
}

export class ExternalToolError extends Error {
  tool: string;
  exitCode: number | null;

  constructor(tool: string, exitCode: number | null, message?: string) {
    super(
      message ??
        (exitCode === null
          ? `${tool} was terminated by a signal`
          : `${tool} exited with code ${exitCode}`),
    );
    this.name = "ExternalToolError";
    this.tool = tool;
    this.exitCode = exitCode;
  }
}

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

export class ArtifactExistsError extends Error {
  key: string;

  constructor(key: string) {
    super(`Artifact ${key} already exists`);
    this.name = "ArtifactExistsError";
    this.key = key;
  }
}

export class StageFailedError extends Error {
  stageId: string;

  constructor(stageId: string, cause: unknown) {
    super(`Stage ${stageId} failed: ${String(cause)}`, { cause });
    this.name = "StageFailedError";
    this.stageId = stageId;
  }
}

export class StageIncompleteError extends Error {
  stageId: string;

  constructor(stageId: string) {
    super(`Stage ${stageId} ran but did not produce its output`);
    this.name = "StageIncompleteError";
    this.stageId = stageId;
  }
}

export class DependencyCycleError extends Error {
  cycle: string[];

  constructor(cycle: string[]) {
    super(`Dependency cycle: ${cycle.join(" -> ")}`);
    this.name = "DependencyCycleError";
    this.cycle = cycle;
  }
}

/**
 * Stage contract: requirements, completeness and write-then-promote runs.
 */
import { mkdir } from "node:fs/promises";

import type { ArtifactStorage } from "../storage/backend.js";
import { artifactKey, fingerprint, scratchPath } from "./paths.js";
import type { Logger, StageParameters } from "./types.js";

/**
 * Anything the scheduler can order and run. `id` must be unique per kind
 * and parameter set, since the scheduler deduplicates on it.
 */
export interface Task {
  readonly id: string;
  requires(): Task[];
  isComplete(): Promise<boolean>;
  run(): Promise<void>;
}

export interface StageContext {
  storage: ArtifactStorage;
  /** Directory for scratch output. */
  tmpDir: string;
  /** Source id; the first path segment of every artifact. */
  tag: string;
  logger: Logger;
}

/**
 * A stage with a single file output at
 * `{tag}/{kind-slug}/{fingerprint}.{ext}` inside the storage root.
 *
 * Sub-classes set `kind` (CamelCase, e.g. `GndDump`) and `ext`, and
 * implement `produce`, which must write its whole result to the scratch
 * path it is given. The scratch file is promoted only once `produce`
 * resolves; if it throws, nothing appears at the canonical path.
 */
export abstract class ArtifactStage implements Task {
  abstract readonly kind: string;
  abstract readonly ext: string;

  protected readonly ctx: StageContext;
  readonly parameters: StageParameters;

  constructor(ctx: StageContext, parameters: StageParameters) {
    this.ctx = ctx;
    this.parameters = parameters;
  }

  get id(): string {
    return `${this.kind}(${fingerprint(this.parameters)})`;
  }

  /** Storage key of the canonical artifact. */
  get key(): string {
    return artifactKey({
      tag: this.ctx.tag,
      kind: this.kind,
      parameters: this.parameters,
      ext: this.ext,
    });
  }

  /** Absolute canonical path of the artifact. */
  output(): string {
    return this.ctx.storage.path(this.key);
  }

  requires(): Task[] {
    return [];
  }

  isComplete(): Promise<boolean> {
    return this.ctx.storage.exists(this.key);
  }

  async run(): Promise<void> {
    await mkdir(this.ctx.tmpDir, { recursive: true });
    const scratch = scratchPath(this.ctx.tmpDir);
    await this.produce(scratch);
    await this.ctx.storage.promote(scratch, this.key);
  }

  protected abstract produce(scratch: string): Promise<void>;
}

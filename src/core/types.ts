/**
 * Pipeline types shared by stages, storage and the scheduler.
 */

/** One named stage parameter, e.g. `{ name: "date", value: "2024-05-01" }`. */
export interface StageParameter {
  name: string;
  value: string;
}

/** Ordered, explicitly declared parameters of a stage instance. */
export type StageParameters = readonly StageParameter[];

/** A single authority entry extracted from the raw dump. */
export interface AuthorityRecord {
  id: string;
  content: string;
}

/** Counters reported by the record extractor once the stream is exhausted. */
export interface ExtractionSummary {
  /** Non-blank blocks seen. */
  blocks: number;
  /** Blocks that carried an identifier and were stored. */
  records: number;
  /** Blocks dropped because the first line had no identifier. */
  skipped: number;
}

/** Result returned from a scheduler run. */
export interface BuildResult {
  /** Ids of tasks that ran in this invocation, in execution order. */
  completed: string[];
  /** Ids of tasks found complete and not run. */
  skipped: string[];
}

/** Sink for progress and status lines. `console` satisfies it. */
export interface Logger {
  log(message: string): void;
  error(message: string): void;
}

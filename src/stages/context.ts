/**
 * Shared wiring for the GND stages.
 */
import type { CommandRunner, ExecutableProbe } from "../core/process.js";
import type { StageContext } from "../core/stage.js";
import type { StageParameters } from "../core/types.js";

export interface GndContext extends StageContext {
  runner: CommandRunner;
  probe: ExecutableProbe;
  /** Fully assembled dump URL, query included. */
  sourceUrl: string;
  tools: { download: string; decompress: string };
  progressInterval: number;
}

/** Local calendar date as `YYYY-MM-DD`. */
export function today(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/** Parameters shared by every stage of one dump: the run date. */
export function dateParameters(date: string = today()): StageParameters {
  return [{ name: "date", value: date }];
}

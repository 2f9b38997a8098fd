/**
 * Segmentation of the raw dump into blank-line separated blocks and
 * extraction of `(id, content)` records from them.
 */
import type { AuthorityRecord, ExtractionSummary, Logger } from "../core/types.js";

/** Identifier in the `rdf:about` URI of a description's opening line. */
export const GND_ID_PATTERN = /http:\/\/d-nb\.info\/gnd\/([0-9A-Z-]+)">/;

export const DEFAULT_PROGRESS_INTERVAL = 10_000;

/** A maximal run of lines that are all blank or all non-blank. */
export interface Block {
  blank: boolean;
  lines: string[];
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Split a line stream into maximal runs, switching whenever a line's
 * blank/non-blank status differs from the previous one. Only the current
 * run is held in memory.
 */
export async function* segment(
  lines: AsyncIterable<string> | Iterable<string>,
): AsyncGenerator<Block> {
  let current: Block | null = null;
  for await (const line of lines) {
    const blank = isBlank(line);
    if (current && current.blank === blank) {
      current.lines.push(line);
      continue;
    }
    if (current) yield current;
    current = { blank, lines: [line] };
  }
  if (current) yield current;
}

/**
 * Turn one non-blank block into a record, or `null` when its first line
 * carries no identifier.
 */
export function parseBlock(lines: readonly string[]): AuthorityRecord | null {
  const stripped = lines.map((l) => l.trim());
  if (stripped.length === 0) return null;
  const match = GND_ID_PATTERN.exec(stripped[0]);
  if (!match) return null;
  return { id: match[1], content: stripped.join("\n") };
}

export class RecordExtractor {
  readonly summary: ExtractionSummary = { blocks: 0, records: 0, skipped: 0 };
  private progressInterval: number;
  private logger: Logger;

  constructor(
    opts: { progressInterval?: number; logger?: Logger } = {},
  ) {
    this.progressInterval = opts.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
    this.logger = opts.logger ?? console;
  }

  /** Single forward pass; records come out in stream order. */
  async *extract(
    lines: AsyncIterable<string> | Iterable<string>,
  ): AsyncGenerator<AuthorityRecord> {
    let index = 0;
    for await (const block of segment(lines)) {
      if (index % this.progressInterval === 0) {
        this.logger.log(`Processed ${index} blocks.`);
      }
      index++;
      if (block.blank) continue;

      this.summary.blocks++;
      const record = parseBlock(block.lines);
      if (!record) {
        this.summary.skipped++;
        continue;
      }
      this.summary.records++;
      yield record;
    }
  }
}

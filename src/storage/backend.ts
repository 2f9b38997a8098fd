/**
 * Abstract artifact storage interface.
 */

export interface ArtifactStorage {
  /** Absolute path of the given artifact key. */
  path(key: string): string;

  /** Check if the artifact exists. */
  exists(key: string): Promise<boolean>;

  /**
   * Move a finished scratch file to the artifact key. The artifact appears
   * all at once or not at all; an existing artifact is never replaced.
   */
  promote(scratchPath: string, key: string): Promise<void>;

  /** Iterate the artifact line by line, without line terminators. */
  lines(key: string): AsyncIterable<string>;
}

/**
 * Dependency-ordered task runner.
 *
 * Resolves the requirement graph of the given targets depth-first into a
 * topological order, then walks it once: complete tasks are skipped, the
 * rest run one at a time. The first failure halts the build.
 */
import type { Task } from "./stage.js";
import type { BuildResult, Logger } from "./types.js";
import {
  DependencyCycleError,
  StageFailedError,
  StageIncompleteError,
} from "./exceptions.js";

export class Scheduler {
  private logger: Logger;

  constructor(logger: Logger = console) {
    this.logger = logger;
  }

  /** Topological order of `targets` and everything they require, each id once. */
  plan(targets: Task[]): Task[] {
    const order: Task[] = [];
    const done = new Set<string>();
    const path: string[] = [];

    const visit = (task: Task): void => {
      if (done.has(task.id)) return;
      const onPath = path.indexOf(task.id);
      if (onPath !== -1) {
        throw new DependencyCycleError([...path.slice(onPath), task.id]);
      }
      path.push(task.id);
      for (const dep of task.requires()) visit(dep);
      path.pop();
      done.add(task.id);
      order.push(task);
    };

    for (const target of targets) visit(target);
    return order;
  }

  async build(targets: Task[]): Promise<BuildResult> {
    const result: BuildResult = { completed: [], skipped: [] };

    for (const task of this.plan(targets)) {
      if (await task.isComplete()) {
        result.skipped.push(task.id);
        continue;
      }

      this.logger.log(`Running ${task.id}`);
      try {
        await task.run();
      } catch (err) {
        this.logger.error(`${task.id} failed: ${String(err)}`);
        throw new StageFailedError(task.id, err);
      }

      if (!(await task.isComplete())) {
        throw new StageIncompleteError(task.id);
      }
      result.completed.push(task.id);
    }

    return result;
  }
}

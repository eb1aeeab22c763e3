import type { BuildConfig } from "../config.js";
import { EmptyRemoteCommandError } from "../errors.js";
import { createScopedLogger, log } from "../utils/logger.js";
import { archTag } from "../utils/mapping.js";
import {
  type BuildTask,
  type BuildTaskFn,
  runBuildTask,
} from "./build-task.service.js";
import type { RemoteCommandRunner } from "./runner.service.js";

export interface RunResult {
  readonly tasks: readonly BuildTask[];
  readonly failed: readonly BuildTask[];
  readonly succeeded: boolean;
}

/**
 * Fans out one build task per mapped architecture and joins them all before
 * anyone reads a status.
 */
export class BuildCoordinator {
  private readonly registry = new Map<string, BuildTask>();

  constructor(
    private readonly runner: RemoteCommandRunner,
    private readonly config: BuildConfig,
    private readonly runTask: BuildTaskFn = runBuildTask,
  ) {}

  get tasks(): BuildTask[] {
    return [...this.registry.values()];
  }

  async run(): Promise<RunResult> {
    const tasks = this.config.archHosts.map(
      ({ architecture, target }): BuildTask => ({
        architecture,
        target,
        archTag: archTag(this.config.image.baseTag, architecture),
        status: "pending",
      }),
    );
    for (const task of tasks) {
      this.registry.set(task.archTag, task);
    }

    // All tasks are started before the first await
    const handles = tasks.map((task) => this.dispatch(task));

    log.phase("Waiting for all architecture builds on remote hosts");
    const settled = await Promise.allSettled(handles);

    // Only a dispatch error rejects a handle; it surfaces after the full join
    const dispatchError = settled.find(
      (outcome): outcome is PromiseRejectedResult =>
        outcome.status === "rejected",
    );
    if (dispatchError) {
      throw dispatchError.reason;
    }

    const failed = tasks.filter((task) => task.status !== "succeeded");
    return { tasks, failed, succeeded: failed.length === 0 };
  }

  /** Forget the tasks of the finished run */
  clear() {
    this.registry.clear();
  }

  private async dispatch(task: BuildTask): Promise<void> {
    const logger = createScopedLogger(task.architecture);
    logger.info(
      `Starting build of ${this.config.image.name}:${task.archTag} on ${task.target.connection}`,
    );
    task.status = "running";

    try {
      const result = await this.runTask(task, this.runner, this.config);
      task.status = result.status;
      task.exitCode = result.exitCode;
      task.failedStep = result.failedStep;
    } catch (error) {
      if (error instanceof EmptyRemoteCommandError) {
        throw error;
      }
      logger.error(
        `Build task crashed: ${error instanceof Error ? error.message : String(error)}`,
      );
      task.status = "failed";
    }
  }
}

import { type BuildConfig, imageDirectory } from "../config.js";
import type { ExecutionTarget } from "../types.js";
import { createScopedLogger } from "../utils/logger.js";
import {
  bootstrapBuilderCommand,
  buildCommand,
  cloneCommand,
  createDirectoryCommand,
  ensureBuilderCommand,
  type RemoteCommand,
  registryLoginCommand,
  removeBuilderCommand,
  resetWorkspaceCommand,
} from "../utils/remote-commands.js";
import type { RemoteCommandRunner } from "./runner.service.js";

export type BuildStatus = "pending" | "running" | "succeeded" | "failed";

export type BuildStepName =
  | "workspace"
  | "sources"
  | "login"
  | "builder"
  | "build";

export interface BuildTask {
  readonly architecture: string;
  readonly target: ExecutionTarget;
  readonly archTag: string;
  status: BuildStatus;
  exitCode?: number;
  failedStep?: BuildStepName;
}

export interface BuildStep {
  name: BuildStepName;
  command: RemoteCommand;
}

export interface BuildTaskResult {
  status: Extract<BuildStatus, "succeeded" | "failed">;
  exitCode: number;
  failedStep?: BuildStepName;
}

export type BuildTaskFn = (
  task: BuildTask,
  runner: RemoteCommandRunner,
  config: BuildConfig,
) => Promise<BuildTaskResult>;

/**
 * Every command one architecture runs, in order. The last step is the image
 * build itself; everything before it prepares the host.
 */
export function planBuildSteps(
  task: Pick<BuildTask, "architecture" | "archTag">,
  config: BuildConfig,
): BuildStep[] {
  const contextDir = imageDirectory(config.workingDir, config.image.name);

  const builderSteps: BuildStep[] = config.useCache
    ? [
        { name: "builder", command: ensureBuilderCommand() },
        { name: "builder", command: bootstrapBuilderCommand() },
      ]
    : [{ name: "builder", command: removeBuilderCommand() }];

  return [
    { name: "workspace", command: resetWorkspaceCommand(config.workingDir) },
    { name: "workspace", command: createDirectoryCommand(contextDir) },
    { name: "sources", command: cloneCommand(config.source, contextDir) },
    { name: "login", command: registryLoginCommand(config.credentials) },
    ...builderSteps,
    {
      name: "build",
      command: buildCommand({
        image: config.image,
        architecture: task.architecture,
        archTag: task.archTag,
        buildArgs: config.buildArgs,
        contextDir,
        useCache: config.useCache,
      }),
    },
  ];
}

/**
 * Bring one architecture's image into existence on its own host. The first
 * step with a non-zero exit code ends the task as failed.
 */
export const runBuildTask: BuildTaskFn = async (task, runner, config) => {
  const logger = createScopedLogger(task.architecture);

  for (const step of planBuildSteps(task, config)) {
    const exitCode = await runner.runOn(
      task.target,
      step.command,
      task.architecture,
    );
    if (exitCode !== 0) {
      logger.error(`Step "${step.name}" failed with exit code ${exitCode}`);
      return { status: "failed", exitCode, failedStep: step.name };
    }
  }

  logger.info(`Pushed ${config.image.name}:${task.archTag}`);
  return { status: "succeeded", exitCode: 0 };
};

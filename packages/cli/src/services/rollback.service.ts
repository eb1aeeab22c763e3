import type { ImageIdentity } from "../types.js";
import { log } from "../utils/logger.js";
import { removeRunImagesCommand } from "../utils/remote-commands.js";
import type { BuildTask } from "./build-task.service.js";
import type { RemoteCommandRunner } from "./runner.service.js";

export function describeFailure(task: BuildTask): string {
  const step = task.failedStep ? ` at step "${task.failedStep}"` : "";
  const code = task.exitCode !== undefined ? ` (exit code ${task.exitCode})` : "";
  return `${task.architecture} on '${task.target.connection}'${step}${code}`;
}

/**
 * Remove every image of this run from every build host, including hosts
 * whose own build succeeded. No manifest is created afterwards.
 */
export async function rollbackRun(
  runner: RemoteCommandRunner,
  image: ImageIdentity,
  failed: readonly BuildTask[],
): Promise<void> {
  for (const task of failed) {
    log.error(
      `Fatal error. Build ${describeFailure(task)} finished with a non-zero exit code. See the output above.`,
    );
  }
  log.error("Created images will be removed.");

  const results = await runner.runOnAll(removeRunImagesCommand(image));
  for (const { target, exitCode } of results) {
    if (exitCode !== 0) {
      log.warn(
        `Unable to remove images of ${image.name}:${image.baseTag} on '${target.connection}' (exit code ${exitCode})`,
      );
    }
  }
}

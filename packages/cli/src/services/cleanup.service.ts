import type { CleanupConfig } from "../config.js";
import { log } from "../utils/logger.js";
import {
  builderPruneCommand,
  removeRunImagesCommand,
  removeWorkspaceCommand,
} from "../utils/remote-commands.js";
import type { RemoteCommandRunner } from "./runner.service.js";

/**
 * Reclaim build cache, run images and the workspace on every host. Failures
 * are reported as warnings and the count is returned; nothing is thrown.
 */
export async function cleanupRun(
  runner: RemoteCommandRunner,
  config: CleanupConfig,
): Promise<number> {
  log.phase("Cleaning up temporary data on all hosts");

  const commands = [
    builderPruneCommand(),
    removeRunImagesCommand(config.image),
    removeWorkspaceCommand(config.workingDir),
  ];

  let failures = 0;
  for (const command of commands) {
    try {
      const results = await runner.runOnAll(command);
      for (const { target, exitCode } of results) {
        if (exitCode !== 0) {
          failures += 1;
          log.warn(
            `Cleanup step failed on '${target.connection}' (exit code ${exitCode}): ${command.display}`,
          );
        }
      }
    } catch (error) {
      failures += 1;
      log.warn(
        `Cleanup step could not run: ${command.display}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  if (failures > 0) {
    log.warn(`Cleanup finished with ${failures} failed step(s)`);
  }
  return failures;
}

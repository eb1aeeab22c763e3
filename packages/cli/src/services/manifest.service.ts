import type { BuildConfig } from "../config.js";
import { ManifestPublishError } from "../errors.js";
import { log } from "../utils/logger.js";
import {
  imageRef,
  manifestCreateCommand,
  manifestPushCommand,
  registryLoginCommand,
} from "../utils/remote-commands.js";
import type { RemoteCommandRunner } from "./runner.service.js";

/**
 * Create the combined manifest on the manifest host and push it, replacing
 * any previous manifest under the same reference. Returns the reference.
 */
export async function publishManifest(
  runner: RemoteCommandRunner,
  config: BuildConfig,
  archTags: readonly string[],
): Promise<string> {
  const reference = imageRef(config.image);
  log.phase(`Creating combined manifest: ${reference}`);

  const steps = [
    { name: "login", command: registryLoginCommand(config.credentials) },
    {
      name: "create",
      command: manifestCreateCommand(config.image, archTags),
    },
    { name: "push", command: manifestPushCommand(config.image) },
  ];

  for (const step of steps) {
    const exitCode = await runner.runOnManifestHost(step.command);
    if (exitCode !== 0) {
      throw new ManifestPublishError(step.name, exitCode);
    }
  }

  log.success(`Published ${reference} with ${archTags.length} architectures`);
  return reference;
}

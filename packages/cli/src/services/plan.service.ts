import type { BuildConfig } from "../config.js";
import { archTag } from "../utils/mapping.js";
import {
  builderPruneCommand,
  imageRef,
  manifestCreateCommand,
  manifestPushCommand,
  registryLoginCommand,
  removeRunImagesCommand,
  removeWorkspaceCommand,
} from "../utils/remote-commands.js";
import { planBuildSteps } from "./build-task.service.js";

export interface PlannedBuild {
  architecture: string;
  host: string;
  tag: string;
  commands: string[];
}

export interface RunPlan {
  reference: string;
  manifestHost: string;
  builds: PlannedBuild[];
  manifest: string[];
  prune: string[];
  cleanup: string[];
}

/**
 * Everything a build run would execute, with secrets masked. Nothing is
 * dispatched.
 */
export function planRun(config: BuildConfig): RunPlan {
  const builds = config.archHosts.map(({ architecture, target }) => {
    const tag = archTag(config.image.baseTag, architecture);
    return {
      architecture,
      host: target.connection,
      tag,
      commands: planBuildSteps({ architecture, archTag: tag }, config).map(
        (step) => step.command.display,
      ),
    };
  });
  const tags = builds.map((build) => build.tag);

  const prune = config.pruneArchTags
    ? [
        `POST ${config.registryApiUrl}/v2/users/login/`,
        ...tags.map(
          (tag) =>
            `DELETE ${config.registryApiUrl}/v2/repositories/${config.image.name}/tags/${tag}/`,
        ),
      ]
    : [];

  return {
    reference: imageRef(config.image),
    manifestHost: config.manifestHost.connection,
    builds,
    manifest: [
      registryLoginCommand(config.credentials).display,
      manifestCreateCommand(config.image, tags).display,
      manifestPushCommand(config.image).display,
    ],
    prune,
    cleanup: [
      builderPruneCommand().display,
      removeRunImagesCommand(config.image).display,
      removeWorkspaceCommand(config.workingDir).display,
    ],
  };
}

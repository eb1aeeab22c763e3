import { Command, Option } from "clipanion";
import { type ConfigInput, resolveConfigInput } from "../config.js";
import { ConfigError } from "../errors.js";
import { ArchfleetConfigError } from "../utils/archfleet.js";
import { log } from "../utils/logger.js";

/**
 * Flags every command understands. Values given here win over the
 * environment and over archfleet.jsonc.
 */
export abstract class ConfiguredCommand extends Command {
  configPath = Option.String("-c,--config", {
    description: "Path to an archfleet.jsonc file.",
  });

  imageName = Option.String("-i,--image", {
    description: "Image name, e.g. acme/nginx-php.",
  });

  imageTag = Option.String("-t,--tag", {
    description: "Tag of the combined manifest.",
  });

  manifestHost = Option.String("--manifest-host", {
    description: "Connection command of the host that creates the manifest.",
  });

  archHosts = Option.String("--arch-hosts", {
    description:
      'Architecture to host mapping, e.g. "linux/amd64::ssh a@host1; linux/arm64/v8::ssh b@host2".',
  });

  workingDir = Option.String("-w,--working-dir", {
    description: "Working directory on the build hosts.",
  });

  protected flagInput(): ConfigInput {
    return {
      imageName: this.imageName,
      imageTag: this.imageTag,
      manifestHost: this.manifestHost,
      archHosts: this.archHosts,
      workingDir: this.workingDir,
    };
  }

  protected async configInput(): Promise<ConfigInput> {
    return resolveConfigInput(this.flagInput(), {
      configPath: this.configPath,
    });
  }

  /** Print configuration problems and return the exit code */
  protected reportConfigError(error: unknown): number {
    if (error instanceof ConfigError) {
      log.error(`${error.message}:`);
      for (const issue of error.issues) {
        log.error(`- ${issue}`);
      }
      return 1;
    }
    if (error instanceof ArchfleetConfigError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }
}

/** Flags of commands that need the complete build configuration */
export abstract class BuildOptionsCommand extends ConfiguredCommand {
  buildArgs = Option.String("--build-args", {
    description: 'Passed to the build tool as is, e.g. "--build-arg A=1".',
  });

  repoUrl = Option.String("--repo", {
    description: "Repository with the Dockerfile.",
  });

  repoBranch = Option.String("--branch", {
    description: "Branch to clone (default: master).",
  });

  useCache = Option.Boolean("--cache", {
    description: "Use the registry build cache (default). --no-cache turns it off.",
  });

  keepArchTags = Option.Boolean("--keep-arch-tags", {
    description: "Do not delete the per-architecture tags after publishing.",
  });

  registryApiUrl = Option.String("--registry-api-url", {
    description: "Registry API base URL (default: https://hub.docker.com).",
  });

  protected flagInput(): ConfigInput {
    return {
      ...super.flagInput(),
      buildArgs: this.buildArgs,
      repoUrl: this.repoUrl,
      repoBranch: this.repoBranch,
      useCache: this.useCache,
      pruneArchTags:
        this.keepArchTags === undefined ? undefined : !this.keepArchTags,
      registryApiUrl: this.registryApiUrl,
    };
  }
}

import type { BuildConfig } from "../config.js";
import {
  ConfigError,
  EmptyRemoteCommandError,
  ManifestPublishError,
  TagPruneError,
} from "../errors.js";
import type { RegistryClient } from "../libs/registry-client.js";
import { log } from "../utils/logger.js";
import { imageRef } from "../utils/remote-commands.js";
import type { BuildTask, BuildTaskFn } from "./build-task.service.js";
import { cleanupRun } from "./cleanup.service.js";
import { BuildCoordinator } from "./coordinator.service.js";
import { publishManifest } from "./manifest.service.js";
import { pruneArchTags } from "./prune.service.js";
import { rollbackRun } from "./rollback.service.js";
import type { RemoteCommandRunner } from "./runner.service.js";

export type RunOutcome =
  | "succeeded"
  | "build_failed"
  | "publish_failed"
  | "prune_failed";

export interface RunReport {
  outcome: RunOutcome;
  exitCode: 0 | 1;
  tasks: BuildTask[];
  manifest?: string;
  prunedTags: string[];
  cleanupFailures: number;
}

export interface PipelineDeps {
  runner: RemoteCommandRunner;
  registry: RegistryClient;
  runTask?: BuildTaskFn;
}

interface PhaseResult {
  outcome: RunOutcome;
  manifest?: string;
  prunedTags: string[];
}

async function runPhases(
  coordinator: BuildCoordinator,
  config: BuildConfig,
  deps: PipelineDeps,
): Promise<PhaseResult> {
  const result = await coordinator.run();

  if (!result.succeeded) {
    await rollbackRun(deps.runner, config.image, result.failed);
    return { outcome: "build_failed", prunedTags: [] };
  }
  log.phase("Building of all architectures DONE");

  const archTags = result.tasks.map((task) => task.archTag);

  let manifest: string;
  try {
    manifest = await publishManifest(deps.runner, config, archTags);
  } catch (error) {
    if (error instanceof ManifestPublishError) {
      log.error(
        `${error.message}. Per-architecture tags are left in the registry.`,
      );
      return { outcome: "publish_failed", prunedTags: [] };
    }
    throw error;
  }

  if (!config.pruneArchTags) {
    log.info("Keeping per-architecture tags");
    return { outcome: "succeeded", manifest, prunedTags: [] };
  }

  try {
    const prunedTags = await pruneArchTags(
      deps.registry,
      config.credentials,
      config.image,
      archTags,
    );
    return { outcome: "succeeded", manifest, prunedTags };
  } catch (error) {
    if (error instanceof TagPruneError) {
      const remaining = error.remaining
        .map((tag) => `${config.image.name}:${tag}`)
        .join(", ");
      log.error(
        `${error.message}. The manifest ${manifest} is published; delete ${remaining} by hand.`,
      );
      return { outcome: "prune_failed", manifest, prunedTags: [...error.deleted] };
    }
    if (error instanceof ConfigError) {
      log.error(`${error.message}. The manifest ${manifest} is published.`);
      return { outcome: "prune_failed", manifest, prunedTags: [] };
    }
    throw error;
  }
}

/**
 * Build, publish and prune one multi-architecture image, then clean up every
 * host. Cleanup runs on every branch except a dispatch error, which aborts
 * before anything else happens.
 */
export async function runMultiarchBuild(
  config: BuildConfig,
  deps: PipelineDeps,
): Promise<RunReport> {
  log.banner(`Building the image ${imageRef(config.image)}`);

  const coordinator = new BuildCoordinator(deps.runner, config, deps.runTask);

  let phases: PhaseResult;
  try {
    phases = await runPhases(coordinator, config, deps);
  } catch (error) {
    if (!(error instanceof EmptyRemoteCommandError)) {
      await cleanupRun(deps.runner, config);
      coordinator.clear();
    }
    throw error;
  }

  const tasks = coordinator.tasks;
  const cleanupFailures = await cleanupRun(deps.runner, config);
  coordinator.clear();

  const exitCode = phases.outcome === "succeeded" ? 0 : 1;
  if (exitCode === 0) {
    log.banner("All builds have been successfully finished");
  }

  return { ...phases, exitCode, tasks, cleanupFailures };
}

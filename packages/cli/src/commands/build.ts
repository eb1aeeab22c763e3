import { Command } from "clipanion";
import { type BuildConfig, loadBuildConfig } from "../config.js";
import { EmptyRemoteCommandError } from "../errors.js";
import { RegistryClient } from "../libs/registry-client.js";
import { ConnectionCommandTransport } from "../libs/transport.js";
import { runMultiarchBuild } from "../services/pipeline.service.js";
import { RemoteCommandRunner } from "../services/runner.service.js";
import { log } from "../utils/logger.js";
import { BuildOptionsCommand } from "./base.js";

export class BuildCommand extends BuildOptionsCommand {
  static paths = [["build"], Command.Default];

  static usage = Command.Usage({
    description: "Build and publish a multi-architecture image",
    details:
      "Builds the image natively on every mapped host, publishes one combined manifest, deletes the per-architecture tags and cleans up every host.",
    examples: [
      [
        "Build from environment variables",
        "IMAGE_NAME=acme/app ARCH_HOSTS='linux/amd64::ssh a@h1; linux/arm64/v8::ssh b@h2' $0 build",
      ],
      ["Build a given tag without cache", "$0 build -t v1 --no-cache"],
    ],
  });

  async execute() {
    let config: BuildConfig;
    try {
      config = loadBuildConfig(await this.configInput());
    } catch (error) {
      return this.reportConfigError(error);
    }

    const runner = new RemoteCommandRunner(
      new ConnectionCommandTransport(),
      config,
    );
    const registry = new RegistryClient({ apiUrl: config.registryApiUrl });

    try {
      const report = await runMultiarchBuild(config, { runner, registry });
      return report.exitCode;
    } catch (error) {
      if (error instanceof EmptyRemoteCommandError) {
        log.error(error.message);
        return 1;
      }
      throw error;
    }
  }
}

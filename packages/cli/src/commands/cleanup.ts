import { Command } from "clipanion";
import { type CleanupConfig, loadCleanupConfig } from "../config.js";
import { ConnectionCommandTransport } from "../libs/transport.js";
import { cleanupRun } from "../services/cleanup.service.js";
import { RemoteCommandRunner } from "../services/runner.service.js";
import { ConfiguredCommand } from "./base.js";

export class CleanupCommand extends ConfiguredCommand {
  static paths = [["cleanup"]];

  static usage = Command.Usage({
    description: "Remove the leftovers of a previous run from every host",
    details:
      "Prunes the build cache and removes the run's images and working directory. The tag and working directory of that run must be given.",
    examples: [
      [
        "Clean up after an interrupted run",
        "$0 cleanup -t 20240101120000 -w /tmp/archfleet/build_2024-01-01_12:00:00",
      ],
    ],
  });

  async execute() {
    let config: CleanupConfig;
    try {
      config = loadCleanupConfig(await this.configInput());
    } catch (error) {
      return this.reportConfigError(error);
    }

    const runner = new RemoteCommandRunner(
      new ConnectionCommandTransport(),
      config,
    );
    const failures = await cleanupRun(runner, config);
    return failures === 0 ? 0 : 1;
  }
}

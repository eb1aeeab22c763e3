import { Command } from "clipanion";
import { type BuildConfig, loadBuildConfig } from "../config.js";
import { planRun } from "../services/plan.service.js";
import { printTable } from "../utils/console-ui.js";
import { log } from "../utils/logger.js";
import { BuildOptionsCommand } from "./base.js";

export class PlanCommand extends BuildOptionsCommand {
  static paths = [["plan"]];

  static usage = Command.Usage({
    description: "Show what a build would run, without running it",
    examples: [["Show the plan for tag v1", "$0 plan -t v1"]],
  });

  async execute() {
    let config: BuildConfig;
    try {
      config = loadBuildConfig(await this.configInput());
    } catch (error) {
      return this.reportConfigError(error);
    }

    const plan = planRun(config);

    log.banner(`Plan for ${plan.reference}`);
    printTable(
      plan.builds.map(({ architecture, host, tag }) => ({
        architecture,
        host,
        tag,
      })),
    );

    for (const build of plan.builds) {
      log.color("cyan", `\n[${build.architecture}] ${build.host}`);
      for (const command of build.commands) {
        log.info(`  ${command}`);
      }
    }

    log.color("cyan", `\n[manifest] ${plan.manifestHost}`);
    for (const command of plan.manifest) {
      log.info(`  ${command}`);
    }

    if (plan.prune.length > 0) {
      log.color("cyan", "\n[registry]");
      for (const request of plan.prune) {
        log.info(`  ${request}`);
      }
    }

    log.color("cyan", "\n[cleanup] every build host");
    for (const command of plan.cleanup) {
      log.info(`  ${command}`);
    }
    return 0;
  }
}

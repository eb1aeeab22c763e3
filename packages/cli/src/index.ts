#!/usr/bin/env node
import { Builtins, Cli } from "clipanion";
import { BuildCommand } from "./commands/build.js";
import { CleanupCommand } from "./commands/cleanup.js";
import { ExecCommand } from "./commands/exec.js";
import { HostsCommand } from "./commands/hosts.js";
import { PlanCommand } from "./commands/plan.js";

const cli = new Cli({
  binaryLabel: "archfleet",
  binaryName: "archfleet",
  binaryVersion: "0.1.0",
});

cli.register(Builtins.HelpCommand);
cli.register(Builtins.VersionCommand);
cli.register(BuildCommand);
cli.register(PlanCommand);
cli.register(HostsCommand);
cli.register(ExecCommand);
cli.register(CleanupCommand);

await cli.runExit(process.argv.slice(2));

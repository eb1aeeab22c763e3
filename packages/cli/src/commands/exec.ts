import { Command, Option } from "clipanion";
import { loadHostMapping } from "../config.js";
import { EmptyRemoteCommandError } from "../errors.js";
import { ConnectionCommandTransport } from "../libs/transport.js";
import {
  type HostExitCode,
  RemoteCommandRunner,
} from "../services/runner.service.js";
import type { HostMapping } from "../types.js";
import { log } from "../utils/logger.js";
import { remoteCommand } from "../utils/remote-commands.js";
import { ConfiguredCommand } from "./base.js";

export class ExecCommand extends ConfiguredCommand {
  static paths = [["exec"]];

  static usage = Command.Usage({
    description: "Run a command on the build hosts",
    details:
      "Runs on every build host, on the hosts of one architecture with --arch, or on the manifest host with --manifest.",
    examples: [
      ["Check docker on every host", "$0 exec -- docker version"],
      ["Inspect the arm64 builder", "$0 exec --arch linux/arm64/v8 -- docker buildx ls"],
    ],
  });

  arch = Option.String("-a,--arch", {
    description: "Only run on the hosts of this architecture.",
  });

  manifest = Option.Boolean("--manifest", false, {
    description: "Run on the manifest host instead.",
  });

  command = Option.Rest({ required: 1 });

  async execute() {
    let hosts: HostMapping;
    try {
      hosts = loadHostMapping(await this.configInput());
    } catch (error) {
      return this.reportConfigError(error);
    }

    const runner = new RemoteCommandRunner(
      new ConnectionCommandTransport(),
      hosts,
    );
    const command = remoteCommand(this.command.join(" "));

    let results: HostExitCode[];
    try {
      if (this.manifest) {
        const exitCode = await runner.runOnManifestHost(command);
        results = [{ target: hosts.manifestHost, exitCode }];
      } else if (this.arch) {
        results = await runner.runOnArch(this.arch, command);
      } else {
        results = await runner.runOnAll(command);
      }
    } catch (error) {
      if (error instanceof EmptyRemoteCommandError) {
        log.error(error.message);
        return 1;
      }
      throw error;
    }

    if (results.length === 0) {
      log.error(`No host is mapped to architecture ${this.arch}`);
      return 1;
    }
    return results.every((result) => result.exitCode === 0) ? 0 : 1;
  }
}

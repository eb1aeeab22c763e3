import { Command } from "clipanion";
import { loadHostMapping } from "../config.js";
import type { HostMapping } from "../types.js";
import { printTable } from "../utils/console-ui.js";
import { sanitizeArchitecture } from "../utils/mapping.js";
import { ConfiguredCommand } from "./base.js";

export class HostsCommand extends ConfiguredCommand {
  static paths = [["hosts"]];

  static usage = Command.Usage({
    description: "List the build hosts and the manifest host",
  });

  async execute() {
    let hosts: HostMapping;
    try {
      hosts = loadHostMapping(await this.configInput());
    } catch (error) {
      return this.reportConfigError(error);
    }

    printTable([
      ...hosts.archHosts.map(({ architecture, target }) => ({
        role: "build",
        architecture,
        suffix: sanitizeArchitecture(architecture),
        host: target.connection,
      })),
      {
        role: "manifest",
        architecture: null,
        suffix: null,
        host: hosts.manifestHost.connection,
      },
    ]);
    return 0;
  }
}

import { EmptyRemoteCommandError } from "../errors.js";
import type { Transport } from "../libs/transport.js";
import type { ExecutionTarget, HostMapping } from "../types.js";
import { createScopedLogger } from "../utils/logger.js";
import { distinctTargets } from "../utils/mapping.js";
import type { RemoteCommand } from "../utils/remote-commands.js";

export interface HostExitCode {
  target: ExecutionTarget;
  exitCode: number;
}

/**
 * Dispatch primitive over the host mapping. It neither retries nor
 * interprets output; every call resolves once the remote command exits.
 */
export class RemoteCommandRunner {
  constructor(
    private readonly transport: Transport,
    private readonly hosts: HostMapping,
  ) {}

  async runOn(
    target: ExecutionTarget,
    command: RemoteCommand,
    scope: string = target.connection,
  ): Promise<number> {
    if (command.script.trim() === "") {
      throw new EmptyRemoteCommandError(target.connection);
    }

    const logger = createScopedLogger(scope);
    logger.debug(`$ ${command.display}`);

    const exitCode = await this.transport.exec(
      target,
      command.script,
      (stream, line) => {
        if (stream === "stderr") {
          logger.warn(line);
        } else {
          logger.info(line);
        }
      },
    );

    if (exitCode !== 0) {
      logger.error(`Command exited with code ${exitCode}`);
    }
    return exitCode;
  }

  /**
   * Run on every distinct build host, one after the other. A failure on one
   * host does not stop the others.
   */
  async runOnAll(command: RemoteCommand): Promise<HostExitCode[]> {
    const results: HostExitCode[] = [];
    for (const target of distinctTargets(this.hosts.archHosts)) {
      results.push({ target, exitCode: await this.runOn(target, command) });
    }
    return results;
  }

  /** Run on every host mapped to `architecture` (normally exactly one) */
  async runOnArch(
    architecture: string,
    command: RemoteCommand,
  ): Promise<HostExitCode[]> {
    const results: HostExitCode[] = [];
    for (const mapping of this.hosts.archHosts) {
      if (mapping.architecture === architecture) {
        const exitCode = await this.runOn(
          mapping.target,
          command,
          architecture,
        );
        results.push({ target: mapping.target, exitCode });
      }
    }
    return results;
  }

  async runOnManifestHost(command: RemoteCommand): Promise<number> {
    return this.runOn(this.hosts.manifestHost, command, "manifest");
  }
}

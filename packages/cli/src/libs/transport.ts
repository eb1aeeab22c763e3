import readline from "node:readline";
import type { Readable } from "node:stream";
import { execa } from "execa";
import type { ExecutionTarget } from "../types.js";

export type OutputStream = "stdout" | "stderr";
export type LineHandler = (stream: OutputStream, line: string) => void;

// Exit status ssh reports when the connection itself fails
export const CONNECTION_FAILURE_EXIT_CODE = 255;

const LOCAL_SHELL = "sh";

/**
 * Delivers an already-resolved script to a host and reports its exit code.
 */
export interface Transport {
  exec(
    target: ExecutionTarget,
    script: string,
    onLine: LineHandler,
  ): Promise<number>;
}

function forwardLines(
  input: Readable | null,
  stream: OutputStream,
  onLine: LineHandler,
) {
  if (!input) {
    return;
  }
  const rl = readline.createInterface({ input });
  rl.on("line", (line) => onLine(stream, line));
}

/**
 * Runs the connection command of the target (for example
 * `ssh -o "ProxyJump=jump host" builder@10.0.0.2`) through a local shell, with
 * the script appended as one positional argument. The local shell parses the
 * connection command only; `$(...)` in the script is expanded on the remote
 * side.
 */
export class ConnectionCommandTransport implements Transport {
  async exec(
    target: ExecutionTarget,
    script: string,
    onLine: LineHandler,
  ): Promise<number> {
    const connection = target.connection.trim();
    if (connection === "") {
      throw new Error("Connection command cannot be empty");
    }

    const subprocess = execa(
      LOCAL_SHELL,
      ["-c", `${connection} "$1"`, LOCAL_SHELL, script],
      {
        stdin: "ignore",
        stdout: "pipe",
        stderr: "pipe",
        reject: false,
      },
    );

    forwardLines(subprocess.stdout, "stdout", onLine);
    forwardLines(subprocess.stderr, "stderr", onLine);

    const result = await subprocess;
    if (result.exitCode === undefined) {
      onLine(
        "stderr",
        `Connection command ended without an exit code${result.signal ? ` (${result.signal})` : ""}`,
      );
      return CONNECTION_FAILURE_EXIT_CODE;
    }
    return result.exitCode;
  }
}

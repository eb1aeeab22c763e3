import { vi } from "vitest";
import { type BuildConfig, type ConfigInput, loadBuildConfig } from "./config.js";
import type { LineHandler, Transport } from "./libs/transport.js";
import type { ExecutionTarget } from "./types.js";

export interface ExecCall {
  host: string;
  script: string;
}

type Responder = (call: ExecCall, onLine: LineHandler) => number | Promise<number>;

/** In-process stand-in for the remote hosts; records every dispatched script */
export class FakeTransport implements Transport {
  readonly calls: ExecCall[] = [];

  constructor(private readonly respond: Responder = () => 0) {}

  async exec(
    target: ExecutionTarget,
    script: string,
    onLine: LineHandler,
  ): Promise<number> {
    const call = { host: target.connection, script };
    this.calls.push(call);
    return this.respond(call, onLine);
  }

  scriptsOn(host: string): string[] {
    return this.calls
      .filter((call) => call.host === host)
      .map((call) => call.script);
  }

  count(host: string, script: string): number {
    return this.scriptsOn(host).filter((candidate) => candidate === script)
      .length;
  }
}

export const HOST_A = "ssh -A builder@host-a";
export const HOST_B = "ssh -A builder@host-b";
export const MANIFEST_HOST = "ssh -A builder@host-m";

export const baseInput: ConfigInput = {
  imageName: "acme/app",
  imageTag: "v1",
  repoUrl: "git@example.com:acme/app.git",
  registryLogin: "ci-bot",
  registryPassword: "test-secret",
  manifestHost: MANIFEST_HOST,
  archHosts: `linux/amd64::${HOST_A}; linux/arm64/v8::${HOST_B}`,
  workingDir: "/tmp/archfleet/test",
};

export function testConfig(overrides: ConfigInput = {}): BuildConfig {
  return loadBuildConfig(
    { ...baseInput, ...overrides },
    new Date(2024, 0, 2, 3, 4, 5),
  );
}

type FetchRoute = (method: string, url: string) => Response;

export function fakeFetch(route: FetchRoute) {
  return vi.fn<typeof fetch>(async (input, init) =>
    route(init?.method ?? "GET", String(input)),
  );
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

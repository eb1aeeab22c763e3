import { describe, expect, it } from "vitest";
import { EmptyRemoteCommandError } from "../errors.js";
import { RegistryClient } from "../libs/registry-client.js";
import {
  FakeTransport,
  fakeFetch,
  HOST_A,
  HOST_B,
  jsonResponse,
  MANIFEST_HOST,
  testConfig,
} from "../test-utils.js";
import { runMultiarchBuild } from "./pipeline.service.js";
import { RemoteCommandRunner } from "./runner.service.js";

const BUILDER_PRUNE = "docker builder prune --force";
const REMOVE_WORKSPACE = "rm -rf '/tmp/archfleet/test'";

function removeImages(reference: string) {
  return `if [[ ! -z $(docker image ls '${reference}*' --quiet) ]]; then docker rmi --force $(docker image ls '${reference}*' --quiet); fi`;
}

function registryFetch(deleteStatus = 204) {
  return fakeFetch((method) =>
    method === "POST"
      ? jsonResponse({ token: "test-jwt" })
      : new Response(null, { status: deleteStatus }),
  );
}

function setup(
  respond?: ConstructorParameters<typeof FakeTransport>[0],
  deleteStatus?: number,
  overrides: Parameters<typeof testConfig>[0] = {},
) {
  const config = testConfig(overrides);
  const transport = new FakeTransport(respond);
  const fetchMock = registryFetch(deleteStatus);
  const deps = {
    runner: new RemoteCommandRunner(transport, config),
    registry: new RegistryClient({
      apiUrl: config.registryApiUrl,
      fetch: fetchMock,
    }),
  };
  return { config, transport, fetchMock, deps };
}

function expectCleanedOnce(transport: FakeTransport, reference: string) {
  for (const host of [HOST_A, HOST_B]) {
    expect(transport.count(host, BUILDER_PRUNE)).toBe(1);
    expect(transport.count(host, REMOVE_WORKSPACE)).toBe(1);
  }
  expect(transport.scriptsOn(HOST_A).at(-1)).toBe(REMOVE_WORKSPACE);
  expect(transport.scriptsOn(HOST_B).at(-2)).toBe(removeImages(reference));
}

describe("runMultiarchBuild", () => {
  it("builds, publishes, prunes and cleans up", async () => {
    const { transport, fetchMock, deps, config } = setup(undefined, 204, {
      imageName: "name",
    });

    const report = await runMultiarchBuild(config, deps);

    expect(report).toMatchObject({
      outcome: "succeeded",
      exitCode: 0,
      manifest: "name:v1",
      prunedTags: ["v1-amd64", "v1-arm64v8"],
      cleanupFailures: 0,
    });
    expect(transport.scriptsOn(MANIFEST_HOST)).toEqual([
      "echo 'test-secret' | docker login --username 'ci-bot' --password-stdin",
      "docker manifest create 'name:v1' --amend 'name:v1-amd64' --amend 'name:v1-arm64v8'",
      "docker manifest push --purge 'name:v1'",
    ]);
    expect(
      fetchMock.mock.calls.map(([url, init]) => `${init?.method} ${String(url)}`),
    ).toEqual([
      "POST https://hub.docker.com/v2/users/login/",
      "DELETE https://hub.docker.com/v2/repositories/name/tags/v1-amd64/",
      "DELETE https://hub.docker.com/v2/repositories/name/tags/v1-arm64v8/",
    ]);
    for (const host of [HOST_A, HOST_B]) {
      expect(transport.count(host, removeImages("name:v1"))).toBe(1);
    }
    expectCleanedOnce(transport, "name:v1");
  });

  it("dispatches exactly one build per architecture", async () => {
    const { transport, deps, config } = setup();

    await runMultiarchBuild(config, deps);

    const builds = transport.calls.filter((call) =>
      call.script.startsWith("docker buildx build"),
    );
    expect(builds.map((call) => call.host)).toEqual(
      expect.arrayContaining([HOST_A, HOST_B]),
    );
    expect(builds).toHaveLength(2);
  });

  it("rolls back on every host and never publishes when a build fails", async () => {
    const { transport, fetchMock, deps, config } = setup((call) =>
      call.host === HOST_A && call.script.startsWith("docker buildx build")
        ? 1
        : 0,
    );

    const report = await runMultiarchBuild(config, deps);

    expect(report.outcome).toBe("build_failed");
    expect(report.exitCode).toBe(1);
    expect(report.tasks.map((task) => task.status)).toEqual([
      "failed",
      "succeeded",
    ]);
    expect(transport.scriptsOn(MANIFEST_HOST)).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
    // Rollback and cleanup each remove the run images once, on both hosts
    for (const host of [HOST_A, HOST_B]) {
      expect(transport.count(host, removeImages("acme/app:v1"))).toBe(2);
    }
    expectCleanedOnce(transport, "acme/app:v1");
  });

  it("keeps the arch tags when the manifest cannot be pushed", async () => {
    const { transport, fetchMock, deps, config } = setup((call) =>
      call.script.startsWith("docker manifest push") ? 1 : 0,
    );

    const report = await runMultiarchBuild(config, deps);

    expect(report.outcome).toBe("publish_failed");
    expect(report.exitCode).toBe(1);
    expect(fetchMock).not.toHaveBeenCalled();
    // No rollback after the builds succeeded: only cleanup removes local images
    for (const host of [HOST_A, HOST_B]) {
      expect(transport.count(host, removeImages("acme/app:v1"))).toBe(1);
    }
    expectCleanedOnce(transport, "acme/app:v1");
  });

  it("stops pruning at the first failed delete", async () => {
    const { transport, fetchMock, deps, config } = setup(undefined, 500);

    const report = await runMultiarchBuild(config, deps);

    expect(report).toMatchObject({
      outcome: "prune_failed",
      exitCode: 1,
      manifest: "acme/app:v1",
      prunedTags: [],
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(transport.scriptsOn(MANIFEST_HOST)).toHaveLength(3);
    expectCleanedOnce(transport, "acme/app:v1");
  });

  it("reports the tags deleted before a prune failure", async () => {
    const config = testConfig();
    const transport = new FakeTransport();
    const fetchMock = fakeFetch((method, url) => {
      if (method === "POST") {
        return jsonResponse({ token: "test-jwt" });
      }
      return new Response(null, {
        status: url.endsWith("/v1-arm64v8/") ? 500 : 204,
      });
    });

    const report = await runMultiarchBuild(config, {
      runner: new RemoteCommandRunner(transport, config),
      registry: new RegistryClient({
        apiUrl: config.registryApiUrl,
        fetch: fetchMock,
      }),
    });

    expect(report).toMatchObject({
      outcome: "prune_failed",
      exitCode: 1,
      prunedTags: ["v1-amd64"],
    });
    expectCleanedOnce(transport, "acme/app:v1");
  });

  it("skips pruning when arch tags are kept", async () => {
    const { fetchMock, deps, config } = setup(undefined, 204, {
      pruneArchTags: false,
    });

    const report = await runMultiarchBuild(config, deps);

    expect(report.outcome).toBe("succeeded");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("does not fail the run when cleanup fails", async () => {
    const { deps, config } = setup((call) =>
      call.script === BUILDER_PRUNE ? 1 : 0,
    );

    const report = await runMultiarchBuild(config, deps);

    expect(report.exitCode).toBe(0);
    expect(report.cleanupFailures).toBe(2);
  });

  it("aborts without rollback or cleanup on an empty remote command", async () => {
    const { transport, deps, config } = setup();

    await expect(
      runMultiarchBuild({ ...config, credentials: {} }, deps),
    ).rejects.toThrow(EmptyRemoteCommandError);
    expect(
      transport.calls.filter((call) => call.script === BUILDER_PRUNE),
    ).toEqual([]);
    expect(transport.scriptsOn(MANIFEST_HOST)).toEqual([]);
  });
});

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  envInput,
  expandWorkingDir,
  imageDirectory,
  loadBuildConfig,
  loadCleanupConfig,
  loadHostMapping,
  mergeConfigInput,
  resolveConfigInput,
} from "./config.js";
import { ConfigError } from "./errors.js";
import { baseInput, HOST_A, HOST_B, MANIFEST_HOST } from "./test-utils.js";

function configIssues(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("expected a ConfigError");
}

const now = new Date(2024, 0, 2, 3, 4, 5);

describe("build config", () => {
  it("derives tag and working directory from the start time", () => {
    const config = loadBuildConfig(
      { ...baseInput, imageTag: undefined, workingDir: undefined },
      now,
    );

    expect(config.image).toEqual({ name: "acme/app", baseTag: "20240102030405" });
    expect(config.workingDir).toBe("/tmp/archfleet/build_2024-01-02_03:04:05");
    expect(config.source).toEqual({
      url: "git@example.com:acme/app.git",
      branch: "master",
    });
    expect(config.useCache).toBe(true);
    expect(config.pruneArchTags).toBe(true);
    expect(config.registryApiUrl).toBe("https://hub.docker.com");
    expect(config.manifestHost).toEqual({ connection: MANIFEST_HOST });
    expect(config.archHosts).toEqual([
      { architecture: "linux/amd64", target: { connection: HOST_A } },
      { architecture: "linux/arm64/v8", target: { connection: HOST_B } },
    ]);
    expect(config.credentials).toEqual({
      token: undefined,
      basic: { login: "ci-bot", password: "test-secret" },
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("fails fast listing every missing field", () => {
    expect(configIssues(() => loadBuildConfig({}, now))).toEqual(
      expect.arrayContaining([
        "MANIFEST_HOST is required",
        "ARCH_HOSTS is required",
        "IMAGE_NAME is required",
        "REPO_URL is required",
      ]),
    );
  });

  it("requires login and password to prune tags", () => {
    expect(
      configIssues(() =>
        loadBuildConfig(
          {
            ...baseInput,
            registryLogin: undefined,
            registryPassword: undefined,
            registryToken: "test-token",
          },
          now,
        ),
      ),
    ).toEqual([
      "REGISTRY_LOGIN and REGISTRY_PASSWORD are required to prune arch tags",
    ]);
  });

  it("accepts a token alone when arch tags are kept", () => {
    const config = loadBuildConfig(
      {
        ...baseInput,
        registryLogin: undefined,
        registryPassword: undefined,
        registryToken: "test-token",
        pruneArchTags: "no",
      },
      now,
    );
    expect(config.credentials).toEqual({ token: "test-token", basic: undefined });
    expect(config.pruneArchTags).toBe(false);
  });

  it("parses boolean flags from strings", () => {
    expect(loadBuildConfig({ ...baseInput, useCache: "0" }, now).useCache).toBe(
      false,
    );
    expect(
      loadBuildConfig({ ...baseInput, useCache: " YES " }, now).useCache,
    ).toBe(true);
    expect(
      configIssues(() => loadBuildConfig({ ...baseInput, useCache: "maybe" }, now)),
    ).toEqual(["USE_CACHE must be one of 1, 0, true, false, yes, no"]);
  });

  it("rejects duplicate architectures", () => {
    expect(
      configIssues(() =>
        loadBuildConfig(
          { ...baseInput, archHosts: "linux/amd64::ssh a; linux/amd64::ssh b" },
          now,
        ),
      ),
    ).toEqual([
      'ARCH_HOSTS: Architecture "linux/amd64" is mapped more than once',
    ]);
  });

  it("rejects two architectures built on the same host", () => {
    expect(
      configIssues(() =>
        loadBuildConfig(
          { ...baseInput, archHosts: "linux/amd64::ssh a; linux/386::ssh a" },
          now,
        ),
      ),
    ).toEqual([
      'ARCH_HOSTS: Host "ssh a" is mapped to both "linux/amd64" and "linux/386"',
    ]);
  });

  it("rejects malformed mappings and invalid tags", () => {
    expect(
      configIssues(() =>
        loadBuildConfig(
          { ...baseInput, archHosts: "linux/amd64", imageTag: "-bad" },
          now,
        ),
      ),
    ).toEqual([
      'ARCH_HOSTS Invalid host mapping entry "linux/amd64": expected "<arch>::<connection>"',
      "IMAGE_TAG must be a valid registry tag",
    ]);
  });

  it("accepts the mapping as a list of entries", () => {
    const config = loadBuildConfig(
      {
        ...baseInput,
        archHosts: [{ arch: "linux/amd64", host: "ssh a" }],
      },
      now,
    );
    expect(config.archHosts).toEqual([
      { architecture: "linux/amd64", target: { connection: "ssh a" } },
    ]);
  });

  it("expands working directory placeholders", () => {
    expect(expandWorkingDir("/tmp/{tag}/{timestamp}", { tag: "v1", now })).toBe(
      "/tmp/v1/2024-01-02_03:04:05",
    );
    expect(imageDirectory("/tmp/w", "acme/nginx php")).toBe(
      "/tmp/w/acme_nginx_php",
    );
  });
});

describe("partial configs", () => {
  it("loads only the host mapping", () => {
    expect(
      loadHostMapping({ manifestHost: "ssh m", archHosts: "linux/amd64::ssh a" }),
    ).toEqual({
      manifestHost: { connection: "ssh m" },
      archHosts: [
        { architecture: "linux/amd64", target: { connection: "ssh a" } },
      ],
    });
  });

  it("requires an explicit tag and working directory for cleanup", () => {
    expect(
      configIssues(() =>
        loadCleanupConfig({
          manifestHost: "ssh m",
          archHosts: "linux/amd64::ssh a",
          imageName: "acme/app",
        }),
      ),
    ).toEqual(["IMAGE_TAG is required", "WORKING_DIR is required"]);
  });
});

describe("config layering", () => {
  it("takes the first non-empty value per key", () => {
    expect(
      mergeConfigInput(
        { imageName: "from-flag", imageTag: "" },
        { imageName: "from-env", imageTag: "v2", useCache: false },
        { repoUrl: "from-file" },
      ),
    ).toEqual({
      imageName: "from-flag",
      imageTag: "v2",
      useCache: false,
      repoUrl: "from-file",
    });
  });

  it("reads environment variables", () => {
    expect(
      envInput({
        IMAGE_NAME: "acme/app",
        ARCH_HOSTS: "linux/amd64::ssh a",
        USE_CACHE: "0",
        UNRELATED: "x",
      }),
    ).toEqual({
      imageName: "acme/app",
      archHosts: "linux/amd64::ssh a",
      useCache: "0",
    });
  });

  it("combines flags, environment and archfleet.jsonc", async () => {
    const dir = mkdtempSync(join(tmpdir(), "archfleet-config-"));
    writeFileSync(
      join(dir, "archfleet.jsonc"),
      `{
        // shared settings
        "version": 1,
        "imageName": "acme/from-file",
        "repoUrl": "git@example.com:acme/app.git",
        "archHosts": [{ "arch": "linux/amd64", "host": "ssh a" }],
        "useCache": false
      }`,
    );

    const input = await resolveConfigInput(
      { imageTag: "v3" },
      { cwd: dir, env: { IMAGE_NAME: "acme/from-env" } },
    );

    expect(input).toEqual({
      imageName: "acme/from-env",
      imageTag: "v3",
      repoUrl: "git@example.com:acme/app.git",
      archHosts: [{ arch: "linux/amd64", host: "ssh a" }],
      useCache: false,
    });

    rmSync(dir, { recursive: true, force: true });
  });
});

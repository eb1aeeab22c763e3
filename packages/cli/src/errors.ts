export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Raised when a caller dispatches a remote command with no content. This is a
 * programming error: nothing is retried and nothing is rolled back.
 */
export class EmptyRemoteCommandError extends Error {
  constructor(target: string) {
    super(`Remote command cannot be empty (target: ${target})`);
    this.name = "EmptyRemoteCommandError";
  }
}

export class ManifestPublishError extends Error {
  readonly exitCode: number;

  constructor(step: string, exitCode: number) {
    super(`Manifest ${step} failed with exit code ${exitCode}`);
    this.name = "ManifestPublishError";
    this.exitCode = exitCode;
  }
}

export class RegistryApiError extends Error {
  readonly status: number | undefined;
  readonly url: string;

  constructor(
    message: string,
    url: string,
    status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RegistryApiError";
    this.url = url;
    this.status = status;
  }
}

/** Tag deletion stopped part way; tags deleted before the failure stay deleted */
export class TagPruneError extends Error {
  readonly deleted: readonly string[];
  readonly remaining: readonly string[];

  constructor(
    message: string,
    deleted: readonly string[],
    remaining: readonly string[],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TagPruneError";
    this.deleted = deleted;
    this.remaining = remaining;
  }
}

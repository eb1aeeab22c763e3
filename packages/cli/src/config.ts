import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import {
  type ArchHostEntry,
  type ArchMapping,
  type ArchfleetFile,
  archHostEntrySchema,
  type HostMapping,
  type ImageIdentity,
  type RegistryCredentials,
  type SourceLocation,
} from "./types.js";
import { parseArchfleetFile } from "./utils/archfleet.js";
import {
  findMappingConflicts,
  parseArchMapping,
  toArchMapping,
} from "./utils/mapping.js";

export const DEFAULT_WORKING_DIR = "/tmp/archfleet/build_{timestamp}";
export const DEFAULT_REPO_BRANCH = "master";
export const DEFAULT_REGISTRY_API_URL = "https://hub.docker.com";

// Registry tag grammar: first char word, then up to 127 of word, dot or dash
const TAG_PATTERN = /^[\w][\w.-]{0,127}$/;

export interface ConfigInput {
  imageName?: string;
  imageTag?: string;
  buildArgs?: string;
  repoUrl?: string;
  repoBranch?: string;
  registryToken?: string;
  registryLogin?: string;
  registryPassword?: string;
  manifestHost?: string;
  archHosts?: string | ArchHostEntry[];
  workingDir?: string;
  useCache?: string | boolean;
  pruneArchTags?: string | boolean;
  registryApiUrl?: string;
}

type ConfigKey = keyof ConfigInput;

export const ENV_KEYS = {
  imageName: "IMAGE_NAME",
  imageTag: "IMAGE_TAG",
  buildArgs: "BUILD_ARGS",
  repoUrl: "REPO_URL",
  repoBranch: "REPO_BRANCH",
  registryToken: "REGISTRY_TOKEN",
  registryLogin: "REGISTRY_LOGIN",
  registryPassword: "REGISTRY_PASSWORD",
  manifestHost: "MANIFEST_HOST",
  archHosts: "ARCH_HOSTS",
  workingDir: "WORKING_DIR",
  useCache: "USE_CACHE",
  pruneArchTags: "PRUNE_ARCH_TAGS",
  registryApiUrl: "REGISTRY_API_URL",
} as const satisfies Record<ConfigKey, string>;

const CONFIG_KEYS = Object.keys(ENV_KEYS).filter(isConfigKey);

function isConfigKey(key: PropertyKey): key is ConfigKey {
  return typeof key === "string" && Object.hasOwn(ENV_KEYS, key);
}

export interface CleanupConfig extends HostMapping {
  readonly image: ImageIdentity;
  readonly workingDir: string;
}

export interface BuildConfig extends CleanupConfig {
  readonly buildArgs: string;
  readonly source: SourceLocation;
  readonly credentials: RegistryCredentials;
  readonly useCache: boolean;
  readonly pruneArchTags: boolean;
  readonly registryApiUrl: string;
}

const requiredString = z
  .string({ required_error: "is required" })
  .trim()
  .min(1, "is required");

const booleanish = z
  .preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.union([z.boolean(), z.enum(["1", "0", "true", "false", "yes", "no"])], {
      errorMap: () => ({ message: "must be one of 1, 0, true, false, yes, no" }),
    }),
  )
  .transform(
    (value) =>
      value === true || value === "1" || value === "true" || value === "yes",
  );

const archHostsSchema = z
  .union([z.string(), z.array(archHostEntrySchema)])
  .optional()
  .transform((value, ctx): ArchMapping[] => {
    if (value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "is required" });
      return z.NEVER;
    }
    try {
      const mappings =
        typeof value === "string"
          ? parseArchMapping(value)
          : value.map(toArchMapping);
      if (mappings.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "must list at least one architecture",
        });
        return z.NEVER;
      }
      return mappings;
    } catch (error) {
      if (error instanceof ConfigError) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
        return z.NEVER;
      }
      throw error;
    }
  });

const hostsSchema = z.object({
  manifestHost: requiredString,
  archHosts: archHostsSchema,
});

const tagSchema = z
  .string()
  .trim()
  .regex(TAG_PATTERN, "must be a valid registry tag");

const cleanupSchema = hostsSchema.extend({
  imageName: requiredString,
  imageTag: requiredString.pipe(tagSchema),
  workingDir: requiredString,
});

const buildSchema = hostsSchema
  .extend({
    imageName: requiredString,
    imageTag: tagSchema.optional(),
    buildArgs: z.string().default(""),
    repoUrl: requiredString,
    repoBranch: requiredString.default(DEFAULT_REPO_BRANCH),
    registryToken: z.string().optional(),
    registryLogin: z.string().optional(),
    registryPassword: z.string().optional(),
    workingDir: requiredString.default(DEFAULT_WORKING_DIR),
    useCache: booleanish.default(true),
    pruneArchTags: booleanish.default(true),
    registryApiUrl: z.string().url().default(DEFAULT_REGISTRY_API_URL),
  })
  .superRefine((value, ctx) => {
    const hasBasic = Boolean(value.registryLogin && value.registryPassword);
    if (hasBasic) {
      return;
    }
    if (value.pruneArchTags || !value.registryToken) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["registryLogin"],
        message: value.pruneArchTags
          ? `and ${ENV_KEYS.registryPassword} are required to prune arch tags`
          : `and ${ENV_KEYS.registryPassword} are required when ${ENV_KEYS.registryToken} is not set`,
      });
    }
  });

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const [key] = issue.path;
    const label = isConfigKey(key) ? ENV_KEYS[key] : issue.path.join(".");
    return `${label} ${issue.message}`;
  });
}

function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  input: ConfigInput,
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      "Invalid configuration",
      formatIssues(result.error),
    );
  }
  return result.data;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYYMMDDHHMMSS` in local time, the default image tag */
export function formatTagTimestamp(date: Date): string {
  return [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join("");
}

/** `YYYY-MM-DD_HH:MM:SS` in local time, used in working directory names */
export function formatDirTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function expandWorkingDir(
  template: string,
  values: { tag: string; now: Date },
): string {
  return template
    .replaceAll("{timestamp}", formatDirTimestamp(values.now))
    .replaceAll("{tag}", values.tag);
}

/** Per-image directory inside the working directory */
export function imageDirectory(workingDir: string, imageName: string): string {
  return `${workingDir}/${imageName.replace(/[/ ]+/g, "_")}`;
}

function isMeaningful(value: unknown): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  return typeof value !== "string" || value.trim() !== "";
}

/**
 * Merge layers key by key; the first layer with a non-empty value wins.
 */
export function mergeConfigInput(...layers: ConfigInput[]): ConfigInput {
  const merged: ConfigInput = {};
  for (const key of CONFIG_KEYS) {
    const layer = layers.find((candidate) => isMeaningful(candidate[key]));
    if (layer) {
      Object.assign(merged, { [key]: layer[key] });
    }
  }
  return merged;
}

export function envInput(env: NodeJS.ProcessEnv): ConfigInput {
  const input: ConfigInput = {};
  for (const key of CONFIG_KEYS) {
    const value = env[ENV_KEYS[key]];
    if (value !== undefined) {
      Object.assign(input, { [key]: value });
    }
  }
  return input;
}

export function fileInput(file: ArchfleetFile | null): ConfigInput {
  if (!file) {
    return {};
  }
  const { version: _version, ...input } = file;
  return input;
}

/**
 * Collect configuration from flags, environment and the optional
 * archfleet.jsonc file, in that order of precedence.
 */
export async function resolveConfigInput(
  flags: ConfigInput,
  options: { configPath?: string; cwd?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<ConfigInput> {
  const file = await parseArchfleetFile(options.configPath, options.cwd);
  return mergeConfigInput(
    flags,
    envInput(options.env ?? process.env),
    fileInput(file),
  );
}

export function loadHostMapping(input: ConfigInput): HostMapping {
  const data = parseWith(hostsSchema, input);
  return Object.freeze({
    manifestHost: { connection: data.manifestHost },
    archHosts: Object.freeze(data.archHosts),
  });
}

export function loadCleanupConfig(input: ConfigInput): CleanupConfig {
  const data = parseWith(cleanupSchema, input);
  return Object.freeze({
    manifestHost: { connection: data.manifestHost },
    archHosts: Object.freeze(data.archHosts),
    image: { name: data.imageName, baseTag: data.imageTag },
    workingDir: data.workingDir,
  });
}

/**
 * Validate the merged input once. Every problem is reported together and
 * nothing is dispatched to a host when validation fails.
 */
export function loadBuildConfig(
  input: ConfigInput,
  now: Date = new Date(),
): BuildConfig {
  const data = parseWith(buildSchema, input);
  const baseTag = data.imageTag ?? formatTagTimestamp(now);

  const conflicts = findMappingConflicts(data.archHosts, baseTag);
  if (conflicts.length > 0) {
    throw new ConfigError(
      "Invalid configuration",
      conflicts.map((problem) => `${ENV_KEYS.archHosts}: ${problem}`),
    );
  }

  const credentials: RegistryCredentials = {
    token: data.registryToken || undefined,
    basic:
      data.registryLogin && data.registryPassword
        ? { login: data.registryLogin, password: data.registryPassword }
        : undefined,
  };

  return Object.freeze({
    manifestHost: { connection: data.manifestHost },
    archHosts: Object.freeze(data.archHosts),
    image: { name: data.imageName, baseTag },
    buildArgs: data.buildArgs.trim(),
    source: { url: data.repoUrl, branch: data.repoBranch },
    credentials,
    workingDir: expandWorkingDir(data.workingDir, { tag: baseTag, now }),
    useCache: data.useCache,
    pruneArchTags: data.pruneArchTags,
    registryApiUrl: data.registryApiUrl.replace(/\/+$/, ""),
  });
}

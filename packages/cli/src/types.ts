import { z } from "zod";

/**
 * Opaque descriptor of how to reach a host, e.g. `ssh -A builder@10.0.0.2`.
 * The remote command is appended to it as a single argument.
 */
export interface ExecutionTarget {
  readonly connection: string;
}

export interface ArchMapping {
  /** Platform identifier passed to the build tool, e.g. `linux/arm64/v8` */
  readonly architecture: string;
  readonly target: ExecutionTarget;
}

export interface HostMapping {
  readonly manifestHost: ExecutionTarget;
  readonly archHosts: readonly ArchMapping[];
}

export interface ImageIdentity {
  readonly name: string;
  readonly baseTag: string;
}

export interface BasicCredentials {
  readonly login: string;
  readonly password: string;
}

export interface RegistryCredentials {
  readonly token?: string;
  readonly basic?: BasicCredentials;
}

export interface SourceLocation {
  readonly url: string;
  readonly branch: string;
}

export const archHostEntrySchema = z.object({
  arch: z.string().trim().min(1),
  host: z.string().trim().min(1),
});

export type ArchHostEntry = z.infer<typeof archHostEntrySchema>;

/**
 * archfleet.jsonc schema
 */
export const archfleetFileSchema = z.object({
  /** Config schema version */
  version: z.literal(1),
  imageName: z.string().optional(),
  imageTag: z.string().optional(),
  buildArgs: z.string().optional(),
  repoUrl: z.string().optional(),
  repoBranch: z.string().optional(),
  registryToken: z.string().optional(),
  registryLogin: z.string().optional(),
  registryPassword: z.string().optional(),
  manifestHost: z.string().optional(),
  /** Either `arch::connection; arch::connection` or a list of entries */
  archHosts: z.union([z.string(), z.array(archHostEntrySchema)]).optional(),
  workingDir: z.string().optional(),
  useCache: z.boolean().optional(),
  pruneArchTags: z.boolean().optional(),
  registryApiUrl: z.string().optional(),
});

export type ArchfleetFile = z.infer<typeof archfleetFileSchema>;

import { ConfigError } from "../errors.js";
import type { ArchHostEntry, ArchMapping, ExecutionTarget } from "../types.js";

const ENTRY_SEPARATOR = ";";
const PAIR_SEPARATOR = "::";
const PLATFORM_PREFIX = "linux";

/**
 * Parse `linux/amd64::ssh -A a@host1; linux/arm64/v8::ssh -A b@host2`.
 * Blank entries are skipped, so a trailing `;` is allowed.
 */
export function parseArchMapping(raw: string): ArchMapping[] {
  const mappings: ArchMapping[] = [];

  for (const entry of raw.split(ENTRY_SEPARATOR)) {
    const trimmed = entry.trim();
    if (trimmed === "") {
      continue;
    }

    const separatorIndex = trimmed.indexOf(PAIR_SEPARATOR);
    if (separatorIndex === -1) {
      throw new ConfigError(
        `Invalid host mapping entry "${trimmed}": expected "<arch>${PAIR_SEPARATOR}<connection>"`,
      );
    }

    mappings.push(
      toArchMapping({
        arch: trimmed.slice(0, separatorIndex),
        host: trimmed.slice(separatorIndex + PAIR_SEPARATOR.length),
      }),
    );
  }

  return mappings;
}

export function toArchMapping(entry: ArchHostEntry): ArchMapping {
  const architecture = entry.arch.trim();
  const connection = entry.host.trim();

  if (architecture === "" || connection === "") {
    throw new ConfigError(
      `Invalid host mapping entry "${entry.arch}${PAIR_SEPARATOR}${entry.host}": architecture and connection are both required`,
    );
  }

  return { architecture, target: { connection } };
}

/**
 * Tag suffix for an architecture: "linux/arm64/v8" -> "arm64v8".
 * Only the first platform prefix is stripped.
 */
export function sanitizeArchitecture(architecture: string): string {
  return architecture.replace(PLATFORM_PREFIX, "").replace(/[ /]/g, "");
}

export function archTag(baseTag: string, architecture: string): string {
  return `${baseTag}-${sanitizeArchitecture(architecture)}`;
}

/**
 * Problems that would make two build tasks write the same tag or share one
 * host's workspace and builder. Returned as messages so the config loader can
 * report all of them at once.
 */
export function findMappingConflicts(
  mappings: readonly ArchMapping[],
  baseTag: string,
): string[] {
  const problems: string[] = [];
  const seenArchitectures = new Set<string>();
  const tagOwners = new Map<string, string>();
  const hostOwners = new Map<string, string>();

  for (const { architecture, target } of mappings) {
    if (seenArchitectures.has(architecture)) {
      problems.push(`Architecture "${architecture}" is mapped more than once`);
      continue;
    }
    seenArchitectures.add(architecture);

    const tag = archTag(baseTag, architecture);
    const owner = tagOwners.get(tag);
    if (owner !== undefined) {
      problems.push(
        `Architectures "${owner}" and "${architecture}" both produce tag "${tag}"`,
      );
    } else {
      tagOwners.set(tag, architecture);
    }

    const hostOwner = hostOwners.get(target.connection);
    if (hostOwner !== undefined) {
      problems.push(
        `Host "${target.connection}" is mapped to both "${hostOwner}" and "${architecture}"`,
      );
    } else {
      hostOwners.set(target.connection, architecture);
    }
  }

  return problems;
}

/**
 * Hosts in mapping order, each connection listed once even if it serves
 * several architectures.
 */
export function distinctTargets(
  mappings: readonly ArchMapping[],
): ExecutionTarget[] {
  const seen = new Set<string>();
  const targets: ExecutionTarget[] = [];
  for (const { target } of mappings) {
    if (!seen.has(target.connection)) {
      seen.add(target.connection);
      targets.push(target);
    }
  }
  return targets;
}

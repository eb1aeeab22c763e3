import { readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { parse } from "comment-json";
import { type ArchfleetFile, archfleetFileSchema } from "../types.js";

export const CONFIG_FILENAME = "archfleet.jsonc";

export class ArchfleetConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArchfleetConfigError";
  }
}

export class ArchfleetConfigNotFoundError extends ArchfleetConfigError {
  constructor(path: string) {
    super(`archfleet config not found in ${path}`);
  }
}

export class ArchfleetConfigInvalidError extends ArchfleetConfigError {}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (_error) {
    return false;
  }
}

/**
 * Read the optional config file. An explicit path must exist; without one the
 * file is looked up in `cwd` and its absence is not an error.
 */
export async function parseArchfleetFile(
  explicitPath?: string,
  cwd: string = process.cwd(),
): Promise<ArchfleetFile | null> {
  const configPath = explicitPath
    ? resolve(cwd, explicitPath)
    : join(cwd, CONFIG_FILENAME);

  if (!(await exists(configPath))) {
    if (explicitPath) {
      throw new ArchfleetConfigNotFoundError(configPath);
    }
    return null;
  }

  const content = await readFile(configPath, "utf-8");
  let parsedConfig: unknown;
  try {
    parsedConfig = parse(content);
  } catch (error) {
    throw new ArchfleetConfigInvalidError(
      `Unable to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = archfleetFileSchema.safeParse(parsedConfig);
  if (!result.success) {
    throw new ArchfleetConfigInvalidError(
      `Invalid ${configPath}: ${result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`,
    );
  }

  return result.data;
}

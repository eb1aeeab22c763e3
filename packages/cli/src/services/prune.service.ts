import { ConfigError, RegistryApiError, TagPruneError } from "../errors.js";
import type { RegistryClient } from "../libs/registry-client.js";
import type { ImageIdentity, RegistryCredentials } from "../types.js";
import { log } from "../utils/logger.js";

/**
 * Delete the per-architecture tags once the combined manifest is published.
 * Stops at the first failed delete and throws a `TagPruneError` naming the
 * tags already deleted and the ones left. Returns the tags that were removed.
 */
export async function pruneArchTags(
  client: RegistryClient,
  credentials: RegistryCredentials,
  image: ImageIdentity,
  archTags: readonly string[],
): Promise<string[]> {
  log.phase("Removing per-architecture tags, keeping the combined manifest");

  if (!credentials.basic) {
    throw new ConfigError("Registry login and password are required to prune tags");
  }

  let token: string;
  try {
    token = await client.login(
      credentials.basic.login,
      credentials.basic.password,
    );
  } catch (error) {
    if (error instanceof RegistryApiError) {
      throw new TagPruneError(error.message, [], archTags, { cause: error });
    }
    throw error;
  }

  const deleted: string[] = [];
  for (const [index, tag] of archTags.entries()) {
    try {
      await client.deleteTag(token, image.name, tag);
    } catch (error) {
      if (error instanceof RegistryApiError) {
        log.error(`Unable to delete remote arch tag ${image.name}:${tag}`);
        throw new TagPruneError(error.message, deleted, archTags.slice(index), {
          cause: error,
        });
      }
      throw error;
    }
    log.info(`Deleted ${image.name}:${tag}`);
    deleted.push(tag);
  }
  return deleted;
}

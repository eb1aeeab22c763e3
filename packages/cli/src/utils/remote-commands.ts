import type {
  ImageIdentity,
  RegistryCredentials,
  SourceLocation,
} from "../types.js";

export const BUILDER_NAME = "archfleet";
export const REGISTRY_HOST = "docker.io";
const REGISTRY_AUTH_URL = "https://index.docker.io/v1/";
const MASK = "****";

/**
 * A command whose local values are already substituted. `script` is sent to
 * the host as is; `display` is the same command with secrets masked, for logs.
 */
export interface RemoteCommand {
  readonly script: string;
  readonly display: string;
}

export function remoteCommand(
  script: string,
  display: string = script,
): RemoteCommand {
  return { script, display };
}

/** Rendered once with the secret for the host and once with the mask for logs */
function secretCommand(
  render: (secret: string) => string,
  secret: string,
): RemoteCommand {
  return remoteCommand(render(secret), render(MASK));
}

/** Single-quote a value for a POSIX shell */
export function quote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function imageRef(image: ImageIdentity, tag = image.baseTag): string {
  return `${image.name}:${tag}`;
}

/** Glob matching the run tag and every per-architecture tag derived from it */
function runImagePattern(image: ImageIdentity): string {
  return quote(`${imageRef(image)}*`);
}

export function resetWorkspaceCommand(workingDir: string): RemoteCommand {
  const dir = quote(workingDir);
  return remoteCommand(
    `if [[ -d ${dir} ]]; then rm -rf ${dir}; fi && mkdir -p ${dir}`,
  );
}

export function createDirectoryCommand(dir: string): RemoteCommand {
  return remoteCommand(`mkdir -p ${quote(dir)}`);
}

export function cloneCommand(
  source: SourceLocation,
  destination: string,
): RemoteCommand {
  return remoteCommand(
    `git clone --branch ${quote(source.branch)} --recursive --quiet --dissociate ${quote(source.url)} ${quote(destination)}`,
  );
}

/**
 * Log the host's docker client in to the registry. A token is written
 * straight into the client config, which also works where a credential
 * helper breaks `docker login`.
 */
export function registryLoginCommand(
  credentials: RegistryCredentials,
): RemoteCommand {
  if (credentials.token) {
    return secretCommand((token) => {
      const dockerConfig = JSON.stringify({
        auths: { [REGISTRY_AUTH_URL]: { auth: token } },
      });
      return `mkdir -p ~/.docker && echo ${quote(dockerConfig)} > ~/.docker/config.json`;
    }, credentials.token);
  }
  if (credentials.basic) {
    const { login, password } = credentials.basic;
    return secretCommand(
      (secret) =>
        `echo ${quote(secret)} | docker login --username ${quote(login)} --password-stdin`,
      password,
    );
  }
  return remoteCommand("");
}

export function ensureBuilderCommand(): RemoteCommand {
  return remoteCommand(
    `if [[ -z $(docker buildx ls | grep ${quote(BUILDER_NAME)}) ]]; then docker buildx create --name ${quote(BUILDER_NAME)} --driver docker-container --use; fi`,
  );
}

export function bootstrapBuilderCommand(): RemoteCommand {
  return remoteCommand("docker buildx inspect --bootstrap");
}

export function removeBuilderCommand(): RemoteCommand {
  return remoteCommand(
    `if [[ ! -z $(docker buildx ls | grep ${quote(BUILDER_NAME)}) ]]; then docker buildx rm ${quote(BUILDER_NAME)}; fi`,
  );
}

export interface BuildCommandOptions {
  image: ImageIdentity;
  architecture: string;
  archTag: string;
  buildArgs: string;
  contextDir: string;
  useCache: boolean;
}

function cacheRef(image: ImageIdentity, tag: string): string {
  return `type=registry,ref=${quote(`${REGISTRY_HOST}/${image.name}:${tag}`)}`;
}

export function buildCommand(options: BuildCommandOptions): RemoteCommand {
  const { image, architecture, archTag } = options;

  // Cache sources in priority order: shared cache, latest, run tag, own tag
  const cacheFlags = options.useCache
    ? [
        ...["cache", "latest", image.baseTag, archTag].map(
          (tag) => `--cache-from=${cacheRef(image, tag)}`,
        ),
        `--cache-to=${cacheRef(image, "cache")},mode=max`,
      ]
    : ["--no-cache"];

  const parts = [
    "docker buildx build",
    "--pull",
    "--progress=plain",
    options.buildArgs,
    `--platform=${architecture}`,
    ...cacheFlags,
    `--tag ${quote(imageRef(image, archTag))}`,
    "--push",
    quote(options.contextDir),
  ];

  return remoteCommand(parts.filter((part) => part !== "").join(" "));
}

export function removeRunImagesCommand(image: ImageIdentity): RemoteCommand {
  const pattern = runImagePattern(image);
  return remoteCommand(
    `if [[ ! -z $(docker image ls ${pattern} --quiet) ]]; then docker rmi --force $(docker image ls ${pattern} --quiet); fi`,
  );
}

export function manifestCreateCommand(
  image: ImageIdentity,
  archTags: readonly string[],
): RemoteCommand {
  const amends = archTags.map((tag) => `--amend ${quote(imageRef(image, tag))}`);
  return remoteCommand(
    [`docker manifest create ${quote(imageRef(image))}`, ...amends].join(" "),
  );
}

export function manifestPushCommand(image: ImageIdentity): RemoteCommand {
  return remoteCommand(`docker manifest push --purge ${quote(imageRef(image))}`);
}

export function builderPruneCommand(): RemoteCommand {
  return remoteCommand("docker builder prune --force");
}

export function removeWorkspaceCommand(workingDir: string): RemoteCommand {
  return remoteCommand(`rm -rf ${quote(workingDir)}`);
}

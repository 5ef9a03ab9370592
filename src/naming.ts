import { InvalidFormatError } from "./errors.js";

export type Environment = "test" | "prod";

const ENV_BY_MARKER: Readonly<Record<string, Environment>> = { t: "test", p: "prod" };

const PROJECT_NAME_RE = /^(.*)-[^-]+$/;

// `<project-name>-<unique-id>` -> `<project-name>`
export function extractProjectName(projectId: string): string {
  const match = PROJECT_NAME_RE.exec(projectId);
  if (!match) {
    throw new InvalidFormatError(
      `Invalid project ID: ${projectId}, the project ID is expected to be in the format <project-name>-<unique-id>`,
      projectId
    );
  }
  return match[1];
}

// Kuben ids carry the environment marker before the last hyphen: dapla-kildomaten-p-zz
export function extractEnvironment(projectId: string): Environment {
  const segments = projectId.split("-");
  const marker = segments.length >= 2 ? segments[segments.length - 2] : undefined;
  const env = marker !== undefined && Object.hasOwn(ENV_BY_MARKER, marker) ? ENV_BY_MARKER[marker] : undefined;
  if (!env) {
    throw new InvalidFormatError(`Invalid project ID: ${projectId}, no environment marker (t/p) before the last hyphen`, projectId);
  }
  return env;
}

function stripLastSegment(name: string): string {
  const i = name.lastIndexOf("-");
  return i < 0 ? name : name.slice(0, i);
}

export function buildBucketId(projectName: string, env: Environment | undefined, kuben: boolean): string {
  if (!kuben) return `ssb-${projectName}-data-kilde`;
  if (!env) {
    throw new InvalidFormatError(`Kuben bucket for ${projectName} needs an environment`, projectName);
  }
  return `ssb-${stripLastSegment(projectName)}-data-kilde-${env}`;
}

export function buildSharedBucketId(projectName: string, env: Environment): string {
  return `ssb-${stripLastSegment(projectName)}-data-produkt-${env}`;
}

// Topics are provisioned with hyphens, folder names often use underscores.
export function normalizeSourceName(name: string): string {
  return name.replace(/_/g, "-");
}

export function sourceTopicId(sourceName: string): string {
  return `update-${normalizeSourceName(sourceName)}`;
}

export function sharedTopicId(sourceName: string): string {
  return `delomaten-update-${normalizeSourceName(sourceName)}`;
}

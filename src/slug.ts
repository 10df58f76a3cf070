import { InvalidInputError } from "./errors";

/** Joins project and normalized version. */
export const SLUG_SEPARATOR = "-";
/** Stands in for every "." of a version. */
export const DOT_MARKER = "-dot-";

/** Replace every "." with the dot marker, e.g. "1.29" -> "1-dot-29". */
export function normalizeVersion(version: string): string {
  return version.split(".").join(DOT_MARKER);
}

/** Inverse of {@link normalizeVersion} for versions that never contained the marker. */
export function denormalizeVersion(normalized: string): string {
  return normalized.split(DOT_MARKER).join(".");
}

/**
 * Canonical index key for a project/version pair. An empty version yields the
 * project unchanged.
 */
export function resolveSlug(project: string, version: string): string {
  if (!version) return project;
  return `${project}${SLUG_SEPARATOR}${normalizeVersion(version)}`;
}

/**
 * Reject inputs that would make the slug ambiguous or escape the storage
 * directories. The project may not contain the separator, so a slug splits at
 * its first "-"; the version must survive normalize/denormalize unchanged.
 */
export function validateSlugParts(project: string, version: string): void {
  for (const [field, value] of [
    ["project", project],
    ["version", version],
  ] as const) {
    if (/[\\/]/.test(value) || value === "." || value === "..") {
      throw new InvalidInputError(`${field} must not contain path separators: ${value}`);
    }
  }
  if (project.includes(SLUG_SEPARATOR)) {
    throw new InvalidInputError(`project must not contain "${SLUG_SEPARATOR}": ${project}`);
  }
  if (denormalizeVersion(normalizeVersion(version)) !== version) {
    throw new InvalidInputError(`version is ambiguous next to the "${DOT_MARKER}" marker: ${version}`);
  }
}

/**
 * Version triple carried by a namespace such as `Example.v1_2_0`.
 */
export interface SchemaVersion {
  major: number;
  minor: number;
  errata: number;
}

/**
 * A namespace name split into its base and optional version.
 */
export interface NamespaceName {
  /** Full name, e.g. `Example.v1_2_0`. */
  name: string;
  /** Name without the version segment, e.g. `Example`. */
  base: string;
  version?: SchemaVersion;
}

const VERSION_SEGMENT = /^v(\d+)_(\d+)_(\d+)$/;

export function parseVersion(segment: string): SchemaVersion | undefined {
  const match = VERSION_SEGMENT.exec(segment);
  if (!match) return undefined;
  return {
    major: Number.parseInt(match[1], 10),
    minor: Number.parseInt(match[2], 10),
    errata: Number.parseInt(match[3], 10),
  };
}

export function formatVersion(version: SchemaVersion): string {
  return `v${version.major}_${version.minor}_${version.errata}`;
}

export function compareVersions(a: SchemaVersion, b: SchemaVersion): number {
  return a.major - b.major || a.minor - b.minor || a.errata - b.errata;
}

/**
 * Splits a namespace name; only a trailing `vX_Y_Z` segment counts as a version.
 */
export function parseNamespaceName(name: string): NamespaceName {
  const dot = name.lastIndexOf('.');
  if (dot > 0) {
    const version = parseVersion(name.slice(dot + 1));
    if (version) return { name, base: name.slice(0, dot), version };
  }
  return { name, base: name };
}

/**
 * Orders the candidates that may stand in for `requested`, best first:
 *
 * 1. the exact namespace;
 * 2. versions of the same base not above the requested one, newest first;
 * 3. the unversioned base namespace;
 * 4. for a bare request only, every versioned namespace, newest first.
 *
 * Candidates that fit none of these are dropped, so an empty result means
 * nothing can stand in for the request.
 */
export function rankNamespaces<T extends NamespaceName>(requested: string, candidates: Iterable<T>): T[] {
  const wanted = parseNamespaceName(requested);
  const sameBase = [...candidates].filter((c) => c.base === wanted.base);

  const exact = sameBase.filter((c) => c.name === wanted.name);
  const versioned = sameBase
    .filter((c): c is T & { version: SchemaVersion } => c.version !== undefined && c.name !== wanted.name)
    .sort((a, b) => compareVersions(b.version, a.version));
  const unversioned = sameBase.filter((c) => c.version === undefined && c.name !== wanted.name);

  const ranked: T[] = [...exact];
  const { version } = wanted;
  if (version) {
    ranked.push(...versioned.filter((c) => compareVersions(c.version, version) <= 0));
    ranked.push(...unversioned);
  } else {
    ranked.push(...unversioned, ...versioned);
  }
  return ranked;
}

/**
 * Best stand-in for `requested` among `candidates`, or `undefined`.
 */
export function selectNamespace<T extends NamespaceName>(requested: string, candidates: Iterable<T>): T | undefined {
  return rankNamespaces(requested, candidates)[0];
}

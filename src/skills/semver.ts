export interface SemanticVersion {
  major: number;
  minor: number;
  patch: number;
}

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

export class MalformedVersionError extends Error {
  readonly version: string;

  constructor(version: string) {
    super(`Malformed version "${version}" (expected major.minor.patch)`);
    this.name = 'MalformedVersionError';
    this.version = version;
  }
}

/** Parses `major.minor.patch`; surrounding whitespace is ignored */
export function parseVersion(version: string): SemanticVersion {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match) {
    throw new MalformedVersionError(version);
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
  };
}

export function tryParseVersion(version: string): SemanticVersion | null {
  try {
    return parseVersion(version);
  } catch {
    return null;
  }
}

export function isValidVersion(version: string): boolean {
  return tryParseVersion(version) !== null;
}

/** Negative when a < b, positive when a > b, 0 when equal */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): number {
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  return a.patch - b.patch;
}

export function formatVersion(version: SemanticVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

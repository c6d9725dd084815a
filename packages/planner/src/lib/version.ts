import { ValidationError } from './errors.js';

const VERSION_PATTERN = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?/;

/**
 * Parse the numeric base of a version string. `7.21` reads as `7.21.0` and
 * suffixes such as `-SNAPSHOT` or build numbers are ignored.
 */
export function parseVersion(version: string): [number, number, number] {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match) {
    throw new ValidationError(`Invalid version string '${version}'`, { version });
  }
  return [Number(match[1]), Number(match[2] ?? 0), Number(match[3] ?? 0)];
}

export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);
  for (let i = 0; i < 3; i++) {
    if (left[i] !== right[i]) return left[i] < right[i] ? -1 : 1;
  }
  return 0;
}

export function isAtLeast(version: string, minimum: string): boolean {
  return compareVersions(version, minimum) >= 0;
}

/** `minimum <= version < below` */
export function isWithin(version: string, minimum: string, below: string): boolean {
  return isAtLeast(version, minimum) && compareVersions(version, below) < 0;
}

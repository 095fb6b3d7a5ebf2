import type { Version } from '@shared/contracts';

export function parseVersion(value: string): Version {
  const [major, minor, patch] = value.trim().split('.');
  return {
    major: parseComponent(major),
    minor: parseComponent(minor),
    patch: parseComponent(patch)
  };
}

export function stripTagPrefix(tag: string): string {
  const normalized = tag.trim();
  return normalized.startsWith('v') ? normalized.slice(1) : normalized;
}

export function compareVersions(left: Version, right: Version): number {
  if (left.major !== right.major) {
    return left.major - right.major;
  }
  if (left.minor !== right.minor) {
    return left.minor - right.minor;
  }
  return left.patch - right.patch;
}

export function isNewer(current: Version | string, candidate: Version | string): boolean {
  return compareVersions(toVersion(candidate), toVersion(current)) > 0;
}

function toVersion(value: Version | string): Version {
  return typeof value === 'string' ? parseVersion(stripTagPrefix(value)) : value;
}

// componentes ilegiveis contam como 0; "4-rc1" vale 4
function parseComponent(value: string | undefined): number {
  const match = value?.trim().match(/^\d+/);
  if (!match) {
    return 0;
  }

  const parsed = Number(match[0]);
  return Number.isSafeInteger(parsed) ? parsed : 0;
}

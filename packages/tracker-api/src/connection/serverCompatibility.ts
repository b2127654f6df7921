import { STATUS_SCOPE_MIN_VERSION } from '../constants';
import type { ServerFeatures, ServerVersionTuple } from './contracts';

export interface CompatibilityResult {
  ok: boolean;
  reason?: string;
}

const VERSION_REGEX =
  /^v?(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([a-zA-Z\d\-.]*))?(?:\+([a-zA-Z\d\-.]*))?$/;

export function parseServerVersion(version: string): ServerVersionTuple | null {
  const match = version.trim().match(VERSION_REGEX);
  if (!match) {
    return null;
  }
  return [Number(match[1]), Number(match[2]), Number(match[3]), match[4] ?? '', match[5] ?? ''];
}

export function compareVersions(left: string, right: string): number {
  const leftParts = parseServerVersion(left);
  const rightParts = parseServerVersion(right);
  if (!leftParts || !rightParts) {
    return 0;
  }
  const leftNumbers: number[] = [leftParts[0], leftParts[1], leftParts[2]];
  const rightNumbers: number[] = [rightParts[0], rightParts[1], rightParts[2]];
  for (let index = 0; index < 3; index += 1) {
    const lVal = leftNumbers[index];
    const rVal = rightNumbers[index];
    if (lVal > rVal) {
      return 1;
    }
    if (lVal < rVal) {
      return -1;
    }
  }
  return 0;
}

export function validateServerVersion(serverVersion: string, minVersion: string): CompatibilityResult {
  if (parseServerVersion(serverVersion) === null) {
    return {
      ok: false,
      reason: `Server reported unparsable version '${serverVersion}'.`,
    };
  }
  if (compareVersions(serverVersion, minVersion) < 0) {
    return {
      ok: false,
      reason: `Server ${serverVersion} is older than required ${minVersion}.`,
    };
  }
  return { ok: true };
}

/**
 * Feature flags derived from the server version, overridden by flags the
 * server reports itself.
 */
export function resolveServerFeatures(
  serverVersion: string,
  reported: Record<string, boolean> = {}
): ServerFeatures {
  return {
    ...reported,
    statusScope: reported.statusScope ?? compareVersions(serverVersion, STATUS_SCOPE_MIN_VERSION) >= 0,
  };
}

/**
 * Host-interpreter versions, written the way the host reports them:
 * 5.006 is 5.6.0, 5.010 is 5.10.0.
 */

import { config } from './config.js';

export type HostVersion = number;

export const MINIMUM_HOST_VERSION: HostVersion = config.minimumHostVersion;

/** Larger of two versions. */
export function laterVersion(a: HostVersion, b: HostVersion): HostVersion {
  return b > a ? b : a;
}

/**
 * Smaller of two optional versions, where undefined means "not known to be
 * removed". On a tie the first argument wins.
 */
export function earlierRemoval(a: HostVersion | undefined, b: HostVersion | undefined): HostVersion | undefined {
  if (b === undefined) return a;
  if (a === undefined) return b;
  return b < a ? b : a;
}

/** Render as dotted triple: 5.010 -> "5.10.0". */
export function formatHostVersion(v: HostVersion): string {
  const major = Math.floor(v);
  const rest = Math.round((v - major) * 1e6);
  const minor = Math.floor(rest / 1000);
  const patch = rest % 1000;
  return `${major}.${minor}.${patch}`;
}

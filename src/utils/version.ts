import { FALLBACK_VERSION, VERSION_PART_MAX, VERSION_PATTERN } from '../constants/versioning.js';

/**
 * Next version in the progression 1.1.3 -> 1.1.4 -> ... -> 1.1.99 -> 1.2.0
 * -> ... -> 1.99.99 -> 2.0.0. Anything that is not three dot-separated
 * integers falls back to FALLBACK_VERSION.
 */
export const incrementVersion = (current: string): string => {
  const parts = VERSION_PATTERN.exec(current.trim());
  if (!parts) {
    return FALLBACK_VERSION;
  }

  let major = Number(parts[1]);
  let minor = Number(parts[2]);
  let patch = Number(parts[3]);

  if (patch < VERSION_PART_MAX) {
    patch += 1;
  } else if (minor < VERSION_PART_MAX) {
    minor += 1;
    patch = 0;
  } else {
    major += 1;
    minor = 0;
    patch = 0;
  }

  return `${major}.${minor}.${patch}`;
};

export const isValidVersion = (value: string): boolean => VERSION_PATTERN.test(value.trim());

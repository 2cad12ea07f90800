export const VERSION_PART_MAX = 99;
export const FALLBACK_VERSION = '1.1.4';
export const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

export const VERSION_PROGRESSION = [
  '1.1.3 -> 1.1.4 -> ... -> 1.1.99',
  '1.1.99 -> 1.2.0 -> ... -> 1.2.99',
  '1.2.99 -> 1.3.0 -> ... -> 1.99.0',
  '1.99.0 -> 1.99.1 -> ... -> 1.99.99',
  '1.99.99 -> 2.0.0 -> ... -> 2.0.99',
  '2.0.99 -> 2.1.0 -> ...',
] as const;

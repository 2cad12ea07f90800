export const HTTP_PROBE_SITES = [
  'https://www.google.com',
  'https://www.cloudflare.com',
  'https://www.github.com',
  'https://1.1.1.1',
] as const;

export const DNS_PROBE_HOST = 'google.com';

// Any response below this status means the request reached the internet.
export const HTTP_PROBE_MAX_STATUS = 500;

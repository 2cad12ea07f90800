const URL_CREDENTIALS = /(\b[a-z][a-z0-9+.-]*:\/\/)[^/\s:@]+(?::[^/\s@]*)?@/gi;

export const sanitizeError = (error: unknown): string => {
  if (typeof error === 'string') {
    return error
      .replace(URL_CREDENTIALS, '$1***@')
      .replace(/token[=:]\s*[^\s]+/gi, 'token=***')
      .replace(/password[=:]\s*[^\s]+/gi, 'password=***')
      .replace(/secret[=:]\s*[^\s]+/gi, 'secret=***');
  }

  if (error instanceof Error) {
    return sanitizeError(error.message);
  }

  return 'An unknown error occurred';
};

export const withTimeout = <T>(promise: Promise<T>, timeoutMs: number): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Operation timed out after ${timeoutMs}ms`)), timeoutMs);
    }),
  ]).finally(() => clearTimeout(timer));
};

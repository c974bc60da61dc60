const SECRET_PARAM_KEYS = [
  'api_key',
  'apikey',
  'apiKey',
  'access_key',
  'token',
  'access_token',
  'key',
  'secret',
];

export function sanitizeUrlForLogging(
  url: string,
  secrets: string[] = [],
): string {
  try {
    const urlObj = new URL(url);
    SECRET_PARAM_KEYS.forEach((key) => {
      if (urlObj.searchParams.has(key)) {
        urlObj.searchParams.set(key, 'REDACTED');
      }
    });

    let pathname = urlObj.pathname;
    for (const secret of secrets) {
      if (secret) {
        pathname = pathname.split(encodeURIComponent(secret)).join('REDACTED');
      }
    }

    return `${urlObj.origin}${pathname}${
      urlObj.searchParams.size ? `?${urlObj.searchParams.toString()}` : ''
    }`;
  } catch {
    return '[invalid-url]';
  }
}

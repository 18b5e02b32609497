const SECRET_PARAM_PATTERN = /key|token|secret|sig|password/i;

/** Origin, path and query of `url` with credential-looking params redacted. */
export function sanitizeUrlForLogging(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return '[invalid-url]';
  }

  const query = [...parsed.searchParams.entries()]
    .map(([name, value]) =>
      SECRET_PARAM_PATTERN.test(name) ? `${name}=REDACTED` : `${name}=${value}`,
    )
    .join('&');

  return query
    ? `${parsed.origin}${parsed.pathname}?${query}`
    : `${parsed.origin}${parsed.pathname}`;
}

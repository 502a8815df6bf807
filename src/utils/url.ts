// src/utils/url.ts

const SENSITIVE_PARAMS = ["token", "key", "apikey", "api_key", "secret", "password"];

/** `${base}/${path}` with the path's leading slashes stripped; base is expected pre-trimmed. */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl}/${path.replace(/^\/+/, "")}`;
}

/** Redact secret-looking query parameters so URLs can be logged. */
export function redactUrl(url: string): string {
  let u: URL;
  try {
    u = new URL(url);
  } catch {
    return url;
  }

  for (const param of SENSITIVE_PARAMS) {
    if (u.searchParams.has(param)) u.searchParams.set(param, "***");
  }
  return u.toString();
}

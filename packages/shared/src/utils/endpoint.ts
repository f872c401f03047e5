/** Version segment every chat-completion endpoint is served under */
const API_VERSION_SEGMENT = '/v1';

/** Suffix operators often paste from a provider's model listing URL */
const MODELS_SUFFIX = '/models';

/**
 * Normalize an operator-supplied API base URL to the provider's versioned root.
 *
 * - trailing slashes are dropped
 * - a trailing `/models` segment is stripped
 * - `/v1` is appended unless the URL already ends with it
 *
 * Normalizing an already-normalized URL returns it unchanged.
 *
 * @example
 * ```typescript
 * normalizeBaseUrl('https://api.openai.com');          // 'https://api.openai.com/v1'
 * normalizeBaseUrl('https://openrouter.ai/api/v1/models'); // 'https://openrouter.ai/api/v1'
 * ```
 */
export function normalizeBaseUrl(baseUrl: string): string {
  let url = trimTrailingSlashes(baseUrl.trim());

  if (url.endsWith(MODELS_SUFFIX)) {
    url = trimTrailingSlashes(url.slice(0, -MODELS_SUFFIX.length));
  }

  if (url.endsWith(API_VERSION_SEGMENT)) {
    return url;
  }

  return url + API_VERSION_SEGMENT;
}

function trimTrailingSlashes(url: string): string {
  let end = url.length;
  while (end > 0 && url[end - 1] === '/') {
    end--;
  }
  return url.slice(0, end);
}

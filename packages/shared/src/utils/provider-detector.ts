/**
 * Capabilities of the service behind a base URL, resolved once per client.
 *
 * - `generic`: any OpenAI-compatible endpoint; no extra request metadata
 * - `openrouter`: the OpenRouter aggregator, which attributes traffic to the
 *   calling application through two extra headers
 */
export type ProviderProfile =
  | { kind: 'generic' }
  | { kind: 'openrouter'; headers: Record<string, string> };

export type ProviderKind = ProviderProfile['kind'];

/** Host fragment identifying the OpenRouter aggregator */
const OPENROUTER_HOST = 'openrouter.ai';

/** Application attribution headers OpenRouter reads for routing and analytics */
export const OPENROUTER_APP_HEADERS: Readonly<Record<string, string>> = {
  'X-Title': 'MarkPDFdown',
  'HTTP-Referer': 'https://github.com/jorben/markpdfdown',
};

/**
 * Resolve the provider profile for a (normalized) base URL.
 *
 * Matches the URL's host against known aggregators. A value that does not
 * parse as a URL is matched as a whole string.
 */
export function resolveProviderProfile(baseUrl: string): ProviderProfile {
  const host = URL.canParse(baseUrl) ? new URL(baseUrl).host : baseUrl;

  if (host.toLowerCase().includes(OPENROUTER_HOST)) {
    return { kind: 'openrouter', headers: { ...OPENROUTER_APP_HEADERS } };
  }

  return { kind: 'generic' };
}

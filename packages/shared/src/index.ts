export { spawnAsync, type SpawnResult } from './utils/spawn-utils';
export { normalizeBaseUrl } from './utils/endpoint';
export {
  OPENROUTER_APP_HEADERS,
  resolveProviderProfile,
  type ProviderKind,
  type ProviderProfile,
} from './utils/provider-detector';
export {
  CompletionClient,
  type CompletionClientOptions,
  type CompletionRequest,
  type CompletionResponse,
  type PageCompletionClient,
} from './utils/completion-client';
export {
  TokenUsageAggregator,
  type PageTokenUsage,
  type TokenUsage,
} from './utils/token-usage-aggregator';

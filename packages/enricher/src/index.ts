/**
 * @frontport/enricher
 */

export {
  ModelEnricher,
  NoopEnricher,
  createEnricher,
  prepareContent,
  type ModelEnricherOptions,
  type CreateEnricherOptions,
} from './enricher.js';
export {
  AnthropicBackend,
  GenerationApiError,
  API_VERSION,
  type AnthropicBackendConfig,
} from './anthropic-backend.js';

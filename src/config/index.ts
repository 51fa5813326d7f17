/**
 * Configuration exports
 */

export {
  ConfigValidationError,
  DEFAULT_HEADROOM,
  DEFAULT_PROCESSOR_CONFIG,
  RATE_LIMIT_PRESETS,
  applyHeadroom,
  buildRequestHeaders,
  defaultResultsPath,
  isRateLimitPresetName,
  resolveApiKey,
  resolveProcessorConfig,
  type ProcessorConfig,
  type ProcessorConfigInput,
  type ProcessorDefaults,
  type RateLimitPreset,
  type RateLimitPresetName,
} from './processor-config.js';

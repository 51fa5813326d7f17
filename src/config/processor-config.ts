/**
 * Batch Processor Configuration
 *
 * Defaults, provider presets and validation for one batch run.
 *
 * Environment Variables (optional):
 * - BATCH_REQUESTS_API_KEY  - API key sent as a bearer token
 * - OPENAI_API_KEY          - fallback API key
 *
 * Rate limits should leave headroom below the provider's published limits;
 * the defaults are the chat preset at 75%.
 */

import {
  endpointFromUrl,
  isCostEstimatorName,
  isSupportedEncoding,
  COST_ESTIMATOR_NAMES,
  SUPPORTED_ENCODINGS,
} from '../services/cost-estimator/index.js';
import type { CostEstimatorName } from '../services/cost-estimator/index.js';
import { DEFAULT_RATE_LIMIT_SIGNATURE } from '../services/dispatcher/index.js';

/**
 * Fully resolved settings for one run
 */
export interface ProcessorConfig {
  /** Newline-delimited JSON requests */
  requestsFile: string;
  /** Newline-delimited JSON results; must not exist yet */
  resultsFile: string;
  /** Endpoint every request is POSTed to */
  requestUrl: string;
  /** Bearer token; no Authorization header when undefined */
  apiKey?: string;
  /** Requests admitted per request period */
  requestLimit: number;
  requestPeriodSeconds: number;
  /** Cost units (e.g. tokens) admitted per cost period */
  costLimit: number;
  costPeriodSeconds: number;
  maxAttempts: number;
  /** Admission pause after a rate-limit rejection */
  cooldownMs: number;
  /** Micro-sleep between admission loop iterations */
  loopSleepMs: number;
  costEstimator: CostEstimatorName;
  encoding: string;
  /** Substring of an error message that marks a rate-limit rejection */
  rateLimitSignature: string;
  /** Validate and stop before any request is sent */
  dryRun: boolean;
}

export type ProcessorDefaults = Omit<ProcessorConfig, 'requestsFile' | 'resultsFile' | 'apiKey'>;

/**
 * Settings as supplied by a caller; everything but the requests file is optional
 */
export interface ProcessorConfigInput
  extends Partial<Omit<ProcessorConfig, 'requestsFile' | 'costEstimator'>> {
  requestsFile: string;
  /** Estimator name, checked against the registry */
  costEstimator?: string;
  /** Rate-limit preset name; explicit limits override it */
  preset?: string;
}

export interface RateLimitPreset {
  description: string;
  requestLimit: number;
  costLimit: number;
  periodSeconds: number;
}

/**
 * Published per-minute limits of common endpoint families
 */
export const RATE_LIMIT_PRESETS = {
  chat: {
    description: 'Chat completions: 3500 requests and 90k tokens per minute',
    requestLimit: 3_500,
    costLimit: 90_000,
    periodSeconds: 60,
  },
  embeddings: {
    description: 'Embeddings: 1500 requests and 350k tokens per minute',
    requestLimit: 1_500,
    costLimit: 350_000,
    periodSeconds: 60,
  },
} as const satisfies Record<string, RateLimitPreset>;

export type RateLimitPresetName = keyof typeof RATE_LIMIT_PRESETS;

export const DEFAULT_HEADROOM = 0.75;

export function isRateLimitPresetName(value: string): value is RateLimitPresetName {
  return Object.prototype.hasOwnProperty.call(RATE_LIMIT_PRESETS, value);
}

/**
 * Scale a preset's limits down to leave room for other clients of the same key
 */
export function applyHeadroom(
  preset: RateLimitPreset,
  factor: number = DEFAULT_HEADROOM
): Pick<ProcessorConfig, 'requestLimit' | 'requestPeriodSeconds' | 'costLimit' | 'costPeriodSeconds'> {
  return {
    requestLimit: preset.requestLimit * factor,
    requestPeriodSeconds: preset.periodSeconds,
    costLimit: preset.costLimit * factor,
    costPeriodSeconds: preset.periodSeconds,
  };
}

export const DEFAULT_PROCESSOR_CONFIG: Readonly<ProcessorDefaults> = {
  requestUrl: 'https://api.openai.com/v1/embeddings',
  ...applyHeadroom(RATE_LIMIT_PRESETS.chat),
  maxAttempts: 5,
  cooldownMs: 15_000,
  loopSleepMs: 1,
  costEstimator: 'openai',
  encoding: 'cl100k_base',
  rateLimitSignature: DEFAULT_RATE_LIMIT_SIGNATURE,
  dryRun: false,
};

/**
 * Error thrown when a configuration option is missing or invalid
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly option: string,
    reason: string
  ) {
    super(`Invalid ${option}: ${reason}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Results path derived from the requests path
 *
 * @example
 * defaultResultsPath('data/requests.jsonl') // 'data/requests_results.jsonl'
 */
export function defaultResultsPath(requestsFile: string): string {
  return requestsFile.endsWith('.jsonl')
    ? `${requestsFile.slice(0, -'.jsonl'.length)}_results.jsonl`
    : `${requestsFile}_results.jsonl`;
}

/**
 * API key from the explicit option, then BATCH_REQUESTS_API_KEY, then
 * OPENAI_API_KEY. Empty strings count as unset.
 */
export function resolveApiKey(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  return explicit || env['BATCH_REQUESTS_API_KEY'] || env['OPENAI_API_KEY'] || undefined;
}

export function buildRequestHeaders(apiKey: string | undefined): Record<string, string> {
  return apiKey ? { Authorization: `Bearer ${apiKey}` } : {};
}

function requirePositive(option: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigValidationError(option, `must be a positive number, got ${value}`);
  }
}

function requireNonNegative(option: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigValidationError(option, `must be a non-negative number, got ${value}`);
  }
}

function validateRequestUrl(requestUrl: string): void {
  let url: URL;
  try {
    url = new URL(requestUrl);
  } catch {
    throw new ConfigValidationError('requestUrl', `"${requestUrl}" is not a URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigValidationError('requestUrl', `must use http or https, got ${url.protocol}`);
  }
}

/**
 * Merge caller settings over the defaults (or a preset) and validate them
 *
 * @throws ConfigValidationError naming the first invalid option
 */
export function resolveProcessorConfig(
  input: ProcessorConfigInput,
  env: NodeJS.ProcessEnv = process.env
): ProcessorConfig {
  const { preset, costEstimator, requestsFile, resultsFile, apiKey, ...overrides } = input;

  if (!requestsFile) {
    throw new ConfigValidationError('requestsFile', 'a requests file is required');
  }

  let limits = {};
  if (preset !== undefined) {
    if (!isRateLimitPresetName(preset)) {
      throw new ConfigValidationError(
        'preset',
        `unknown preset "${preset}", expected one of: ${Object.keys(RATE_LIMIT_PRESETS).join(', ')}`
      );
    }
    limits = applyHeadroom(RATE_LIMIT_PRESETS[preset]);
  }

  const estimator = costEstimator ?? DEFAULT_PROCESSOR_CONFIG.costEstimator;
  if (!isCostEstimatorName(estimator)) {
    throw new ConfigValidationError(
      'costEstimator',
      `unknown estimator "${estimator}", expected one of: ${COST_ESTIMATOR_NAMES.join(', ')}`
    );
  }

  const config: ProcessorConfig = {
    ...DEFAULT_PROCESSOR_CONFIG,
    ...limits,
    ...stripUndefined(overrides),
    costEstimator: estimator,
    requestsFile,
    resultsFile: resultsFile || defaultResultsPath(requestsFile),
    apiKey: resolveApiKey(apiKey, env),
  };

  requirePositive('requestLimit', config.requestLimit);
  requirePositive('requestPeriodSeconds', config.requestPeriodSeconds);
  requirePositive('costLimit', config.costLimit);
  requirePositive('costPeriodSeconds', config.costPeriodSeconds);
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new ConfigValidationError(
      'maxAttempts',
      `must be an integer >= 1, got ${config.maxAttempts}`
    );
  }
  requireNonNegative('cooldownMs', config.cooldownMs);
  requireNonNegative('loopSleepMs', config.loopSleepMs);
  validateRequestUrl(config.requestUrl);

  if (config.resultsFile === config.requestsFile) {
    throw new ConfigValidationError('resultsFile', 'must differ from the requests file');
  }

  if (config.costEstimator === 'openai') {
    if (endpointFromUrl(config.requestUrl) === undefined) {
      throw new ConfigValidationError(
        'requestUrl',
        `the openai cost estimator needs a versioned URL such as https://host/v1/embeddings, got ${config.requestUrl}`
      );
    }
    if (!isSupportedEncoding(config.encoding)) {
      throw new ConfigValidationError(
        'encoding',
        `unsupported encoding "${config.encoding}", expected one of: ${SUPPORTED_ENCODINGS.join(', ')}`
      );
    }
  }

  return config;
}

function stripUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

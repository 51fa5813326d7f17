/**
 * OpenAI-style cost estimation
 *
 * Counts the tokens a request will consume, following how the provider
 * accounts for completions, chat completions and embeddings. Text is
 * tokenized with the configured encoding.
 */

import { getEncoding } from 'js-tiktoken';
import type { Tiktoken } from 'js-tiktoken';
import type { RequestPayload } from '../../shared/types/index.js';
import { isRecord } from '../../utils/guards.js';
import type { CostContext, CostEstimator } from './cost-estimator.js';

/** Encodings the estimator recognises */
export const SUPPORTED_ENCODINGS = ['cl100k_base'] as const;

export type SupportedEncoding = (typeof SUPPORTED_ENCODINGS)[number];

export const DEFAULT_ENCODING: SupportedEncoding = 'cl100k_base';

const DEFAULT_MAX_TOKENS = 15;
const DEFAULT_N = 1;
/** Every message is wrapped as <im_start>{role/name}\n{content}<im_end>\n */
const TOKENS_PER_MESSAGE = 4;
/** Every reply is primed with <im_start>assistant */
const TOKENS_PER_REPLY = 2;

/**
 * Error thrown for endpoints the estimator has no accounting for
 */
export class UnsupportedEndpointError extends Error {
  constructor(public readonly endpoint: string) {
    super(`API endpoint "${endpoint}" is not supported by the openai cost estimator`);
    this.name = 'UnsupportedEndpointError';
  }
}

export function isSupportedEncoding(value: string): value is SupportedEncoding {
  return (SUPPORTED_ENCODINGS as readonly string[]).includes(value);
}

/**
 * Extract the endpoint path from a versioned API URL
 *
 * @example
 * endpointFromUrl('https://api.openai.com/v1/chat/completions') // 'chat/completions'
 *
 * @returns the endpoint, or undefined if the URL has no /v<digits>/ segment
 */
export function endpointFromUrl(url: string): string | undefined {
  const match = /^https?:\/\/[^/]+\/v\d+\/(.+)$/.exec(url);
  return match?.[1];
}

const encoders = new Map<SupportedEncoding, Tiktoken>();

function encoderFor(encoding: string): Tiktoken {
  if (!isSupportedEncoding(encoding)) {
    throw new Error(
      `Unsupported token encoding "${encoding}", expected one of: ${SUPPORTED_ENCODINGS.join(', ')}`
    );
  }
  let encoder = encoders.get(encoding);
  if (!encoder) {
    encoder = getEncoding(encoding);
    encoders.set(encoding, encoder);
  }
  return encoder;
}

/**
 * Number of tokens in `text`. Special-token markup such as <|endoftext|>
 * in request text is counted as ordinary text.
 */
export function countTextTokens(text: string, encoding: string = DEFAULT_ENCODING): number {
  if (text === '') return 0;
  return encoderFor(encoding).encode(text, [], []).length;
}

function readCount(payload: RequestPayload, key: string, fallback: number): number {
  const value = payload[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new TypeError(`Expecting a non-negative number for "${key}"`);
  }
  return value;
}

function countTextOrList(
  value: unknown,
  field: string,
  encoding: string
): { tokens: number; items: number } {
  if (typeof value === 'string') {
    return { tokens: countTextTokens(value, encoding), items: 1 };
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return {
      tokens: value.reduce((sum, item) => sum + countTextTokens(item, encoding), 0),
      items: value.length,
    };
  }
  throw new TypeError(`Expecting either string or list of strings for "${field}"`);
}

function countChatTokens(payload: RequestPayload, encoding: string): number {
  const messages = payload.messages;
  if (!Array.isArray(messages)) {
    throw new TypeError('Expecting a list of messages for "messages"');
  }

  let tokens = 0;
  for (const message of messages) {
    if (!isRecord(message)) {
      throw new TypeError('Expecting every chat message to be an object');
    }
    tokens += TOKENS_PER_MESSAGE;
    for (const [key, value] of Object.entries(message)) {
      tokens += countTextTokens(typeof value === 'string' ? value : JSON.stringify(value), encoding);
      // The role is omitted when a name is present
      if (key === 'name') tokens -= 1;
    }
  }
  return tokens + TOKENS_PER_REPLY;
}

function estimateCompletionTokens(payload: RequestPayload, context: CostContext): number {
  const { endpoint, encoding } = context;
  const completionTokens =
    readCount(payload, 'n', DEFAULT_N) * readCount(payload, 'max_tokens', DEFAULT_MAX_TOKENS);

  if (endpoint.startsWith('chat/')) {
    return countChatTokens(payload, encoding) + completionTokens;
  }

  const prompt = countTextOrList(payload.prompt, 'prompt', encoding);
  return prompt.tokens + completionTokens * prompt.items;
}

/**
 * Token estimate for OpenAI-style completion, chat and embedding requests
 *
 * @throws UnsupportedEndpointError for other endpoints
 * @throws TypeError when the fields it counts have the wrong shape
 * @throws Error for an encoding other than SUPPORTED_ENCODINGS
 */
export const estimateOpenAiTokens: CostEstimator = (
  payload: RequestPayload,
  context: CostContext
): number => {
  const { endpoint } = context;
  if (endpoint.endsWith('completions')) {
    return estimateCompletionTokens(payload, context);
  }
  if (endpoint === 'embeddings') {
    return countTextOrList(payload.input, 'input', context.encoding).tokens;
  }
  throw new UnsupportedEndpointError(endpoint);
};

/**
 * batch-requests command line
 *
 * Usage:
 *   batch-requests --requests-file data/requests.jsonl --max-requests 1500 --max-cost 125000
 *   batch-requests --create-requests-file data/requests.jsonl --count 100
 *
 * Prints one JSON line to stdout when done. Fatal errors are printed as one
 * JSON error line to stderr (with a stack trace when DEBUG=1 or DEBUG=true).
 *
 * Exit codes: 0 done, dry run or help; 1 the run failed; 2 invalid arguments.
 */

import { parseArgs } from 'node:util';
import { ConfigValidationError } from '../config/index.js';
import type { ProcessorConfigInput } from '../config/index.js';
import { setLogLevel } from '../logging/index.js';
import { InvalidCostError } from '../services/admission-loop/index.js';
import { MalformedInputError } from '../services/job-source/index.js';
import { processRequestsFile } from '../services/request-processor/index.js';
import type { RequestProcessorDependencies } from '../services/request-processor/index.js';
import { createExampleRequestsFile } from '../utils/example-requests/index.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: batch-requests --requests-file <path> [options]
       batch-requests --create-requests-file <path> [--count <n>]

Options:
  --requests-file <path>         newline-delimited JSON requests, one per line
  --save-file <path>             results file (default: <requests>_results.jsonl)
  --request-url <url>            endpoint to POST to (default: https://api.openai.com/v1/embeddings)
  --api-key <key>                bearer token (default: $BATCH_REQUESTS_API_KEY, then $OPENAI_API_KEY)
  --preset <chat|embeddings>     provider limits at 75% headroom
  --max-requests <n>             requests per request period
  --request-period <seconds>     request period (default: 60)
  --max-cost <n>                 cost units (tokens) per cost period
  --cost-period <seconds>        cost period (default: 60)
  --max-attempts <n>             attempts per request (default: 5)
  --cooldown <seconds>           pause after a rate-limit error (default: 15)
  --cost-estimator <none|openai> cost function (default: openai)
  --token-encoding <name>        token encoding (default: cl100k_base)
  --rate-limit-signature <text>  error message text that marks a rate limit (default: "Rate limit")
  --log-level <level>            trace, debug, info, warn, error, fatal or silent
  --dry-run                      validate settings and files, send nothing
  --create-requests-file <path>  write an example requests file and exit
  --count <n>                    requests in the example file (default: 10000)
  -h, --help                     show this help
`;

/**
 * Error thrown for arguments that cannot be parsed
 */
export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
};

const OPTIONS = {
  'requests-file': { type: 'string' },
  'save-file': { type: 'string' },
  'request-url': { type: 'string' },
  'api-key': { type: 'string' },
  preset: { type: 'string' },
  'max-requests': { type: 'string' },
  'request-period': { type: 'string' },
  'max-cost': { type: 'string' },
  'cost-period': { type: 'string' },
  'max-attempts': { type: 'string' },
  cooldown: { type: 'string' },
  'cost-estimator': { type: 'string' },
  'token-encoding': { type: 'string' },
  'rate-limit-signature': { type: 'string' },
  'log-level': { type: 'string' },
  'dry-run': { type: 'boolean' },
  'create-requests-file': { type: 'string' },
  count: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new CliArgumentError(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (error) {
    throw new CliArgumentError(error instanceof Error ? error.message : String(error));
  }
}

type CliValues = ReturnType<typeof parseCliArgs>;

/**
 * Map parsed flags onto processor settings
 */
export function toConfigInput(values: CliValues): ProcessorConfigInput {
  const requestsFile = values['requests-file'];
  if (!requestsFile) {
    throw new CliArgumentError('--requests-file is required');
  }
  const cooldownSeconds = parseNumber('cooldown', values.cooldown);

  return {
    requestsFile,
    resultsFile: values['save-file'],
    requestUrl: values['request-url'],
    apiKey: values['api-key'],
    preset: values.preset,
    requestLimit: parseNumber('max-requests', values['max-requests']),
    requestPeriodSeconds: parseNumber('request-period', values['request-period']),
    costLimit: parseNumber('max-cost', values['max-cost']),
    costPeriodSeconds: parseNumber('cost-period', values['cost-period']),
    maxAttempts: parseNumber('max-attempts', values['max-attempts']),
    cooldownMs: cooldownSeconds === undefined ? undefined : cooldownSeconds * 1000,
    costEstimator: values['cost-estimator'],
    encoding: values['token-encoding'],
    rateLimitSignature: values['rate-limit-signature'],
    dryRun: values['dry-run'],
  };
}

function isDebug(env: NodeJS.ProcessEnv): boolean {
  const debug = env['DEBUG']?.toLowerCase();
  return debug === '1' || debug === 'true';
}

/**
 * One-line JSON description of a fatal error
 */
export function errorEnvelope(error: unknown, env: NodeJS.ProcessEnv): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { event: 'error', name: 'Error', message: String(error) };
  }

  const envelope: Record<string, unknown> = {
    event: 'error',
    name: error.name,
    message: error.message,
  };
  if (error instanceof MalformedInputError) {
    envelope.path = error.source;
    envelope.line = error.lineNumber;
  } else if (error instanceof InvalidCostError) {
    envelope.line = error.lineNumber;
  } else if ('path' in error && typeof error.path === 'string') {
    envelope.path = error.path;
  }
  if (isDebug(env) && error.stack) {
    envelope.stack = error.stack;
  }
  return envelope;
}

function exitCodeFor(error: unknown): number {
  return error instanceof CliArgumentError || error instanceof ConfigValidationError
    ? EXIT_USAGE
    : EXIT_FAILURE;
}

/**
 * Run the command
 *
 * @returns process exit code
 */
export async function runCli(
  argv: string[],
  io: CliIo = defaultIo,
  dependencies: Omit<RequestProcessorDependencies, 'env'> = {}
): Promise<number> {
  try {
    const values = parseCliArgs(argv);

    if (values.help) {
      io.stdout(USAGE);
      return EXIT_OK;
    }

    if (values['log-level'] !== undefined) {
      try {
        setLogLevel(values['log-level']);
      } catch (error) {
        throw new CliArgumentError(error instanceof Error ? error.message : String(error));
      }
    }

    const examplePath = values['create-requests-file'];
    if (examplePath !== undefined) {
      const written = await createExampleRequestsFile(examplePath, {
        count: parseNumber('count', values.count),
      });
      io.stdout(`${JSON.stringify({ event: 'requests_file_created', path: examplePath, count: written })}\n`);
      return EXIT_OK;
    }

    const result = await processRequestsFile(toConfigInput(values), {
      ...dependencies,
      env: io.env,
    });

    const report = result.dryRun
      ? {
          event: 'dry_run',
          requestsFile: result.config.requestsFile,
          resultsFile: result.config.resultsFile,
        }
      : { event: 'run_complete', ...result };
    io.stdout(`${JSON.stringify(report)}\n`);
    return EXIT_OK;
  } catch (error) {
    io.stderr(`${JSON.stringify(errorEnvelope(error, io.env))}\n`);
    return exitCodeFor(error);
  }
}

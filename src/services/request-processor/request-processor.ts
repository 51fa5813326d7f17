/**
 * RequestProcessor
 *
 * Runs a whole batch: checks the files, wires the run's components,
 * drives the admission loop to completion and reports the outcome.
 *
 * The results file is created fresh for every run. When any job failed it
 * is renamed to `<name>_with_errors.jsonl` (numbered if that name is taken)
 * so a partly failed run is easy to spot.
 */

import { rename } from 'node:fs/promises';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { HttpTransport } from '../../clients/http-transport/index.js';
import type { RequestTransport } from '../../clients/http-transport/index.js';
import { buildRequestHeaders, resolveProcessorConfig } from '../../config/index.js';
import type { ProcessorConfig, ProcessorConfigInput } from '../../config/index.js';
import { systemClock } from '../../utils/clock/index.js';
import type { Clock } from '../../utils/clock/index.js';
import { nonDuplicatePath, pathExists, withSuffix } from '../../utils/file-paths/index.js';
import { RateBucket } from '../../utils/rate-bucket/index.js';
import { AdmissionLoop } from '../admission-loop/index.js';
import { endpointFromUrl, getCostEstimator } from '../cost-estimator/index.js';
import { Dispatcher } from '../dispatcher/index.js';
import { JsonlJobSource } from '../job-source/index.js';
import { OutputAlreadyExistsError, ResultLog } from '../result-log/index.js';
import { RetryQueue } from '../retry-queue/index.js';
import { StatusTracker } from '../status-tracker/index.js';
import type { StatusSnapshot } from '../status-tracker/index.js';

export const WITH_ERRORS_SUFFIX = '_with_errors';

/**
 * Error thrown when the requests file does not exist
 */
export class InputFileNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Requests file ${path} not found`);
    this.name = 'InputFileNotFoundError';
  }
}

export interface RequestProcessorDependencies {
  /**
   * @default new HttpTransport()
   */
  transport?: RequestTransport;

  /**
   * @default systemClock
   */
  clock?: Clock;

  /**
   * Environment for credential lookup
   * @default process.env
   */
  env?: NodeJS.ProcessEnv;
}

export interface DryRunResult {
  dryRun: true;
  config: ProcessorConfig;
}

export interface RunSummary {
  dryRun: false;
  requestsFile: string;
  /** Final location of the results, after any `_with_errors` rename */
  resultsFile: string;
  status: StatusSnapshot;
  elapsedMs: number;
}

export type ProcessResult = DryRunResult | RunSummary;

/**
 * Process every request in `input.requestsFile`
 *
 * @throws ConfigValidationError for invalid settings
 * @throws InputFileNotFoundError when the requests file is missing
 * @throws OutputAlreadyExistsError when the results file exists
 * @throws MalformedInputError, InvalidCostError, or a result-log write
 *   error, which abort the run
 */
export async function processRequestsFile(
  input: ProcessorConfigInput,
  dependencies: RequestProcessorDependencies = {}
): Promise<ProcessResult> {
  const logger = createServiceLogger('RequestProcessor');
  const config = resolveProcessorConfig(input, dependencies.env);
  log.methodEntry(logger, 'processRequestsFile', {
    requestsFile: config.requestsFile,
    resultsFile: config.resultsFile,
    dryRun: config.dryRun,
  });

  if (!(await pathExists(config.requestsFile))) {
    throw new InputFileNotFoundError(config.requestsFile);
  }
  if (await pathExists(config.resultsFile)) {
    throw new OutputAlreadyExistsError(config.resultsFile);
  }

  if (config.dryRun) {
    logger.info(
      { requestsFile: config.requestsFile, resultsFile: config.resultsFile },
      'Dry run: configuration and files are valid, no requests sent'
    );
    return { dryRun: true, config };
  }

  const clock = dependencies.clock ?? systemClock;
  const startedAt = clock.now();
  const resultLog = await ResultLog.open(config.resultsFile);
  const source = JsonlJobSource.fromFile(config.requestsFile);

  let status: StatusSnapshot;
  try {
    status = await runBatch(config, {
      source,
      resultLog,
      clock,
      transport: dependencies.transport ?? new HttpTransport(),
    });
  } catch (error) {
    await closeAfterFailure(logger, { source, resultLog });
    throw error;
  }
  await source.close();
  await resultLog.close();

  const elapsedMs = clock.now() - startedAt;
  const resultsFile = await reportOutcome(logger, config.resultsFile, status);

  const summary: RunSummary = {
    dryRun: false,
    requestsFile: config.requestsFile,
    resultsFile,
    status,
    elapsedMs,
  };
  log.runSummary(logger, { ...summary });
  return summary;
}

async function runBatch(
  config: ProcessorConfig,
  parts: {
    source: JsonlJobSource;
    resultLog: ResultLog;
    clock: Clock;
    transport: RequestTransport;
  }
): Promise<StatusSnapshot> {
  const { source, resultLog, clock, transport } = parts;
  const statusTracker = new StatusTracker();
  const retryQueue = new RetryQueue();

  const dispatcher = new Dispatcher(
    { transport, resultSink: resultLog, retryQueue, statusTracker, clock },
    {
      requestUrl: config.requestUrl,
      headers: buildRequestHeaders(config.apiKey),
      rateLimitSignature: config.rateLimitSignature,
    }
  );

  const loop = new AdmissionLoop(
    {
      source,
      retryQueue,
      requestBucket: new RateBucket({
        name: 'requests',
        limit: config.requestLimit,
        periodSeconds: config.requestPeriodSeconds,
        now: clock.now(),
      }),
      costBucket: new RateBucket({
        name: 'cost',
        limit: config.costLimit,
        periodSeconds: config.costPeriodSeconds,
        now: clock.now(),
      }),
      dispatcher,
      statusTracker,
      costEstimator: getCostEstimator(config.costEstimator),
      costContext: {
        endpoint: endpointFromUrl(config.requestUrl) ?? '',
        encoding: config.encoding,
      },
      clock,
    },
    {
      maxAttempts: config.maxAttempts,
      cooldownMs: config.cooldownMs,
      loopSleepMs: config.loopSleepMs,
    }
  );

  return loop.run();
}

/**
 * Release the run's files after it failed. Close errors are logged, the
 * run's own error is the one reported.
 */
async function closeAfterFailure(
  logger: ServiceLogger,
  resources: Record<string, { close(): Promise<void> }>
): Promise<void> {
  for (const [name, resource] of Object.entries(resources)) {
    try {
      await resource.close();
    } catch (closeError) {
      logger.warn(
        { resource: name, error: closeError instanceof Error ? closeError.message : String(closeError) },
        `Failed to close ${name} after the run failed`
      );
    }
  }
}

/**
 * Log the outcome and move the results aside when something failed
 *
 * @returns final path of the results file
 */
async function reportOutcome(
  logger: ServiceLogger,
  resultsFile: string,
  status: StatusSnapshot
): Promise<string> {
  if (status.rateLimitErrors > 0) {
    logger.warn(
      { rateLimitErrors: status.rateLimitErrors },
      `${status.rateLimitErrors} rate limit errors received. Consider running at a lower rate.`
    );
  }

  if (status.failed === 0) {
    logger.info({ resultsFile }, `Processing complete. Results saved to ${resultsFile}`);
    return resultsFile;
  }

  const target = await nonDuplicatePath(withSuffix(resultsFile, WITH_ERRORS_SUFFIX));
  await rename(resultsFile, target);
  logger.warn(
    { failed: status.failed, started: status.started, resultsFile: target },
    `${status.failed} / ${status.started} requests failed. Results saved to ${target}`
  );
  return target;
}

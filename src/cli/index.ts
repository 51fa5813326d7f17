/**
 * CLI exports
 */

export {
  runCli,
  toConfigInput,
  errorEnvelope,
  CliArgumentError,
  USAGE,
  EXIT_OK,
  EXIT_FAILURE,
  EXIT_USAGE,
  type CliIo,
} from './process-requests.js';

export {
  createExampleRequestsFile,
  exampleRequestLines,
  RequestsFileExistsError,
  DEFAULT_EXAMPLE_COUNT,
  DEFAULT_EXAMPLE_MODEL,
  type ExampleRequestsOptions,
} from './example-requests.js';

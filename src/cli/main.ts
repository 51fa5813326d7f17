#!/usr/bin/env node
/**
 * batch-requests entry point
 */

import { runCli } from './process-requests.js';

process.exitCode = await runCli(process.argv.slice(2));

#!/usr/bin/env node
/**
 * @fileoverview answer-gate CLI
 *
 * Commands:
 *   answer-gate detect             - Score a response and print the verdict
 *   answer-gate validate           - Score a response and consult the remediation store
 *   answer-gate remediation <sub>  - List, show, add and answer remediation entries
 *
 * @packageDocumentation
 */

import { runCli } from './run.js';
import { formatError } from './errors.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 1;
  });

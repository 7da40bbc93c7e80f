#!/usr/bin/env node
import { runCli } from './src/cli.js';
import { log } from './src/server/logging.js';

runCli(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        log('error', 'Fatal error', {
            error: String(error),
            stack: error instanceof Error ? error.stack : undefined
        });
        process.exitCode = 1;
    });

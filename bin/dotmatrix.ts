#!/usr/bin/env node

import { readFileSync, writeFileSync } from 'fs';

import { runCli } from '../src/cli/main';

const abortController = new AbortController();
process.once('SIGINT', () => abortController.abort());

runCli(
    process.argv.slice(2),
    {
        print: (message) => console.log(message),
        write: (text) => process.stdout.write(text),
        readFile: (path) => readFileSync(path),
        writeFile: (path, data) => writeFileSync(path, data),
    },
    abortController.signal
).then(
    (exitCode) => (process.exitCode = exitCode),
    (e) => {
        console.error(e);
        process.exitCode = 2;
    }
);

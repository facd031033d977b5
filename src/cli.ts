#!/usr/bin/env node
import { run, stdoutErrorHandler } from './program.js';

const err = (text: string) => {
  process.stderr.write(text);
};

process.stdout.on('error', stdoutErrorHandler(err));

await run(process.argv, {
  cwd: process.cwd(),
  out: (text) => {
    process.stdout.write(text);
  },
  err,
});

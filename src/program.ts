import { Command, CommanderError } from 'commander';
import chalk, { Chalk } from 'chalk';
import { VERSION } from './constants.js';
import { reportSessionCache } from './report.js';

type CliOptions = {
  color: boolean; // false with --no-color
};

export type CliIo = {
  cwd: string;
  out: (text: string) => void;
  err: (text: string) => void;
};

// raised once the reader has closed the pipe
const CLOSED_STREAM_CODES = new Set(['EPIPE', 'ERR_STREAM_DESTROYED']);

export const stdoutErrorHandler =
  (err: (text: string) => void) =>
  (error: NodeJS.ErrnoException): void => {
    if (error.code && CLOSED_STREAM_CODES.has(error.code)) return;
    err(`${error.message}\n`);
  };

const buildProgram = (io: CliIo): Command =>
  new Command()
    .name('session-cache-report')
    .description('Show the cached session context of the current project')
    .version(VERSION)
    .option('--no-color', 'disable colored output')
    .configureOutput({ writeOut: io.out, writeErr: io.err })
    .exitOverride();

// Never rejects and never touches the exit status: failures are reported, not signalled.
export async function run(argv: string[], io: CliIo): Promise<void> {
  try {
    const program = buildProgram(io);
    try {
      program.parse(argv);
    } catch (err) {
      // commander has already printed help, version or the usage error
      if (err instanceof CommanderError) return;
      throw err;
    }
    const opts = program.opts<CliOptions>();
    const style = opts.color ? chalk : new Chalk({ level: 0 });

    await reportSessionCache({ cwd: io.cwd, style, write: (line) => io.out(line + '\n') });
  } catch (err) {
    io.err(`${err instanceof Error ? err.message : String(err)}\n`);
  }
}

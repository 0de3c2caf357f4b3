/* eslint-disable no-console */

export type LogSink = (line: string) => void;

export type Logger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type LoggerOptions = {
  sink?: LogSink;
  // drops info lines; warnings and errors still go out
  quiet?: boolean;
};

export const LOG_PREFIX = "[sales-report]";

export function createLogger(opts: LoggerOptions = {}): Logger {
  const sink: LogSink = opts.sink ?? ((line) => console.error(line));

  return {
    info: (msg) => {
      if (!opts.quiet) sink(`${LOG_PREFIX} ${msg}`);
    },
    warn: (msg) => sink(`${LOG_PREFIX} warning: ${msg}`),
    error: (msg) => sink(`${LOG_PREFIX} ${msg}`),
  };
}

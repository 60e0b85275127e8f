/**
 * FILE PURPOSE: Line logger used across the pipeline
 *
 * HOW: `LEVEL: message` lines on stderr, same format as the worker and
 *      scripts. Components take a LogSink so tests can capture lines.
 */

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export type LogSink = (level: LogLevel, message: string) => void;

export const stderrLog: LogSink = (level, message) => {
  process.stderr.write(`${level}: ${message}\n`);
};

/** Sink that drops everything. */
export const silentLog: LogSink = () => {};

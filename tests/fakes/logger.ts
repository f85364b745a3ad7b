import { ComponentLogger, type LoggerConfig } from '../../src/shared/logging/logger';
import type { LogSink } from '../../src/shared/logging/logFile';

export type CapturedEntry = {
  level: string;
  message: string;
  context: Record<string, unknown>;
};

function toEntry(line: string): CapturedEntry {
  const parsed: unknown = JSON.parse(line);
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`unexpected log line: ${line}`);
  }
  const record = new Map(Object.entries(parsed));
  const context = record.get('context');
  return {
    level: String(record.get('level')),
    message: String(record.get('message')),
    context:
      typeof context === 'object' && context !== null ? Object.fromEntries(Object.entries(context)) : {},
  };
}

/**
 * Logger whose JSON lines land in memory (through the file sink, so
 * nothing reaches the console).
 */
export function createCapturingLogger(scope = 'Test'): {
  log: ComponentLogger;
  entries: () => CapturedEntry[];
} {
  const lines: string[] = [];
  const sink: LogSink = { write: (line) => lines.push(line) };
  const config: LoggerConfig = {
    level: 'none',
    json: true,
    stdout: process.stdout,
    stderr: process.stderr,
    file: sink,
    fileLevel: 'spam',
  };
  return {
    log: new ComponentLogger(config, [scope]),
    entries: () => lines.map(toEntry),
  };
}

import type { ReportLogger } from '../lib/owners/index.js';

export enum Verbosity {
  Quiet = 0,
  Normal = 1,
  Verbose = 2,
}

let level = Verbosity.Normal;

export function setVerbosity(newLevel: Verbosity): void {
  level = newLevel;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * glog-style prefix: I1019 18:55:01.123]
 */
export function formatLine(severity: 'I' | 'W' | 'E', message: string, now: Date = new Date()): string {
  const date = `${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;
  return `${severity}${date} ${time}] ${message}`;
}

// stdout is reserved for documents, every log line goes to stderr
export const log = {
  info(message: string): void {
    if (level >= Verbosity.Normal) {
      console.error(formatLine('I', message));
    }
  },
  warn(message: string): void {
    if (level >= Verbosity.Normal) {
      console.error(formatLine('W', message));
    }
  },
  error(message: string): void {
    console.error(formatLine('E', message));
  },
  verbose(message: string): void {
    if (level >= Verbosity.Verbose) {
      console.error(formatLine('I', message));
    }
  },
} satisfies ReportLogger & { error(message: string): void };

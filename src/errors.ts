export const CHART_ERROR_CODES = {
  COLLECTOR_FAILED: 'COLLECTOR_FAILED',
  PARSE_FAILED:     'PARSE_FAILED',
  CONFIG_INVALID:   'CONFIG_INVALID',
} as const;

export type ChartErrorCode = typeof CHART_ERROR_CODES[keyof typeof CHART_ERROR_CODES];

/**
 * Base class for every failure that aborts a chart request.
 * None of these are retried: the CLI reports the message and exits 1.
 */
export class ChartError extends Error {
  constructor(readonly code: ChartErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** git could not be started or exited non-zero. */
export class CollectorError extends ChartError {
  constructor(readonly command: string, readonly stderr: string, options?: { cause?: unknown }) {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
    super(CHART_ERROR_CODES.COLLECTOR_FAILED, `${command} failed${detail}`, options);
  }
}

/** A line from git does not have the shape the chart expects. */
export class ParseError extends ChartError {
  constructor(readonly lineNumber: number, readonly line: string, reason: string) {
    super(CHART_ERROR_CODES.PARSE_FAILED, `line ${lineNumber}: ${reason}: "${line}"`);
  }
}

export class ConfigError extends ChartError {
  constructor(message: string) {
    super(CHART_ERROR_CODES.CONFIG_INVALID, message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Output Formats - machine-readable audit results for the CLI
// Supports: JSON summary

import type { AuditRun } from '../pipeline/index.js';
import type { DispatchOutcome, Violation } from '../types/audit.js';

// ============ JSON Summary ============

export interface JSONSummary {
  audit: {
    timestamp: string;
    count: number;
    statusCode: number;
    message: string;
  };
  violations: Violation[];
  dispatch: DispatchOutcome;
}

export function toJSONSummary(run: AuditRun): JSONSummary {
  return {
    audit: {
      timestamp: run.result.timestamp,
      count: run.result.count,
      statusCode: run.response.statusCode,
      message: run.response.body,
    },
    violations: run.result.violations,
    dispatch: run.dispatch,
  };
}

// ============ Log Routing ============

/**
 * Runs `task` with console.log writing to stderr, so that stdout carries
 * only the machine-readable result.
 */
export async function withLogsOnStderr<T>(task: () => Promise<T>): Promise<T> {
  const log = console.log;
  console.log = console.error;
  try {
    return await task();
  } finally {
    console.log = log;
  }
}

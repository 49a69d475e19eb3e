import { DebloatError, errorMessage } from './Errors';
import type { DebloatResult } from './DebloatPipeline';

export function formatReport(result: DebloatResult): string {
  return [
    '=== Code Metrics ===',
    `Original LOC: ${result.originalLoc}`,
    `New LOC:      ${result.newLoc}`,
    `Reduction:    ${result.reductionPct.toFixed(2)}%`,
    `Backup saved: ${result.backupPath}`,
    '====================',
  ].join('\n');
}

export function formatError(error: unknown): string {
  if (error instanceof DebloatError) {
    return `Error [${error.stage}]: ${error.message}`;
  }
  return `Error: ${errorMessage(error)}`;
}

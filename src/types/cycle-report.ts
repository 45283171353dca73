/**
 * Feedkeeper — Cycle Report Types
 */

import type { ReportError } from '../lib/errors';
import type { TimestampDowngrade } from './feed-item';

export type CycleOutcome = 'success' | 'not_modified' | 'failed';

export interface CycleCounts {
  /** Entries found in the document (parsed + skipped) */
  fetched: number;
  /** Entries the parser could read */
  parsed: number;
  /** Entries the parser had to drop */
  skipped: number;
  /** Items emitted to the sink */
  new: number;
  /** Items already marked seen */
  duplicate: number;
  /** Entries lost to parse, normalize, emit or mark failures */
  failed: number;
}

export interface CycleReport {
  cycleId: string;
  feedId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  outcome: CycleOutcome;
  counts: CycleCounts;
  /** HTTP attempts made by the fetcher */
  attempts: number;
  httpStatus?: number;
  bytes: number;
  downgrades: TimestampDowngrade[];
  error?: ReportError;
  /** Set when the failure must halt the whole process */
  fatal: boolean;
}

export type SkipReason = 'overlap' | 'disabled' | 'stopping';

export interface SkipEvent {
  feedId: string;
  at: string;
  reason: SkipReason;
}

export function emptyCounts(): CycleCounts {
  return { fetched: 0, parsed: 0, skipped: 0, new: 0, duplicate: 0, failed: 0 };
}

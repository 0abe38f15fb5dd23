/**
 * @fileoverview Signal aggregation: checklist, passing count and verdict.
 */

import { SIGNAL_LABELS, SIGNAL_NAMES } from '@signalcheck/contracts';
import type { ChecklistEntry, SignalMap, Verdict } from '@signalcheck/contracts';

/** Minimum passing signals per verdict */
export const VERDICT_THRESHOLDS = {
  strong: 5,
  neutral: 3,
} as const;

export const VERDICT_LABELS: Readonly<Record<Verdict, string>> = {
  strong: 'STRONG BUY SIGNAL',
  neutral: 'NEUTRAL SIGNAL',
  avoid: 'AVOID TRADE',
};

/**
 * Checklist entries in display order.
 */
export function buildChecklist(signals: SignalMap): ChecklistEntry[] {
  return SIGNAL_NAMES.map((name) => ({
    name,
    label: SIGNAL_LABELS[name],
    passed: signals[name],
  }));
}

export function countPassing(signals: SignalMap): number {
  return SIGNAL_NAMES.filter((name) => signals[name]).length;
}

export function classifyVerdict(passingCount: number): Verdict {
  if (passingCount >= VERDICT_THRESHOLDS.strong) {
    return 'strong';
  }
  if (passingCount >= VERDICT_THRESHOLDS.neutral) {
    return 'neutral';
  }
  return 'avoid';
}

/**
 * FILE PURPOSE: Safety policy: what the unsafe score does to a queued item
 *
 * WHY: The score is recorded on every record. Whether it gates anything is
 *      a deployment decision, so it lives here as named, testable config:
 *
 *   record-only → every item is inserted with approvedStatus (score is informational)
 *   review      → score >= threshold is inserted with reviewStatus instead
 *   reject      → score >= threshold is not inserted at all
 */

export type SafetyMode = 'record-only' | 'review' | 'reject';

export const SAFETY_MODES: readonly SafetyMode[] = ['record-only', 'review', 'reject'];

export interface SafetyPolicy {
  mode: SafetyMode;
  /** Scores at or above this are unsafe for `review` and `reject`. */
  threshold: number;
  approvedStatus: string;
  reviewStatus: string;
}

export const DEFAULT_SAFETY_POLICY: Readonly<SafetyPolicy> = Object.freeze({
  mode: 'record-only',
  threshold: 0.4,
  approvedStatus: 'approved',
  reviewStatus: 'pending',
});

export type PolicyDecision =
  | { action: 'insert'; status: string; heldForReview: boolean }
  | { action: 'reject' };

export function isSafetyMode(value: string): value is SafetyMode {
  return (SAFETY_MODES as readonly string[]).includes(value);
}

export function applySafetyPolicy(unsafeScore: number, policy: SafetyPolicy): PolicyDecision {
  const unsafe = unsafeScore >= policy.threshold;

  switch (policy.mode) {
    case 'record-only':
      return { action: 'insert', status: policy.approvedStatus, heldForReview: false };
    case 'review':
      return unsafe
        ? { action: 'insert', status: policy.reviewStatus, heldForReview: true }
        : { action: 'insert', status: policy.approvedStatus, heldForReview: false };
    case 'reject':
      return unsafe
        ? { action: 'reject' }
        : { action: 'insert', status: policy.approvedStatus, heldForReview: false };
  }
}

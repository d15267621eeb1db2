// src/core/remediation/types.ts
export interface RemediationSummary {
  total: number;
  fixed: number;
  /** Ids removed from the queue because their detail came back empty. */
  dropped: number;
  failed: number;
  duration: number;
  failures: Array<{ id: string; error: string }>;
}

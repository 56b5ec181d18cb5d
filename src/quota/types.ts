export type PlanTier = {
  name: string;
  type: string;
  /** Requests allowed per quota window; `null` means unlimited. */
  limit: number | null;
};

export type Account = {
  token: string;
  active: boolean;
  plan: PlanTier;
};

export type QuotaWindow = {
  windowStart: number;
  count: number;
  limit: number | null;
  remaining: number | null;
  resetAt: number;
};

export type RejectReason = 'Unauthorized' | 'RateLimited';

export type AdmitDecision = {
  admitted: true;
  account: Account;
  window: QuotaWindow;
};

export type RejectDecision = {
  admitted: false;
  reason: RejectReason;
  message: string;
  retryAfterMs?: number;
  window?: QuotaWindow;
};

export type QuotaDecision = AdmitDecision | RejectDecision;

export type UsageIncrement = {
  token: string;
  windowStart: number;
  previousWindowStart: number;
  /** Share of the previous window's requests still charged; 0 for fixed windows. */
  previousWeight: number;
  limit: number | null;
};

export type UsageCounts = {
  admitted: boolean;
  /** Requests recorded in the current window, including this one when admitted. */
  current: number;
  previous: number;
};

/**
 * Counts a request against a window only while the weighted total is below
 * the limit. The check and the increment are one atomic step in the store.
 */
export interface UsageCounter {
  incrementUsage(increment: UsageIncrement): Promise<UsageCounts>;
}

export interface AccountStore extends UsageCounter {
  readonly name: string;
  loadAccount(token: string): Promise<Account | null>;
}

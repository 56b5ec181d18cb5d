import { CoalescingCache } from '../cache/coalescingCache';
import { systemClock, type Clock } from '../lib/clock';
import { ReportServiceError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { LocalUsageCounter, toQuotaWindow, type UsageWindows } from './usageWindows';
import type {
  Account,
  AccountStore,
  AdmitDecision,
  QuotaDecision,
  QuotaWindow,
  RejectDecision,
  UsageCounter,
  UsageCounts,
  UsageIncrement,
} from './types';

type QuotaLedgerOptions = {
  store: AccountStore;
  windows: UsageWindows;
  allowAnonymous?: boolean;
  anonymousLimit?: number;
  accountCacheTtlMs?: number;
  clock?: Clock;
  logger?: Logger;
};

export type QuotaContext = {
  /** Caller address; anonymous requests are counted per client. */
  clientId?: string;
};

type Exhausted = {
  until: number;
  window: QuotaWindow;
};

const ANONYMOUS_PLAN = 'anonymous';

export class QuotaLedger {
  private readonly store: AccountStore;
  private readonly windows: UsageWindows;
  private readonly allowAnonymous: boolean;
  private readonly anonymousLimit: number;
  private readonly accounts: CoalescingCache<Account | null>;
  private readonly anonymousUsage = new LocalUsageCounter();
  // Accounts this process has seen rejected, until their wait runs out. Other
  // workers only ever add usage, so these can be turned away without the store.
  private readonly exhausted = new Map<string, Exhausted>();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: QuotaLedgerOptions) {
    this.store = options.store;
    this.windows = options.windows;
    this.allowAnonymous = options.allowAnonymous ?? false;
    this.anonymousLimit = options.anonymousLimit ?? 30;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? console;
    this.accounts = new CoalescingCache<Account | null>({
      ttlMs: options.accountCacheTtlMs ?? 60_000,
      clock: this.clock,
    });
  }

  get policy() {
    return this.windows.policy;
  }

  /**
   * Looks up the account behind a token and charges one request to its
   * current window. The limit check and the increment happen together inside
   * the usage store, so concurrent requests, in this process or another one
   * sharing the store, never push an account past its limit.
   */
  async checkAndIncrement(
    token: string | null | undefined,
    context: QuotaContext = {},
  ): Promise<QuotaDecision> {
    const trimmed = token?.trim();

    let account: Account | null;
    let counter: UsageCounter;
    if (!trimmed) {
      if (!this.allowAnonymous) {
        return { admitted: false, reason: 'Unauthorized', message: 'No API token was provided' };
      }

      account = this.anonymousAccount(context.clientId);
      counter = this.anonymousUsage;
    } else {
      account = await this.lookup(trimmed);
      counter = this.store;
    }

    if (!account) {
      return { admitted: false, reason: 'Unauthorized', message: 'API token is not valid' };
    }

    if (!account.active) {
      return { admitted: false, reason: 'Unauthorized', message: 'API token is not active' };
    }

    const now = this.clock();
    const known = this.exhausted.get(account.token);
    if (known && now < known.until) {
      return this.rateLimited(account, known.window, known.until - now);
    }

    const { limit } = account.plan;
    const span = this.windows.span(now);
    const counts = await this.increment(counter, {
      token: account.token,
      windowStart: span.windowStart,
      previousWindowStart: span.previousWindowStart,
      previousWeight: span.previousWeight,
      limit,
    });
    const window = toQuotaWindow(span, counts, limit);

    if (counts.admitted || limit === null) {
      return { admitted: true, account, window };
    }

    const retryAfterMs = this.windows.retryAfter(span, counts, limit, now);
    this.exhausted.set(account.token, { until: now + retryAfterMs, window });
    return this.rateLimited(account, window, retryAfterMs);
  }

  /** Same as `checkAndIncrement`, but rejections are thrown as service errors. */
  async admit(token: string | null | undefined, context: QuotaContext = {}): Promise<AdmitDecision> {
    const decision = await this.checkAndIncrement(token, context);

    if (!decision.admitted) {
      const { window } = decision;
      throw new ReportServiceError(decision.reason, decision.message, {
        retryAfterMs: decision.retryAfterMs,
        details: window
          ? { limit: window.limit, resetAt: new Date(window.resetAt).toISOString() }
          : undefined,
      });
    }

    return decision;
  }

  prune(): number {
    const now = this.clock();
    let removed = 0;

    for (const [token, known] of this.exhausted) {
      if (known.until <= now) {
        this.exhausted.delete(token);
        removed += 1;
      }
    }

    return (
      removed +
      this.anonymousUsage.prune(this.windows.span(now).previousWindowStart) +
      this.accounts.sweep()
    );
  }

  private async lookup(token: string): Promise<Account | null> {
    try {
      const { value } = await this.accounts.getOrFetch(token, () => this.store.loadAccount(token));
      return value;
    } catch (error) {
      this.logger.error(`[Quota] Account lookup failed in ${this.store.name} store`, error);
      throw new ReportServiceError('ServiceUnavailable', 'Account store is unavailable', {
        cause: error,
      });
    }
  }

  private async increment(counter: UsageCounter, increment: UsageIncrement): Promise<UsageCounts> {
    try {
      return await counter.incrementUsage(increment);
    } catch (error) {
      this.logger.error(`[Quota] Usage update failed in ${this.store.name} store`, error);
      throw new ReportServiceError('ServiceUnavailable', 'Account store is unavailable', {
        cause: error,
      });
    }
  }

  private anonymousAccount(clientId: string | undefined): Account {
    return {
      token: `${ANONYMOUS_PLAN}:${clientId ?? 'unknown'}`,
      active: true,
      plan: { name: ANONYMOUS_PLAN, type: 'free', limit: this.anonymousLimit },
    };
  }

  private rateLimited(account: Account, window: QuotaWindow, retryAfterMs: number): RejectDecision {
    return {
      admitted: false,
      reason: 'RateLimited',
      message: `Rate limit of ${account.plan.limit} requests per window exceeded for plan ${account.plan.name}`,
      retryAfterMs,
      window,
    };
  }
}

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { planTierSchema } from './accountStore';
import type { Account, AccountStore, UsageCounts, UsageIncrement } from './types';

const ACCOUNT_COLUMNS = 'token, active, plan:plans(name, type, limit)';

// PostgREST returns an embedded to-one relation as an object, but older
// relationship hints produce a single-element array.
const accountRowSchema = z.object({
  token: z.string(),
  active: z.boolean(),
  plan: z.union([
    planTierSchema,
    z.array(planTierSchema).length(1).transform(([plan]) => plan),
  ]),
});

const usageRowSchema = z.object({
  admitted: z.boolean(),
  current_count: z.number().int(),
  previous_count: z.number().int(),
});

const usageResultSchema = z.union([
  z.array(usageRowSchema).nonempty().transform(([row]) => row),
  usageRowSchema,
]);

const toTimestamp = (epochMs: number) => new Date(epochMs).toISOString();

export class AccountStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AccountStoreError';
  }
}

export class SupabaseAccountStore implements AccountStore {
  readonly name = 'supabase';
  private readonly client: SupabaseClient;

  constructor(client: SupabaseClient) {
    this.client = client;
  }

  async loadAccount(token: string): Promise<Account | null> {
    const { data, error } = await this.client
      .from('accounts')
      .select(ACCOUNT_COLUMNS)
      .eq('token', token)
      .maybeSingle();

    if (error) {
      throw new AccountStoreError(`Account lookup failed: ${error.message}`, { cause: error });
    }

    if (!data) {
      return null;
    }

    const parsed = accountRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new AccountStoreError(
        `Account row has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
      );
    }

    return parsed.data;
  }

  // increment_account_usage locks the (token, window_start) row, so workers
  // sharing the database admit at most `limit` requests per window between them.
  async incrementUsage(increment: UsageIncrement): Promise<UsageCounts> {
    const { data, error } = await this.client.rpc('increment_account_usage', {
      p_token: increment.token,
      p_window_start: toTimestamp(increment.windowStart),
      p_previous_window_start: toTimestamp(increment.previousWindowStart),
      p_previous_weight: increment.previousWeight,
      p_limit: increment.limit,
    });

    if (error) {
      throw new AccountStoreError(`Usage update failed: ${error.message}`, { cause: error });
    }

    const parsed = usageResultSchema.safeParse(data);
    if (!parsed.success) {
      throw new AccountStoreError(
        `Usage update returned an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
      );
    }

    return {
      admitted: parsed.data.admitted,
      current: parsed.data.current_count,
      previous: parsed.data.previous_count,
    };
  }
}

import { readFile } from 'fs/promises';
import path from 'path';

import { z } from 'zod';

import type { Account, AccountStore, UsageCounts, UsageIncrement } from './types';
import { LocalUsageCounter } from './usageWindows';

export const planTierSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1).default('free'),
  limit: z.number().int().min(0).nullable(),
});

const accountSchema = z.object({
  token: z.string().min(1),
  active: z.boolean().default(true),
  plan: planTierSchema,
});

const accountFileSchema = z.object({
  accounts: z.array(accountSchema),
});

/**
 * Account store backed by maps; seeded from a JSON file or directly in tests.
 * Usage is shared by every ledger in the process that holds this store.
 */
export class InMemoryAccountStore implements AccountStore {
  readonly name = 'memory';
  private readonly accounts = new Map<string, Account>();
  private readonly usage = new LocalUsageCounter();

  constructor(accounts: Account[] = []) {
    for (const account of accounts) {
      this.accounts.set(account.token, account);
    }
  }

  static async fromFile(filePath: string): Promise<InMemoryAccountStore> {
    const resolved = path.resolve(process.cwd(), filePath);
    const contents = await readFile(resolved, 'utf8');
    const result = accountFileSchema.safeParse(JSON.parse(contents));

    if (!result.success) {
      throw new Error(`Invalid accounts file ${resolved}: ${result.error.issues[0]?.message ?? 'unknown'}`);
    }

    return new InMemoryAccountStore(result.data.accounts);
  }

  async loadAccount(token: string): Promise<Account | null> {
    return this.accounts.get(token) ?? null;
  }

  async incrementUsage(increment: UsageIncrement): Promise<UsageCounts> {
    return this.usage.incrementUsage(increment);
  }

  usageFor(token: string, windowStart: number): number {
    return this.usage.countFor(token, windowStart);
  }
}

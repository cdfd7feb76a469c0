/**
 * account.ts — Zod schema for account information.
 */

import { z } from 'zod';

export const AccountInfoSchema = z.object({
  // Available balance left in the account, in USD
  accountBalance: z.number(),
});

export type AccountInfo = z.infer<typeof AccountInfoSchema>;

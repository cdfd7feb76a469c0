/**
 * error.ts — Zod schema for the error envelope returned on non-2xx responses.
 *
 * Wire shape: { "error": { type, title, status, detail, instance } }
 * Every field inside `error` may be missing or null. A field of the wrong type
 * decodes as undefined; the rest of the envelope is kept.
 */

import { z } from 'zod';

export const ApiErrorDataSchema = z
  .object({
    type: z.string().nullish().catch(undefined),
    title: z.string().nullish().catch(undefined),
    status: z.number().int().nullish().catch(undefined),
    detail: z.string().nullish().catch(undefined),
    instance: z.string().nullish().catch(undefined),
  })
  .passthrough();

export type ApiErrorData = z.infer<typeof ApiErrorDataSchema>;

export const ApiErrorBodySchema = z.object({
  error: ApiErrorDataSchema,
});

export type ApiErrorBody = z.infer<typeof ApiErrorBodySchema>;

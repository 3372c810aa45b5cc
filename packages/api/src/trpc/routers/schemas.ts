// Shared zod schemas for router inputs
//
// Ownership kind, fee sign and amount range are left to the registry so that
// callers get its INVALID_VARIANT / INVALID_FEE codes rather than a generic
// parse error.

import { z } from 'zod';

export const PageIdSchema = z.number().int();
export const RequestIdSchema = z.number().int().nonnegative();
export const AddressSchema = z.string().min(1);
export const AmountSchema = z.bigint();

export const OwnershipSchema = z.object({
  kind: z.string(),
  owners: z.array(AddressSchema),
  threshold: z.number(),
});

export const FieldUpdateSchema = z.object({
  content: z.string().optional(),
  name: z.string().optional(),
  thumbnail: z.string().optional(),
});

export const PaginationSchema = z.object({
  limit: z.number().int().positive().max(100).optional(),
  offset: z.number().int().nonnegative().optional(),
});

export const PageRefSchema = z.object({ pageId: PageIdSchema });

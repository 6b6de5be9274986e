import { z } from 'zod';

/** Some gateways serialize counts as strings; only digit strings are taken. */
const CountSchema = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/).transform(Number).pipe(z.number().int().nonnegative())
]);

/** Paging block of every API response. */
export const DataContainerSchema = z.object({
  offset: CountSchema,
  limit: CountSchema,
  total: CountSchema,
  count: CountSchema,
  results: z.array(z.unknown())
});

/**
 * Top-level response wrapper. `results` stay `unknown` here; each endpoint
 * validates them against its own result schema.
 */
export const DataWrapperSchema = z
  .object({
    code: z.union([z.number().int(), z.string()]),
    status: z.string(),
    attributionHTML: z.string().default(''),
    data: DataContainerSchema
  })
  .passthrough();

export type DataWrapper = z.infer<typeof DataWrapperSchema>;

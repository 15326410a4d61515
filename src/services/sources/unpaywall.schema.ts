import { z } from 'zod';

const locationSchema = z.object({
  url_for_pdf: z.string().nullish(),
  url: z.string().nullish()
});

export const unpaywallResponseSchema = z
  .object({
    best_oa_location: locationSchema.nullish(),
    oa_locations: z.array(locationSchema.nullable()).nullish()
  })
  .nullish();

export type UnpaywallResponse = z.infer<typeof unpaywallResponseSchema>;

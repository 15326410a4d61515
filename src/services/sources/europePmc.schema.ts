import { z } from 'zod';

const fullTextUrlSchema = z.object({
  url: z.string().nullish(),
  documentStyle: z.string().nullish()
});

export const europePmcResultSchema = z.object({
  title: z.string().nullish(),
  doi: z.string().nullish(),
  journalTitle: z.string().nullish(),
  pubYear: z.coerce.string().nullish(),
  authorString: z.string().nullish(),
  firstAuthor: z.string().nullish(),
  pmcid: z.string().nullish(),
  isOpenAccess: z.string().nullish(),
  fullTextUrlList: z
    .object({
      fullTextUrl: z.array(fullTextUrlSchema.nullable()).nullish()
    })
    .nullish()
});

export type EuropePmcResult = z.infer<typeof europePmcResultSchema>;

export const europePmcResponseSchema = z
  .object({
    resultList: z
      .object({
        result: z.array(z.unknown()).nullish()
      })
      .nullish()
  })
  .nullish();

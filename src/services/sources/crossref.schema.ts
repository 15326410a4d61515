import { z } from 'zod';

const authorSchema = z.object({
  given: z.string().nullish(),
  family: z.string().nullish()
});

const linkSchema = z.object({
  URL: z.string().nullish(),
  'content-type': z.string().nullish()
});

export const crossrefItemSchema = z.object({
  title: z.array(z.string()).nullish(),
  DOI: z.string().nullish(),
  publisher: z.string().nullish(),
  issued: z
    .object({
      'date-parts': z.array(z.array(z.number().nullable()).nullable()).nullish()
    })
    .nullish(),
  author: z.array(authorSchema.nullable()).nullish(),
  link: z.array(linkSchema.nullable()).nullish()
});

export type CrossrefItem = z.infer<typeof crossrefItemSchema>;

export const crossrefResponseSchema = z
  .object({
    message: z
      .object({
        items: z.array(z.unknown()).nullish()
      })
      .nullish()
  })
  .nullish();

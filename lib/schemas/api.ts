import { z } from 'zod';

// Catalog (OpenAlex) payloads. Only the fields the extractor reads are declared.

const nullableCount = z.number().nullish().transform((value) => value ?? 0);

export const catalogAuthorSchema = z.object({
  id: z.string().nullish(),
  orcid: z.string().nullish(),
  display_name: z.string().min(1),
  works_count: nullableCount,
  cited_by_count: nullableCount,
  summary_stats: z
    .object({
      h_index: nullableCount,
      i10_index: nullableCount,
    })
    .nullish(),
  last_known_institutions: z
    .array(z.object({ display_name: z.string().nullish() }))
    .nullish(),
  topics: z
    .array(z.object({ display_name: z.string().nullish(), score: z.number().nullish() }))
    .nullish(),
  x_concepts: z
    .array(
      z.object({
        display_name: z.string().nullish(),
        level: z.number().nullish(),
        score: z.number().nullish(),
      })
    )
    .nullish(),
});

export type CatalogAuthor = z.infer<typeof catalogAuthorSchema>;

export const catalogPageSchema = z.object({
  meta: z.object({ count: z.number().nullish() }).nullish(),
  results: z.array(z.unknown()).default([]),
});

// Registry (ORCID) email endpoint
export const orcidEmailResponseSchema = z.object({
  email: z
    .array(z.object({ email: z.string().nullish() }))
    .nullish(),
});

// Web search (Brave) response
export const searchResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            url: z.string(),
            title: z.string().nullish(),
            description: z.string().nullish(),
          })
        )
        .default([]),
    })
    .nullish(),
});

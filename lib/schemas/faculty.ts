import { z } from 'zod';
import {
  CONFIDENCE_LEVELS,
  DATA_SOURCES,
  EMAIL_METHODS,
  PAGE_TYPES,
  PIPELINE_PHASES,
  type CheckpointSnapshot,
  type DirectoryCache,
  type EmailFact,
  type FacultyRecord,
  type ResearchProfile,
  type WebsiteFact,
} from '../../types/faculty';

export const confidenceSchema = z.enum(CONFIDENCE_LEVELS);

export const emailAddressSchema = z.string().email();

export const researchProfileSchema = z.object({
  topics: z.array(z.object({ name: z.string(), score: z.number() })),
  concepts: z.array(z.object({ name: z.string(), level: z.number().int(), score: z.number() })),
  fields: z.array(z.string()),
  keywords: z.array(z.string()),
  description: z.string().optional(),
}) satisfies z.ZodType<ResearchProfile>;

export const emailFactSchema = z.object({
  value: emailAddressSchema,
  source: z.enum(DATA_SOURCES),
  confidence: confidenceSchema,
  extractedFrom: z.string(),
  extractionMethod: z.enum(EMAIL_METHODS),
  nameMatchScore: z.number().min(0).max(1),
}) satisfies z.ZodType<EmailFact>;

export const websiteFactSchema = z.object({
  value: z.string().url(),
  source: z.enum(DATA_SOURCES),
  confidence: confidenceSchema,
  score: z.number(),
  signals: z.array(z.string()),
  pageType: z.enum(PAGE_TYPES),
}) satisfies z.ZodType<WebsiteFact>;

const count = z.number().int().nonnegative();

export const facultyRecordSchema = z.object({
  name: z.string().min(1, 'Name must not be empty'),
  bibliometricId: z.string().nullable(),
  orcidId: z.string().nullable(),
  institution: z.string(),
  institutionId: z.string(),
  hIndex: count,
  i10Index: count,
  worksCount: count,
  citedByCount: count,
  research: researchProfileSchema,
  email: emailFactSchema.nullable(),
  website: websiteFactSchema.nullable(),
  extractionDate: z.string(),
  needsReview: z.boolean(),
  reviewNotes: z.string(),
}) satisfies z.ZodType<FacultyRecord>;

export const directoryCacheSchema = z.object({
  emails: z.record(z.string()),
  websites: z.record(z.string()),
}) satisfies z.ZodType<DirectoryCache>;

export const checkpointSnapshotSchema = z.object({
  phase: z.enum(PIPELINE_PHASES),
  timestamp: z.string(),
  institution: z.string(),
  records: z.array(facultyRecordSchema),
  extra: z.object({ directoryCache: directoryCacheSchema.optional() }).default({}),
}) satisfies z.ZodType<CheckpointSnapshot, z.ZodTypeDef, unknown>;

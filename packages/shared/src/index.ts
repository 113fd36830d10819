import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export const isJsonObject = (value: JsonValue | undefined): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const recoveryStatusSchema = z.enum(['ok', 'recovered', 'minimal']);

export const issueCategorySchema = z.enum(['Critical', 'Major', 'Minor', 'Observation']);

export const issueStatusSchema = z.enum(['pending', 'approved', 'ignored']);

export const issueRecordSchema = z.object({
  serial_number: z.number().int().min(1),
  category: issueCategorySchema,
  description: z.string().min(1),
  location: z.string().min(1).optional(),
  tags: z.array(z.string().min(1)).optional(),
  reference_standard: z.string().min(1).optional(),
  action_required: z.string().min(1).optional(),
  status: issueStatusSchema
});

export const issueSummarySchema = z.object({
  total_issues: z.number().int().min(0),
  critical_count: z.number().int().min(0),
  major_count: z.number().int().min(0),
  minor_count: z.number().int().min(0),
  observation_count: z.number().int().min(0),
  approved_count: z.number().int().min(0),
  ignored_count: z.number().int().min(0),
  pending_count: z.number().int().min(0)
});

export const chunkMetadataSchema = z
  .object({
    title: z.string().min(1),
    category: z.string().min(1),
    documentId: z.string().min(1),
    chunkIndex: z.number().int().min(0)
  })
  .catchall(z.unknown());

export const embeddingStatusSchema = z.enum(['pending', 'processing', 'completed', 'failed']);

export type RecoveryStatus = z.infer<typeof recoveryStatusSchema>;
export type IssueCategory = z.infer<typeof issueCategorySchema>;
export type IssueStatus = z.infer<typeof issueStatusSchema>;
export type IssueRecord = z.infer<typeof issueRecordSchema>;
export type IssueSummary = z.infer<typeof issueSummarySchema>;
export type ChunkMetadata = z.infer<typeof chunkMetadataSchema>;
export type EmbeddingStatus = z.infer<typeof embeddingStatusSchema>;

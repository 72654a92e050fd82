import { z } from 'zod';
import type { DatasetVersion } from '../registry/types';

const IDENTIFIER_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export const identifierSchema = z
  .string()
  .regex(IDENTIFIER_PATTERN, 'must be 1-128 characters of letters, digits, "_" or "-"');

export const uploadChunkQuerySchema = z
  .object({
    dataset_id: identifierSchema,
    user_id: identifierSchema,
    chunk_index: z.coerce.number().int().min(0),
    total_chunks: z.coerce.number().int().positive()
  })
  .superRefine((value, ctx) => {
    if (value.chunk_index >= value.total_chunks) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunk_index'],
        message: 'chunk_index must be less than total_chunks'
      });
    }
  });

export const userQuerySchema = z.object({
  user_id: identifierSchema
});

export const datasetParamsSchema = z.object({
  dataset_id: identifierSchema
});

export const versionParamsSchema = datasetParamsSchema.extend({
  version_id: z.union([z.literal('latest'), identifierSchema])
});

export const askBodySchema = z.object({
  dataset_id: identifierSchema,
  user_id: identifierSchema,
  question: z.string().trim().min(1).max(4000),
  version_id: z.union([z.literal('latest'), identifierSchema]).default('latest')
});

export const historyQuerySchema = userQuerySchema.extend({
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

export function serializeVersion(version: DatasetVersion) {
  return {
    dataset_id: version.datasetId,
    version_id: version.versionId,
    user_id: version.userId,
    file_path: version.filePath,
    status: version.status,
    created_at: version.createdAt,
    updated_at: version.updatedAt
  };
}

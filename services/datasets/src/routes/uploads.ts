import path from 'node:path';
import type { FastifyInstance } from 'fastify';

import { RequestValidationError } from '../errors';
import { generateVersionId } from '../registry';
import type { AppContext } from '../types';
import { uploadChunkQuerySchema } from './schemas';

const CHUNK_FIELD = 'chunk';

export function assembledFilePath(dataRoot: string, userId: string, datasetId: string, versionId: string): string {
  return path.join(dataRoot, userId, `${datasetId}-v${versionId}.csv`);
}

export const registerUploadRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/ingestion/upload-chunk', async (request) => {
    const query = uploadChunkQuerySchema.parse(request.query);
    const { dataset_id: datasetId, user_id: userId, chunk_index: chunkIndex, total_chunks: totalChunks } = query;

    if (!request.isMultipart()) {
      throw new RequestValidationError('Chunk uploads require multipart/form-data');
    }
    const file = await request.file();
    if (!file) {
      throw new RequestValidationError(`Missing "${CHUNK_FIELD}" file part`);
    }
    const data = await file.toBuffer();
    if (file.fieldname !== CHUNK_FIELD) {
      throw new RequestValidationError(`Unexpected file part "${file.fieldname}"; expected "${CHUNK_FIELD}"`);
    }

    await ctx.chunks.putChunk(userId, datasetId, chunkIndex, data);
    request.log.debug({ userId, datasetId, chunkIndex, totalChunks, bytes: data.length }, '[tabletalk:upload] chunk stored');

    if (chunkIndex !== totalChunks - 1) {
      return {
        status: 'received',
        message: `Chunk ${chunkIndex + 1}/${totalChunks} received`,
        dataset_id: datasetId,
        is_final_chunk: false
      };
    }

    const versionId = generateVersionId();
    const filePath = assembledFilePath(ctx.config.storage.dataRoot, userId, datasetId, versionId);
    let registered = false;
    try {
      await ctx.registry.register({ datasetId, versionId, userId, filePath });
      registered = true;
      const submitted = await ctx.dispatcher.submit({
        userId,
        datasetId,
        versionId,
        stagingDir: ctx.chunks.stagingDirectory(userId, datasetId),
        destinationPath: filePath,
        totalChunks
      });
      request.log.info(
        { userId, datasetId, versionId, taskId: submitted.taskId, mode: submitted.mode },
        '[tabletalk:upload] ingestion submitted'
      );
      return {
        status: 'processing',
        message: 'All chunks received. Processing file.',
        dataset_id: datasetId,
        version_id: versionId,
        is_final_chunk: true,
        task_id: submitted.taskId
      };
    } catch (err) {
      request.log.warn({ err, userId, datasetId, versionId }, '[tabletalk:upload] rolling back staged chunks');
      await ctx.chunks.discard(userId, datasetId);
      if (registered) {
        await ctx.registry.markStatus({ datasetId, versionId, userId }, 'failed').catch((markErr: unknown) => {
          request.log.error({ err: markErr, datasetId, versionId }, '[tabletalk:upload] failed to mark version failed');
          return null;
        });
      }
      throw err;
    }
  });
};

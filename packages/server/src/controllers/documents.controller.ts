import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Post,
  Res,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import {
  Document,
  DocumentWithChunks,
  IngestDocumentDTO,
  QueryDocumentsDTO,
  QueryResult,
  RagStats,
  logger,
} from '@docqa/core';
import { RagOrchestrator } from '../services/rag.orchestrator.js';

/**
 * Aborts when the client goes away before the reply was written.
 */
export function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

@Controller('documents')
export class DocumentsController {
  constructor(private readonly orchestrator: RagOrchestrator) {}

  @Post()
  async ingest(
    @Body() body: IngestDocumentDTO,
    @Res({ passthrough: true }) reply: FastifyReply
  ): Promise<Document> {
    logger.info(`ingest called for ${body.documentId}`);
    return this.orchestrator.ingest(
      body.documentId,
      { text: body.text, pages: body.pages },
      {
        title: body.title,
        chunkSizeTokens: body.chunkSizeTokens,
        overlapTokens: body.overlapTokens,
      },
      disconnectSignal(reply)
    );
  }

  @Post('query')
  @HttpCode(200)
  async query(
    @Body() body: QueryDocumentsDTO,
    @Res({ passthrough: true }) reply: FastifyReply
  ): Promise<QueryResult> {
    return this.orchestrator.query(
      body.question,
      { documentId: body.documentId, k: body.k },
      disconnectSignal(reply)
    );
  }

  @Get()
  async list(): Promise<Document[]> {
    return this.orchestrator.listDocuments();
  }

  @Get('stats')
  async stats(): Promise<RagStats> {
    return this.orchestrator.stats();
  }

  @Get(':id')
  async get(@Param('id') id: string): Promise<DocumentWithChunks> {
    return this.orchestrator.getDocument(id);
  }

  @Delete(':id')
  async delete(@Param('id') id: string): Promise<{ deleted: boolean }> {
    logger.info(`delete called for ${id}`);
    return this.orchestrator.delete(id);
  }
}

import { Controller, Get, Res } from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { metrics } from '@docqa/metrics';

@Controller('metrics')
export class MetricsController {
  @Get()
  async getMetrics(
    @Res({ passthrough: true }) reply: FastifyReply
  ): Promise<string> {
    void reply.header('Content-Type', metrics.contentType);
    return metrics.metrics();
  }
}

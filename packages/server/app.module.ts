import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module.js';
import { DocumentsModule } from './src/modules/documents.module.js';

@Module({
  imports: [ConfigModule, DocumentsModule],
})
export class AppModule {}

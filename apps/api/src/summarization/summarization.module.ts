import { Module } from '@nestjs/common';
import { contentGeneratorProvider } from './content-generator.provider';
import { SummarizationService } from './summarization.service';

@Module({
  providers: [contentGeneratorProvider, SummarizationService],
  exports: [SummarizationService],
})
export class SummarizationModule {}

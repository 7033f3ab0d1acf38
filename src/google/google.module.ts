import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PIPELINE_SETTINGS, readPipelineSettings } from '../config/pipeline-settings.js';
import { ModelClient } from '../reasoning/model-client.js';
import { ReasoningGateway } from '../reasoning/reasoning-gateway.service.js';
import { GeminiService } from './gemini.service.js';

@Global()
@Module({
  providers: [
    { provide: ModelClient, useClass: GeminiService },
    {
      provide: PIPELINE_SETTINGS,
      useFactory: (config: ConfigService) => readPipelineSettings(config),
      inject: [ConfigService],
    },
    ReasoningGateway,
  ],
  exports: [ReasoningGateway, PIPELINE_SETTINGS],
})
export class GoogleModule {}

/**
 * /admin: API keys, system prompt and model tuning overrides.
 */

import { Body, Controller, Delete, Get, Param, Post } from '@nestjs/common';
import {
  ApiKeySummary,
  ConfigStore,
  ModelTuningPatch,
  ModelTuningView,
  SystemPromptView,
} from './config-store.service.js';
import { ApiKeyDto, ModelConfigDto, SystemPromptDto } from './dto/admin.dto.js';

@Controller('admin')
export class AdminController {
  constructor(private readonly configStore: ConfigStore) {}

  @Get('api-keys')
  async listApiKeys(): Promise<{ keys: ApiKeySummary[] }> {
    return { keys: await this.configStore.listApiKeys() };
  }

  @Post('api-keys')
  async saveApiKey(@Body() dto: ApiKeyDto): Promise<{ key: ApiKeySummary }> {
    return { key: await this.configStore.setApiKey(dto.name, dto.value, dto.label) };
  }

  @Delete('api-keys/:name')
  async deleteApiKey(@Param('name') name: string): Promise<{ deleted: string }> {
    return { deleted: await this.configStore.deleteApiKey(name) };
  }

  @Get('system-prompt')
  getSystemPrompt(): Promise<SystemPromptView> {
    return this.configStore.getSystemPrompt();
  }

  @Post('system-prompt')
  updateSystemPrompt(@Body() dto: SystemPromptDto): Promise<SystemPromptView> {
    if (dto.useDefault || dto.prompt === undefined) {
      return this.configStore.resetSystemPrompt();
    }
    return this.configStore.setSystemPrompt(dto.prompt);
  }

  @Get('model-config')
  getModelConfig(): Promise<ModelTuningView> {
    return this.configStore.getModelTuning();
  }

  @Post('model-config')
  updateModelConfig(@Body() dto: ModelConfigDto): Promise<ModelTuningView> {
    const patch: ModelTuningPatch = {
      temperature: dto.temperature,
      topP: dto.topP,
      mediaResolution: dto.mediaResolution,
    };
    return this.configStore.updateModelTuning(patch);
  }
}

import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { AdminController } from './admin.controller.js';
import { ConfigStore, DEFAULT_SYSTEM_PROMPT } from './config-store.service.js';
import { FirestoreSettingsRepository } from './firestore-settings.repository.js';
import { SettingsRepository } from './settings.repository.js';

const FALLBACK_PROMPT = 'Du er en assistent som lager renholdsplaner ut fra plantegninger.';

/** Built-in system prompt; SYSTEM_PROMPT_PATH is resolved from the working directory */
export function loadDefaultPrompt(config: ConfigService): string {
  const path = resolve(config.get<string>('SYSTEM_PROMPT_PATH') || 'prompt.txt');
  try {
    return readFileSync(path, 'utf8').trim() || FALLBACK_PROMPT;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    new Logger('AdminConfigModule').warn(`Could not read ${path} (${reason}); using the fallback prompt`);
    return FALLBACK_PROMPT;
  }
}

@Global()
@Module({
  controllers: [AdminController],
  providers: [
    { provide: SettingsRepository, useClass: FirestoreSettingsRepository },
    { provide: DEFAULT_SYSTEM_PROMPT, useFactory: loadDefaultPrompt, inject: [ConfigService] },
    ConfigStore,
  ],
  exports: [ConfigStore],
})
export class AdminConfigModule {}

/**
 * Single choke point for all model calls.
 *
 * Builds the payload (documents + instructions + tuning), bounds each attempt
 * with a timeout, retries transient failures with exponential backoff and
 * locates embedded JSON in the reply. Domain validation is left to the
 * normalizer.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { sleep } from '../common/concurrency.js';
import {
  InvalidRequestError,
  PermanentProviderError,
  TransientProviderError,
} from '../common/errors.js';
import { extractJson } from '../common/json-extract.js';
import { PIPELINE_SETTINGS, type PipelineSettings } from '../config/pipeline-settings.js';
import type {
  Capability,
  ConfigSnapshot,
  GatewayInputs,
  GatewayResult,
} from '../types/reasoning.types.js';
import { buildSystemInstruction } from './instructions.js';
import { ModelClient, type ModelPart, type ModelRequest } from './model-client.js';
import { classifyProviderError } from './provider-errors.js';

type PreparedRequest = Omit<ModelRequest, 'signal'>;

@Injectable()
export class ReasoningGateway {
  private readonly logger = new Logger(ReasoningGateway.name);

  constructor(
    private readonly client: ModelClient,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  /**
   * @param signal job-level signal; when it fires the call stops and its
   *               reason is rethrown without retrying
   */
  async invoke(
    capability: Capability,
    inputs: GatewayInputs,
    snapshot: ConfigSnapshot,
    signal?: AbortSignal,
  ): Promise<GatewayResult> {
    const request = this.prepare(capability, inputs, snapshot);
    const { maxAttempts, retryBaseMs, callTimeoutMs } = this.settings;

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();
      const timeout = AbortSignal.timeout(callTimeoutMs);
      const callSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

      try {
        const response = await this.client.generate({ ...request, signal: callSignal });
        if (attempt > 1) {
          this.logger.log(`${capability}: succeeded on attempt ${attempt}`);
        }
        return { text: response.text, data: extractJson(response.text) };
      } catch (err) {
        if (signal?.aborted) throw signal.reason;

        const failure = classifyProviderError(err);
        if (!(failure instanceof TransientProviderError) || attempt >= maxAttempts) {
          this.logger.error(
            `${capability}: giving up after ${attempt} attempt(s) [${failure.kind}/${failure.reason ?? '-'}] ${failure.message}`,
          );
          throw failure;
        }

        const backoffMs = retryBaseMs * 2 ** (attempt - 1);
        this.logger.warn(
          `${capability}: transient failure (${failure.reason ?? 'unknown'}), retry ${attempt}/${maxAttempts - 1} in ${backoffMs} ms`,
        );
        await sleep(backoffMs, signal);
      }
    }
  }

  private prepare(capability: Capability, inputs: GatewayInputs, snapshot: ConfigSnapshot): PreparedRequest {
    const documents = inputs.documents ?? [];
    const texts = (inputs.texts ?? []).filter((t) => t.trim() !== '');

    if (capability === 'generate_plan') {
      if (inputs.payload === undefined) {
        throw new InvalidRequestError('generate_plan requires prior structured output', 'missing_payload');
      }
      if (documents.length > 0) {
        throw new InvalidRequestError('generate_plan takes no raw documents', 'unexpected_document');
      }
    } else if (documents.length === 0 && texts.length === 0) {
      throw new InvalidRequestError(`${capability} requires at least one document or text`, 'empty_inputs');
    }

    if (!snapshot.apiKey) {
      throw new PermanentProviderError(
        'Gemini API key is not configured. Set GEMINI_API_KEY or add one under /admin.',
        { reason: 'missing_api_key' },
      );
    }

    const parts: ModelPart[] = texts.map((text) => ({ text }));
    if (inputs.payload !== undefined) {
      parts.push({ text: JSON.stringify(inputs.payload) });
    }
    for (const document of documents) {
      parts.push({ document });
    }

    return {
      model: this.settings.model,
      apiKey: snapshot.apiKey,
      systemInstruction: buildSystemInstruction(snapshot.systemPrompt, capability),
      parts,
      tuning: { ...snapshot.tuning },
    };
  }
}

import { InvalidRequestError, PermanentProviderError, TransientProviderError } from '../common/errors.js';
import { DEFAULT_PIPELINE_SETTINGS, type PipelineSettings } from '../config/pipeline-settings.js';
import type { ConfigSnapshot, DocumentInput } from '../types/reasoning.types.js';
import { FakeModelClient, httpError, waitOrAbort } from '../../test/fakes/fake-model-client.js';
import { CAPABILITY_INSTRUCTIONS } from './instructions.js';
import { ReasoningGateway } from './reasoning-gateway.service.js';

const settings: PipelineSettings = {
  ...DEFAULT_PIPELINE_SETTINGS,
  model: 'test-model',
  retryBaseMs: 1,
  callTimeoutMs: 30,
};

const snapshot: ConfigSnapshot = {
  apiKey: 'test-secret',
  systemPrompt: 'Du lager renholdsplaner.',
  tuning: { temperature: 0.2 },
  takenAt: '2026-01-01T00:00:00.000Z',
};

const floorplan: DocumentInput = {
  filename: 'plan.png',
  mimeType: 'image/png',
  data: Buffer.from('png-bytes'),
};

function setup(overrides: Partial<PipelineSettings> = {}) {
  const model = new FakeModelClient();
  const gateway = new ReasoningGateway(model, { ...settings, ...overrides });
  return { model, gateway };
}

describe('ReasoningGateway', () => {
  it('sends prompt, capability instruction, tuning and parts in order', async () => {
    const { model, gateway } = setup();
    model.on('analyze_floorplan', () => '```json\n{"rooms": []}\n```');

    const result = await gateway.invoke(
      'analyze_floorplan',
      { documents: [floorplan], texts: ['has_area=true'], payload: { floorplan_config: { has_area: true } } },
      snapshot,
    );

    expect(result.data).toEqual({ rooms: [] });
    const [{ request }] = model.requests;
    expect(request.model).toBe('test-model');
    expect(request.apiKey).toBe('test-secret');
    expect(request.systemInstruction).toBe(
      `Du lager renholdsplaner.\n\n${CAPABILITY_INSTRUCTIONS.analyze_floorplan}`,
    );
    expect(request.tuning).toEqual({ temperature: 0.2 });
    expect(request.parts).toEqual([
      { text: 'has_area=true' },
      { text: '{"floorplan_config":{"has_area":true}}' },
      { document: floorplan },
    ]);
  });

  it('retries two timeouts and returns the third answer', async () => {
    const { model, gateway } = setup();
    model.on('analyze_floorplan', (request, call) =>
      call <= 2 ? waitOrAbort(request, 1_000) : { rooms: [{ id: '1', name: 'Kontor' }] },
    );

    const result = await gateway.invoke('analyze_floorplan', { documents: [floorplan] }, snapshot);

    expect(result.data).toEqual({ rooms: [{ id: '1', name: 'Kontor' }] });
    expect(model.callsTo('analyze_floorplan')).toBe(3);
    const [first, second, third] = model.requests.map((r) => r.request);
    expect(second.parts).toEqual(first.parts);
    expect(third.systemInstruction).toBe(first.systemInstruction);
  });

  it('retries rate limits and server errors', async () => {
    const { model, gateway } = setup();
    model.on('generate_plan', (_request, call) => {
      if (call === 1) throw httpError(429);
      if (call === 2) throw httpError(503);
      return { entries: [] };
    });

    const result = await gateway.invoke('generate_plan', { payload: { rooms: [] } }, snapshot);
    expect(result.data).toEqual({ entries: [] });
    expect(model.callsTo('generate_plan')).toBe(3);
  });

  it('gives up after the configured number of attempts', async () => {
    const { model, gateway } = setup({ maxAttempts: 2 });
    model.on('generate_plan', () => {
      throw httpError(500, 'Internal error');
    });

    const failure = gateway.invoke('generate_plan', { payload: {} }, snapshot);
    await expect(failure).rejects.toBeInstanceOf(TransientProviderError);
    await expect(failure).rejects.toMatchObject({ reason: 'server_error', statusCode: 500 });
    expect(model.callsTo('generate_plan')).toBe(2);
  });

  it('does not retry permanent failures', async () => {
    const { model, gateway } = setup();
    model.on('analyze_template', () => {
      throw httpError(401, 'API key not valid');
    });

    const failure = gateway.invoke('analyze_template', { texts: ['Mal'] }, snapshot);
    await expect(failure).rejects.toBeInstanceOf(PermanentProviderError);
    await expect(failure).rejects.toMatchObject({ reason: 'auth', statusCode: 401 });
    expect(model.callsTo('analyze_template')).toBe(1);
  });

  it('fails without calling the provider when no API key is configured', async () => {
    const { model, gateway } = setup();
    await expect(
      gateway.invoke('analyze_floorplan', { documents: [floorplan] }, { ...snapshot, apiKey: null }),
    ).rejects.toMatchObject({ kind: 'permanent_provider', reason: 'missing_api_key' });
    expect(model.requests).toHaveLength(0);
  });

  it('rejects malformed inputs as invalid requests', async () => {
    const { gateway } = setup();
    await expect(gateway.invoke('analyze_floorplan', { texts: ['  '] }, snapshot)).rejects.toMatchObject({
      reason: 'empty_inputs',
    });
    await expect(gateway.invoke('generate_plan', {}, snapshot)).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(
      gateway.invoke('generate_plan', { payload: {}, documents: [floorplan] }, snapshot),
    ).rejects.toMatchObject({ reason: 'unexpected_document' });
  });

  it('rethrows the job signal reason instead of retrying', async () => {
    const { model, gateway } = setup({ callTimeoutMs: 1_000 });
    model.on('analyze_floorplan', (request) => waitOrAbort(request, 1_000));
    const job = new AbortController();
    const reason = new Error('job cancelled');

    const pending = gateway.invoke('analyze_floorplan', { documents: [floorplan] }, snapshot, job.signal);
    setTimeout(() => job.abort(reason), 10);

    await expect(pending).rejects.toBe(reason);
    expect(model.callsTo('analyze_floorplan')).toBe(1);
  });

  it('returns undefined data when the reply holds no JSON', async () => {
    const { model, gateway } = setup();
    model.on('convert_to_standard', () => 'Ingen plan funnet.');
    const result = await gateway.invoke('convert_to_standard', { texts: ['Rom;Areal'] }, snapshot);
    expect(result).toEqual({ text: 'Ingen plan funnet.', data: undefined });
  });
});

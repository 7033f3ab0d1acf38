import { ALL_DAYS } from '../types/plan.types.js';
import { httpError, payloadOf, waitOrAbort } from '../../test/fakes/fake-model-client.js';
import {
  createPipelineHarness,
  DEFAULT_OPTIONS,
  documentName,
  payloadRooms,
  planFromRooms,
  waitFor,
} from '../../test/pipeline-harness.js';

type Harness = Awaited<ReturnType<typeof createPipelineHarness>>;

function terminal(harness: Harness, jobId: string) {
  return waitFor(() => {
    const job = harness.planJobs.getJob(jobId);
    return job && (job.status === 'success' || job.status === 'failed') ? job : null;
  });
}

describe('PlanJobService', () => {
  describe('generation', () => {
    it('turns a single floor plan into a persisted plan without a template name', async () => {
      const harness = await createPipelineHarness();
      const fileId = await harness.blobs.seedFloorplan('etasje-1.png');
      harness.model
        .on('analyze_floorplan', () => ({
          rooms: [
            { id: '101', name: 'Kontor', type: 'office', floor: '1', area_m2: 12.5 },
            { id: '102', name: 'WC', type: 'toilet', floor: '1', area_m2: 3 },
          ],
        }))
        .on('generate_plan', () => ({
          entries: [
            { room_name: 'Kontor', area_m2: 12.5, floor: '1', description: 'Støvsuging', frequency: { MAN: true } },
            { room_name: 'WC', area_m2: 3, floor: '1', description: 'Vask', frequency: ['mon', 'fri'] },
          ],
          template_name: 'Provider Template',
        }));

      const started = harness.planJobs.startGeneration({ fileIds: [fileId], options: DEFAULT_OPTIONS });
      expect(started.status).toBe('running');
      expect(started.totalFiles).toBe(1);

      const job = await terminal(harness, started.id);
      expect(job.status).toBe('success');
      expect(job.processedFiles).toBe(1);
      expect(job.detail).toBeNull();

      const result = await harness.planJobs.getResult(started.id);
      expect(result?.plan?.templateName).toBeNull();
      expect(result?.plan?.totalAreaM2).toBe(15.5);
      expect(result?.plan?.entries.map((e) => e.id)).toEqual([1, 2]);
      expect(result?.plan?.entries[1].frequency).toEqual({
        MAN: true,
        TIRS: false,
        ONS: false,
        TORS: false,
        FRE: true,
        LØR: false,
        SØN: false,
      });
      expect(result?.plan?.source).toBe('generator');
      expect(result?.plan?.metadata).toMatchObject({ fileCount: 1, templateId: null, jobId: started.id });
      expect(result?.docxUrl).toMatch(/^\/api\/download\/docx-[0-9a-f]{32}\.docx$/);
      expect(job.planId).toBe(result?.plan?.id);
      expect(harness.plans.records).toHaveLength(1);
    });

    it('drops every area when the plan has none and no reference is given', async () => {
      const harness = await createPipelineHarness();
      const fileId = await harness.blobs.seedFloorplan('uten-areal.pdf');
      harness.model
        .on('analyze_floorplan', () => ({ rooms: [{ id: 'a', name: 'Gang', type: 'corridor', area_m2: 20 }] }))
        .on('generate_plan', () => ({ entries: [{ room_name: 'Gang', area_m2: 20, frequency: { ONS: 'x' } }] }));

      const started = harness.planJobs.startGeneration({
        fileIds: [fileId],
        options: { hasRoomNames: true, hasArea: false, referenceUnit: 'm' },
      });
      const job = await terminal(harness, started.id);
      expect(job.status).toBe('success');

      const [analysis] = harness.model.requests.filter((r) => r.capability === 'analyze_floorplan');
      expect(analysis.request.parts[0]).toEqual({ text: 'has_room_names=true, has_area=false, reference_unit=m.' });

      const [generation] = harness.model.requests.filter((r) => r.capability === 'generate_plan');
      expect(payloadRooms(generation.request)[0].area_m2).toBeNull();
      expect(payloadOf(generation.request)).toMatchObject({ has_area: false });

      const result = await harness.planJobs.getResult(started.id);
      expect(result?.plan?.entries[0].areaM2).toBeNull();
      expect(result?.plan?.totalAreaM2).toBe(0);
    });

    it('tags rooms from three documents with three distinct sources in submission order', async () => {
      const harness = await createPipelineHarness();
      const fileIds = [
        await harness.blobs.seedFloorplan('bygg-a.png'),
        await harness.blobs.seedFloorplan('bygg-b.png'),
        await harness.blobs.seedFloorplan('bygg-c.png'),
      ];
      const delays: Record<string, number> = { 'bygg-a.png': 40, 'bygg-b.png': 0, 'bygg-c.png': 15 };
      harness.model
        .on('analyze_floorplan', async (request) => {
          const name = documentName(request);
          await new Promise((resolve) => setTimeout(resolve, delays[name]));
          return { rooms: [{ id: '1', name: `Resepsjon ${name}`, type: 'reception', area_m2: 10 }] };
        })
        .on('generate_plan', planFromRooms);

      const started = harness.planJobs.startGeneration({ fileIds, options: DEFAULT_OPTIONS });
      const job = await terminal(harness, started.id);
      expect(job.status).toBe('success');
      expect(job.processedFiles).toBe(3);

      const [generation] = harness.model.requests.filter((r) => r.capability === 'generate_plan');
      const payload = payloadOf(generation.request);
      expect(payload).toMatchObject({
        rooms: [
          { id: 'd1-1', building: 'Dokument 1', name: 'Resepsjon bygg-a.png' },
          { id: 'd2-1', building: 'Dokument 2', name: 'Resepsjon bygg-b.png' },
          { id: 'd3-1', building: 'Dokument 3', name: 'Resepsjon bygg-c.png' },
        ],
      });

      const result = await harness.planJobs.getResult(started.id);
      expect(result?.plan?.metadata.fileCount).toBe(3);
      expect(result?.plan?.totalAreaM2).toBe(30);
    });

    it('uses the analyzed template name and schema when a template is supplied', async () => {
      const harness = await createPipelineHarness();
      const fileId = await harness.blobs.seedFloorplan('plan.png');
      const templateId = await harness.blobs.put(
        Buffer.from('Seksjon: Kontorer\nKolonner: Rom, Areal'),
        'Mal Kommune.txt',
        'text/plain',
        'templates',
      );
      harness.model
        .on('analyze_floorplan', () => ({ rooms: [{ id: '1', name: 'Kontor', type: 'office', area_m2: 9 }] }))
        .on('analyze_template', () => ({
          template_name: 'Kommunal mal',
          sections: ['Kontorer'],
          categories: ['Kontor'],
          columns: ['Rom', 'Areal'],
        }))
        .on('generate_plan', planFromRooms);

      const started = harness.planJobs.startGeneration({ fileIds: [fileId], templateId, options: DEFAULT_OPTIONS });
      const job = await terminal(harness, started.id);
      expect(job.status).toBe('success');

      const [templateCall] = harness.model.requests.filter((r) => r.capability === 'analyze_template');
      expect(templateCall.request.parts).toEqual([
        { text: 'Mal Kommune.txt:\nSeksjon: Kontorer\nKolonner: Rom, Areal' },
      ]);
      const [generation] = harness.model.requests.filter((r) => r.capability === 'generate_plan');
      expect(payloadOf(generation.request)).toMatchObject({
        template: { template_name: 'Kommunal mal', columns: ['Rom', 'Areal'] },
      });

      const result = await harness.planJobs.getResult(started.id);
      expect(result?.plan?.templateName).toBe('Kommunal mal');
      expect(result?.plan?.metadata.templateId).toBe(templateId);
    });

    it('fails the job, aborts sibling calls and persists nothing when one document fails', async () => {
      const harness = await createPipelineHarness();
      const fileIds = [await harness.blobs.seedFloorplan('ok.png'), await harness.blobs.seedFloorplan('bad.png')];
      let siblingAborted = false;
      harness.model
        .on('analyze_floorplan', async (request) => {
          if (documentName(request) === 'bad.png') {
            await new Promise((resolve) => setTimeout(resolve, 10));
            throw httpError(400, 'Unsupported image');
          }
          try {
            return await waitOrAbort(request, 3_000);
          } catch (err) {
            siblingAborted = true;
            throw err;
          }
        })
        .on('generate_plan', planFromRooms);

      const started = harness.planJobs.startGeneration({ fileIds, options: DEFAULT_OPTIONS });
      const job = await terminal(harness, started.id);

      expect(job.status).toBe('failed');
      expect(job.message).toBe('Unsupported image');
      expect(job.detail).toEqual({
        kind: 'permanent_provider',
        message: 'Unsupported image',
        reason: 'invalid_request',
        statusCode: 400,
        retryable: false,
      });
      expect(job.planId).toBeNull();
      expect(siblingAborted).toBe(true);
      expect(harness.model.callsTo('generate_plan')).toBe(0);
      expect(harness.plans.records).toHaveLength(0);
      expect(harness.blobs.byCategory('docx')).toHaveLength(0);
      await expect(harness.planJobs.getResult(started.id)).resolves.toMatchObject({ plan: null, docxUrl: null });
    });

    it('fails with a normalization error when the plan reply has no entry list', async () => {
      const harness = await createPipelineHarness();
      const fileId = await harness.blobs.seedFloorplan('plan.png');
      harness.model
        .on('analyze_floorplan', () => ({ rooms: [{ id: '1', name: 'Kontor' }] }))
        .on('generate_plan', () => 'Beklager, jeg kan ikke lage en plan.');

      const started = harness.planJobs.startGeneration({ fileIds: [fileId], options: DEFAULT_OPTIONS });
      const job = await terminal(harness, started.id);
      expect(job.status).toBe('failed');
      expect(job.detail).toMatchObject({ kind: 'normalization', reason: 'no_entry_list' });
      expect(harness.plans.records).toHaveLength(0);
    });

    it('fails with kind timeout once the job deadline passes', async () => {
      const harness = await createPipelineHarness({ jobTimeoutMs: 50 });
      const fileId = await harness.blobs.seedFloorplan('treg.png');
      harness.model.on('analyze_floorplan', (request) => waitOrAbort(request, 3_000));

      const started = harness.planJobs.startGeneration({ fileIds: [fileId], options: DEFAULT_OPTIONS });
      const job = await terminal(harness, started.id);
      expect(job.status).toBe('failed');
      expect(job.detail).toEqual({
        kind: 'timeout',
        message: 'Job exceeded the maximum wait of 50 ms',
        reason: 'job_deadline',
        retryable: false,
      });
      expect(harness.plans.records).toHaveLength(0);
    });

    it('finishes a plan write that is still running when the deadline passes', async () => {
      const harness = await createPipelineHarness({ jobTimeoutMs: 100 });
      harness.plans.saveDelayMs = 300;
      const fileId = await harness.blobs.seedFloorplan('plan.png');
      harness.model
        .on('analyze_floorplan', () => ({ rooms: [{ id: '1', name: 'Kontor', area_m2: 8 }] }))
        .on('generate_plan', planFromRooms);

      const started = harness.planJobs.startGeneration({ fileIds: [fileId], options: DEFAULT_OPTIONS });
      const job = await terminal(harness, started.id);

      expect(job.status).toBe('success');
      expect(harness.plans.records).toHaveLength(1);
      expect(harness.plans.records[0].plan.id).toBe(job.planId);
      expect(harness.plans.records[0].plan.metadata.jobId).toBe(started.id);
    });

    it('keeps the plan when the export renderer fails', async () => {
      const harness = await createPipelineHarness();
      harness.exporter.fail = true;
      const fileId = await harness.blobs.seedFloorplan('plan.png');
      harness.model
        .on('analyze_floorplan', () => ({ rooms: [{ id: '1', name: 'Kontor', area_m2: 8 }] }))
        .on('generate_plan', planFromRooms);

      const started = harness.planJobs.startGeneration({ fileIds: [fileId], options: DEFAULT_OPTIONS });
      const job = await terminal(harness, started.id);
      expect(job.status).toBe('success');
      expect(job.docxUrl).toBeNull();
      expect(harness.plans.records[0].docxId).toBeNull();
    });

    it('rejects an unknown plan category before creating a job', async () => {
      const harness = await createPipelineHarness();
      expect(() =>
        harness.planJobs.startGeneration({
          fileIds: ['uploads-00000000000000000000000000000000.png'],
          options: { ...DEFAULT_OPTIONS, planCategory: 'spaceship' },
        }),
      ).toThrow('Unknown plan category spaceship');
    });

    it('fails an unknown file id as an invalid request', async () => {
      const harness = await createPipelineHarness();
      harness.model.on('analyze_floorplan', () => ({ rooms: [] }));
      const started = harness.planJobs.startGeneration({
        fileIds: ['uploads-00000000000000000000000000000000.png'],
        options: DEFAULT_OPTIONS,
      });
      const job = await terminal(harness, started.id);
      expect(job.detail).toMatchObject({ kind: 'invalid_request', reason: 'unknown_file' });
      expect(harness.model.callsTo('analyze_floorplan')).toBe(0);
    });
  });

  describe('conversion', () => {
    it('converts a text plan and keeps the provider template name', async () => {
      const harness = await createPipelineHarness();
      const fileId = await harness.blobs.put(
        Buffer.from('Rom;Areal;Dager\nKontor;12;man,ons', 'latin1'),
        'gammel-plan.csv',
        'text/csv',
        'external',
      );
      harness.model.on('convert_to_standard', () => ({
        template_name: 'Ekstern plan',
        entries: [{ room_name: 'Kontor', area_m2: 12, frequency: { mandag: 'ja', onsdag: 'ja' } }],
      }));

      const started = harness.planJobs.startConversion({ fileId });
      expect(started.kind).toBe('convert');
      const job = await terminal(harness, started.id);
      expect(job.status).toBe('success');

      const [call] = harness.model.requests;
      expect(call.request.parts).toEqual([{ text: 'gammel-plan.csv:\nRom;Areal;Dager\nKontor;12;man,ons' }]);

      const result = await harness.planJobs.getResult(started.id);
      expect(result?.plan?.source).toBe('converter');
      expect(result?.plan?.templateName).toBe('Ekstern plan');
      expect(result?.plan?.metadata.fileId).toBe(fileId);
      expect(ALL_DAYS.filter((day) => result?.plan?.entries[0].frequency[day])).toEqual(['MAN', 'ONS']);
    });
  });

  it('returns null for an unknown job', async () => {
    const harness = await createPipelineHarness();
    expect(harness.planJobs.getJob('missing')).toBeNull();
    await expect(harness.planJobs.getResult('missing')).resolves.toBeNull();
  });
});

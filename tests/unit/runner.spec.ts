import { describe, it, expect, vi } from 'vitest';
import { runPipeline, runStage } from '@/lib/pipeline/runner';
import { MalformedOutputError } from '@/lib/pipeline/errors';
import { createAnnotationProducer } from '@/lib/producers/annotation';
import type { ProducedBatch, StageProducer } from '@/lib/producers/types';
import { describeSession } from '@/lib/session';
import { deferred, makeSession } from '../helpers/session';

function fixedProducer(group: StageProducer['group'], updates: unknown[], stage: string = group): StageProducer {
  return { stage, group, produce: async () => ({ updates }) };
}

describe('runStage', () => {
  it('walks awaiting_production, produced, applied and logs the result', async () => {
    const session = makeSession();
    const run = await runStage(session, fixedProducer('narration', [{ index: 0, comment: 'c', speech: 's' }]));

    expect(run.status).toBe('success');
    expect(run.state).toBe('applied');
    expect(run.transitions).toEqual(['awaiting_production', 'produced', 'applied']);
    expect(run.status === 'success' && run.message).toBe('Applied 1 narration updates (1 new scenes, 0 skipped).');
    expect(session.ledger.read()).toEqual([{ comment: 'c', speech: 's' }]);
    expect(session.applied).toHaveLength(1);
    expect(session.applied[0].stage).toBe('narration');
    expect(session.activeStage).toBeNull();
  });

  it('reports a missing prerequisite and leaves the ledger alone', async () => {
    const session = makeSession();
    const annotate = vi.fn();
    const run = await runStage(session, createAnnotationProducer({ annotator: { annotate } }));

    expect(run).toMatchObject({
      status: 'error',
      state: 'production_failed',
      kind: 'precondition',
      message: 'No scenes exist yet, so audio tagging cannot run',
      nextStep: 'Run the narration stage first.',
      transitions: ['awaiting_production', 'production_failed']
    });
    expect(annotate).not.toHaveBeenCalled();
    expect(session.ledger.length()).toBe(0);
    expect(session.applied).toEqual([]);
  });

  it('maps producer failures onto error kinds', async () => {
    const session = makeSession();
    const malformed: StageProducer = {
      stage: 'annotation',
      group: 'annotation',
      produce: async () => {
        throw new MalformedOutputError('Model output is not valid JSON');
      }
    };
    const crashed: StageProducer = {
      stage: 'visual',
      group: 'visual',
      produce: async () => {
        throw new Error('socket hang up');
      }
    };

    expect(await runStage(session, malformed)).toMatchObject({ kind: 'malformed_output', nextStep: 'Regenerate the stage output.' });
    expect(await runStage(session, crashed)).toMatchObject({ kind: 'collaborator', message: 'socket hang up' });
  });

  it('fails in the apply state when the produced batch has no updates list', async () => {
    const session = makeSession([{ speech: 'a' }]);
    const broken: StageProducer = {
      stage: 'annotation',
      group: 'annotation',
      // stands in for an untyped payload that slipped past parsing
      produce: async (): Promise<ProducedBatch> => JSON.parse('{"items": []}')
    };
    const run = await runStage(session, broken);

    expect(run.state).toBe('apply_failed');
    expect(run.transitions).toEqual(['awaiting_production', 'produced', 'apply_failed']);
    expect(run).toMatchObject({ kind: 'precondition', message: 'No annotation updates were produced' });
    expect(session.ledger.read()).toEqual([{ speech: 'a' }]);
  });

  it('refuses a second stage while one is running on the same session', async () => {
    const session = makeSession();
    const gate = deferred<ProducedBatch>();
    const slow: StageProducer = { stage: 'narration:summary', group: 'narration', produce: () => gate.promise };

    const first = runStage(session, slow);
    const second = await runStage(session, fixedProducer('narration', [{ index: 0, comment: 'x', speech: 'y' }]));

    expect(second).toMatchObject({
      status: 'error',
      kind: 'busy',
      message: 'Stage "narration:summary" is still running on this session'
    });

    gate.resolve({ updates: [{ index: 0, comment: 'c', speech: 's' }] });
    expect((await first).status).toBe('success');
    expect(session.ledger.read()).toEqual([{ comment: 'c', speech: 's' }]);
    expect(session.activeStage).toBeNull();
  });

  it('discards a batch that arrives after cancellation', async () => {
    const session = makeSession([{ speech: 'a' }]);
    const gate = deferred<ProducedBatch>();
    const controller = new AbortController();
    const pending = runStage(session, { stage: 'annotation', group: 'annotation', produce: () => gate.promise }, { signal: controller.signal });

    controller.abort();
    gate.resolve({ updates: [{ index: 0, elevenlabs: '[calm] a' }] });
    const run = await pending;

    expect(run).toMatchObject({
      state: 'production_failed',
      kind: 'cancelled',
      message: 'Stage "annotation" was cancelled before its updates were applied'
    });
    expect(session.ledger.read()).toEqual([{ speech: 'a' }]);
    expect(session.activeStage).toBeNull();
  });

  it('does not call the producer when already cancelled', async () => {
    const session = makeSession();
    const produce = vi.fn();
    const controller = new AbortController();
    controller.abort();
    const run = await runStage(session, { stage: 'narration', group: 'narration', produce }, { signal: controller.signal });

    expect(run).toMatchObject({ kind: 'cancelled' });
    expect(produce).not.toHaveBeenCalled();
  });

  it('records audio returned alongside a batch', async () => {
    const session = makeSession([{ speech: 'a' }]);
    const audio = { key: 'voiceover_alloy.mp3', version: 0, mimeType: 'audio/mpeg', kind: 'audio' as const, voice: 'alloy' };
    await runStage(session, { stage: 'duration', group: 'duration', produce: async () => ({ updates: [{ index: 0, duration: '1.00s' }], audio }) });

    expect(session.audio).toEqual(audio);
    expect(describeSession(session)).toMatchObject({
      sceneCount: 1,
      coverage: { comment: 0, speech: 1, elevenlabs: 0, duration: 1, html: 0 },
      audio,
      lastApplied: { stage: 'duration', group: 'duration' }
    });
  });
});

describe('runPipeline', () => {
  it('stops at the first failing stage', async () => {
    const session = makeSession();
    const visual = vi.fn();
    const runs = await runPipeline(session, [
      fixedProducer('narration', [{ index: 0, comment: 'c', speech: 's' }]),
      createAnnotationProducer({ annotator: { annotate: async () => JSON.parse('{"updates": "nope"}') } }),
      { stage: 'visual', group: 'visual', produce: visual }
    ]);

    expect(runs.map((run) => run.state)).toEqual(['applied', 'production_failed']);
    expect(runs[1]).toMatchObject({ kind: 'malformed_output' });
    expect(visual).not.toHaveBeenCalled();
  });
});

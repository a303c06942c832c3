import { StageBusyError, StageCancelledError, toErrorStatus, type ErrorStatus } from '@/lib/pipeline/errors';
import type { ProducedBatch, StageProducer } from '@/lib/producers/types';
import type { Session } from '@/lib/session';
import type { ApplyResult, FieldGroupName } from '@/types/scenes';

export type StageState = 'awaiting_production' | 'produced' | 'applied' | 'production_failed' | 'apply_failed';

type StageInfo = {
  stage: string;
  group: FieldGroupName;
  transitions: StageState[];
};

export type StageSuccess = StageInfo & {
  status: 'success';
  state: 'applied';
  message: string;
  result: ApplyResult;
};

export type StageFailure = StageInfo &
  ErrorStatus & {
    state: 'production_failed' | 'apply_failed';
  };

export type StageRun = StageSuccess | StageFailure;

export type RunStageOptions = {
  signal?: AbortSignal;
};

function assertNotAborted(signal: AbortSignal | undefined, stage: string) {
  if (signal?.aborted) {
    throw new StageCancelledError(stage);
  }
}

/**
 * Runs one stage: the producer proposes a batch, then the ledger applies it.
 * Nothing else can write to the ledger in between, and a failed or cancelled
 * production leaves the ledger untouched.
 */
export async function runStage(session: Session, producer: StageProducer, opts: RunStageOptions = {}): Promise<StageRun> {
  const { stage, group } = producer;
  const transitions: StageState[] = ['awaiting_production'];

  const fail = (state: StageFailure['state'], error: unknown): StageFailure => {
    transitions.push(state);
    const status = toErrorStatus(error);
    console.warn(`[pipeline][stage=${stage}] ${state} kind=${status.kind}: ${status.message}`);
    return { ...status, stage, group, state, transitions };
  };

  if (session.activeStage) {
    return fail('production_failed', new StageBusyError(session.activeStage));
  }

  session.activeStage = stage;
  try {
    let produced: ProducedBatch;
    try {
      assertNotAborted(opts.signal, stage);
      produced = await producer.produce({
        scenes: session.ledger.read(),
        artifacts: session.artifacts,
        grounding: [...session.grounding],
        slides: session.slides,
        signal: opts.signal
      });
      assertNotAborted(opts.signal, stage);
    } catch (err) {
      return fail('production_failed', err);
    }
    transitions.push('produced');
    console.info(`[pipeline][stage=${stage}] produced ${produced?.updates?.length ?? 0} updates`);

    let result: ApplyResult;
    try {
      result = session.ledger.apply(group, produced);
    } catch (err) {
      return fail('apply_failed', err);
    }
    transitions.push('applied');

    if (produced.audio) {
      session.audio = produced.audio;
    }
    session.applied.push({ stage, group, result, appliedAt: new Date().toISOString() });
    console.info(
      `[pipeline][stage=${stage}] applied updated=${result.updatedCount} created=${result.createdCount} skipped=${result.skipped.length}`
    );
    for (const skip of result.skipped) {
      console.warn(`[pipeline][stage=${stage}] skipped ${skip.reason}: ${skip.detail}`);
    }

    return {
      status: 'success',
      stage,
      group,
      state: 'applied',
      transitions,
      result,
      message: `Applied ${result.updatedCount} ${group} updates (${result.createdCount} new scenes, ${result.skipped.length} skipped).`
    };
  } finally {
    session.activeStage = null;
  }
}

/** Runs stages strictly in order, stopping at the first one that fails. */
export async function runPipeline(
  session: Session,
  producers: readonly StageProducer[],
  opts: RunStageOptions = {}
): Promise<StageRun[]> {
  const runs: StageRun[] = [];
  for (const producer of producers) {
    const run = await runStage(session, producer, opts);
    runs.push(run);
    if (run.status === 'error') break;
  }
  return runs;
}

import { AsyncLocalStorage } from 'node:async_hooks';
import { getPricingForModel } from '@/config/pricing';
import { loadPipelineConfig } from '@/config/pipeline';
import { PipelineError } from '@/lib/pipeline/errors';

export type UsageLike = {
  input_tokens?: number | null;
  output_tokens?: number | null;
  total_tokens?: number | null;
};

export type CostEntry = {
  model: string;
  agent: string;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
};

export type CostSummary = {
  totalCostUsd: number;
  inputTokens: number;
  outputTokens: number;
  limitUsd: number;
  byAgent: Record<string, number>;
  entries: CostEntry[];
};

type CostRun = {
  runId: string;
  limitUsd: number;
  totalCostUsd: number;
  entries: CostEntry[];
};

const tracking = new AsyncLocalStorage<CostRun>();
let callCount = 0;

/** Raised from inside a collaborator call, so the stage fails before its batch is applied. */
export class CostLimitError extends PipelineError {
  readonly spentUsd: number;
  readonly limitUsd: number;

  constructor(spentUsd: number, limitUsd: number) {
    super(
      'collaborator',
      `OpenAI cost limit exceeded: $${spentUsd.toFixed(4)} > $${limitUsd.toFixed(4)}`,
      'Raise OPENAI_MAX_COST_USD, then rerun the stage that failed.'
    );
    this.name = 'CostLimitError';
    this.spentUsd = spentUsd;
    this.limitUsd = limitUsd;
  }
}

export function isCostLimitError(error: unknown): error is CostLimitError {
  return error instanceof CostLimitError;
}

export async function runWithCostTracking<T>(
  fn: () => Promise<T> | T,
  { limitUsd = loadPipelineConfig().maxCostUsd }: { limitUsd?: number } = {}
): Promise<{ value: T; cost: CostSummary }> {
  const run: CostRun = {
    runId: Math.random().toString(36).slice(2, 8),
    limitUsd,
    totalCostUsd: 0,
    entries: []
  };
  return tracking.run(run, async () => {
    const value = await fn();
    return { value, cost: summarize(run) };
  });
}

function count(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

// Some endpoints only report a total; split it using whichever side is known.
function splitTokens(usage: UsageLike): { inputTokens: number; outputTokens: number } {
  const input = count(usage.input_tokens);
  const output = count(usage.output_tokens);
  const total = count(usage.total_tokens);
  const inputTokens = input ?? (total === null ? 0 : Math.max(total - (output ?? 0), 0));
  const outputTokens = output ?? (total === null ? 0 : Math.max(total - inputTokens, 0));
  return { inputTokens, outputTokens };
}

/** Adds one call's usage to the current tracked run; a no-op outside `runWithCostTracking`. */
export function recordUsage(model: string, usage: UsageLike, agent = 'unknown'): void {
  const run = tracking.getStore();
  if (!run) return;

  const pricing = getPricingForModel(model);
  const { inputTokens, outputTokens } = splitTokens(usage);
  const costUsd = (inputTokens / 1000) * pricing.input + (outputTokens / 1000) * pricing.output;

  run.entries.push({ model, agent, inputTokens, outputTokens, costUsd });
  run.totalCostUsd += costUsd;
  callCount += 1;
  console.info(
    `[cost][run=${run.runId}][#${callCount}] agent=${agent} model=${model} in=${inputTokens} out=${outputTokens} cost=$${costUsd.toFixed(
      6
    )} run_total=$${run.totalCostUsd.toFixed(6)}`
  );

  if (run.totalCostUsd > run.limitUsd) {
    throw new CostLimitError(run.totalCostUsd, run.limitUsd);
  }
}

function summarize(run: CostRun): CostSummary {
  const byAgent: Record<string, number> = {};
  for (const entry of run.entries) {
    byAgent[entry.agent] = (byAgent[entry.agent] ?? 0) + entry.costUsd;
  }
  return {
    totalCostUsd: run.totalCostUsd,
    inputTokens: run.entries.reduce((sum, entry) => sum + entry.inputTokens, 0),
    outputTokens: run.entries.reduce((sum, entry) => sum + entry.outputTokens, 0),
    limitUsd: run.limitUsd,
    byAgent,
    entries: run.entries
  };
}

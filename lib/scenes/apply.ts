import { PreconditionError } from '@/lib/pipeline/errors';
import { FIELD_GROUPS, validatePatch } from '@/lib/scenes/fieldGroups';
import type { ApplyResult, FieldGroupName, Scene, UpdateBatch } from '@/types/scenes';

export type MergeOutcome = {
  scenes: Scene[];
  result: ApplyResult;
};

/**
 * Merges a stage's update batch into a copy of the scene sequence.
 *
 * Patches apply in batch order, so a later patch for the same index and field wins.
 * Invalid patches are recorded in `result.skipped` and never abort the batch; the
 * only failure is a missing sequence or batch.
 */
export function mergeUpdates(
  scenes: readonly Scene[] | null | undefined,
  group: FieldGroupName,
  batch: UpdateBatch | null | undefined
): MergeOutcome {
  if (!scenes) {
    throw new PreconditionError('Scene ledger is not initialized', 'Start a new session before running stages.');
  }
  if (!batch || !Array.isArray(batch.updates)) {
    throw new PreconditionError(`No ${group} updates were produced`, `Run the ${group} stage to generate updates first.`);
  }

  const spec = FIELD_GROUPS[group];
  const next = scenes.map((scene) => ({ ...scene }));
  const result: ApplyResult = { updatedCount: 0, createdCount: 0, skipped: [] };

  for (const patch of batch.updates) {
    const check = validatePatch(spec, patch, next.length);
    if (!check.ok) {
      result.skipped.push({ patch, reason: check.reason, detail: check.detail });
      continue;
    }

    while (next.length <= check.index) {
      next.push({});
      result.createdCount += 1;
    }

    next[check.index] = { ...next[check.index], ...check.values };
    result.updatedCount += 1;
  }

  return { scenes: next, result };
}

import { z } from 'zod';
import { parseModelJson } from '@/lib/json';
import { MalformedOutputError } from '@/lib/pipeline/errors';
import { isRecord } from '@/lib/scenes/fieldGroups';
import type { UpdateBatch } from '@/types/scenes';

// Items are kept as-is so the apply engine can skip bad ones individually.
export const UpdateBatchSchema = z.object({
  updates: z.array(z.unknown())
});

export function parseUpdateBatch(raw: unknown): UpdateBatch {
  const value = typeof raw === 'string' ? parseModelJson(raw) : raw;
  const parsed = UpdateBatchSchema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedOutputError('Stage output must be an object with an "updates" array');
  }
  return { updates: parsed.data.updates };
}

export type PositionalDraft = {
  index: number;
  comment: unknown;
  speech: unknown;
};

/**
 * Turns a full scene list (as returned by the preset narration modes) into
 * positional narration updates starting at `startIndex`. Values are passed
 * through untouched so the apply engine rejects drafts missing either field.
 */
export function scenesToUpdates(drafts: readonly unknown[], startIndex = 0): PositionalDraft[] {
  return drafts.map((draft, offset) => {
    const scene: Record<string, unknown> = isRecord(draft) ? draft : {};
    return {
      index: startIndex + offset,
      comment: scene.comment,
      speech: scene.speech
    };
  });
}

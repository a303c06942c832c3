import { z } from 'zod';
import { SCENE_FIELDS, type FieldGroupName, type Scene, type SceneField, type SkipReason } from '@/types/scenes';

export const AUTO_DURATION = 'auto';

export const DurationValueSchema = z
  .string()
  .regex(/^(?:auto|\d+(?:\.\d+)?s)$/, 'duration must look like "5.23s" or be "auto"');

export type FieldGroupSpec = {
  name: FieldGroupName;
  fields: readonly SceneField[];
  // Only narration may address an index past the end of the ledger.
  createsScenes: boolean;
  schema: z.ZodType<Scene, z.ZodTypeDef, unknown>;
};

export const FIELD_GROUPS: Record<FieldGroupName, FieldGroupSpec> = {
  narration: {
    name: 'narration',
    fields: ['comment', 'speech'],
    createsScenes: true,
    schema: z.object({ comment: z.string(), speech: z.string() })
  },
  annotation: {
    name: 'annotation',
    fields: ['elevenlabs'],
    createsScenes: false,
    schema: z.object({ elevenlabs: z.string() })
  },
  duration: {
    name: 'duration',
    fields: ['duration'],
    createsScenes: false,
    schema: z.object({ duration: DurationValueSchema })
  },
  visual: {
    name: 'visual',
    fields: ['html'],
    createsScenes: false,
    schema: z.object({ html: z.string() })
  }
};

const IndexSchema = z.number().int().nonnegative();

/** How far past the current end a narration patch may reach; the gap is padded with empty scenes. */
export const MAX_SCENE_GAP = 1000;

export type PatchCheck =
  | { ok: true; index: number; values: Scene }
  | { ok: false; reason: SkipReason; detail: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatDuration(seconds: number): string {
  return `${Math.max(0, seconds).toFixed(2)}s`;
}

export function validatePatch(group: FieldGroupSpec, patch: unknown, ledgerLength: number): PatchCheck {
  if (!isRecord(patch)) {
    return { ok: false, reason: 'invalid_shape', detail: 'patch is not an object' };
  }

  const index = IndexSchema.safeParse(patch.index);
  if (!index.success) {
    return { ok: false, reason: 'invalid_index', detail: `index must be a non-negative integer, got ${JSON.stringify(patch.index ?? null)}` };
  }

  const missing = group.fields.filter((field) => typeof patch[field] === 'undefined');
  if (missing.length) {
    return { ok: false, reason: 'missing_field', detail: `missing ${missing.join(', ')}` };
  }

  const values = group.schema.safeParse(patch);
  if (!values.success) {
    const issue = values.error.issues[0];
    return { ok: false, reason: 'invalid_field', detail: `${issue.path.join('.') || 'patch'}: ${issue.message}` };
  }

  const foreign = SCENE_FIELDS.filter((field) => !group.fields.includes(field) && field in patch);
  if (foreign.length) {
    return { ok: false, reason: 'foreign_field', detail: `${group.name} updates may not write ${foreign.join(', ')}` };
  }

  if (index.data >= ledgerLength && !group.createsScenes) {
    return {
      ok: false,
      reason: 'index_out_of_range',
      detail: `index ${index.data} is beyond the ${ledgerLength} existing scenes`
    };
  }

  if (index.data > ledgerLength + MAX_SCENE_GAP) {
    return {
      ok: false,
      reason: 'index_out_of_range',
      detail: `index ${index.data} is more than ${MAX_SCENE_GAP} past the ${ledgerLength} existing scenes`
    };
  }

  return { ok: true, index: index.data, values: values.data };
}

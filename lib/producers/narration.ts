import { loadGroundingSources, type GroundingSource } from '@/lib/grounding';
import { PreconditionError } from '@/lib/pipeline/errors';
import { parseUpdateBatch, scenesToUpdates } from '@/lib/scenes/batch';
import type { StageProducer } from '@/lib/producers/types';
import type { Scene, UpdateBatch } from '@/types/scenes';

// per_slide: one scene per slide; summary: condense a deck; concept: explain the material's key idea.
export type NarrationMode = 'per_slide' | 'summary' | 'concept';

export type NarrationRequest = {
  mode: NarrationMode;
  sources: GroundingSource[];
  existing: readonly Scene[];
  signal?: AbortSignal;
};

export type NarrationRevisionRequest = {
  instructions: string;
  sources: GroundingSource[];
  existing: readonly Scene[];
  signal?: AbortSignal;
};

export interface NarrationCollaborator {
  /** Ordered `{ comment, speech }` drafts, one per scene. */
  draftScenes(req: NarrationRequest): Promise<unknown[]>;
  /** Index-addressed `{ index, comment, speech }` updates; indices past the end create scenes. */
  reviseScenes(req: NarrationRevisionRequest): Promise<UpdateBatch>;
}

function noGrounding(): PreconditionError {
  return new PreconditionError(
    'No grounding material has been imported for this session',
    'Import slides, a document or markdown before generating narration.'
  );
}

export function createNarrationProducer({
  content,
  mode = 'per_slide',
  startIndex = 0
}: {
  content: NarrationCollaborator;
  mode?: NarrationMode;
  startIndex?: number;
}): StageProducer {
  return {
    stage: `narration:${mode}`,
    group: 'narration',
    async produce(ctx) {
      if (!ctx.grounding.length) {
        throw noGrounding();
      }
      if (mode === 'per_slide' && !ctx.slides) {
        throw new PreconditionError('Per-slide narration needs an imported slide deck', 'Import the slides, or pick the summary or concept mode.');
      }
      const sources = await loadGroundingSources(ctx.artifacts, ctx.grounding);
      const drafts = await content.draftScenes({ mode, sources, existing: ctx.scenes, signal: ctx.signal });
      return { updates: scenesToUpdates(drafts, startIndex) };
    }
  };
}

/** Interactive co-creation: applies the user's instructions to existing scenes or adds new ones. */
export function createNarrationRevisionProducer({
  content,
  instructions
}: {
  content: NarrationCollaborator;
  instructions: string;
}): StageProducer {
  return {
    stage: 'narration:revise',
    group: 'narration',
    async produce(ctx) {
      if (!instructions.trim()) {
        throw new PreconditionError('No revision instructions were given', 'Describe which scenes to add or change.');
      }
      if (!ctx.grounding.length && !ctx.scenes.length) {
        throw noGrounding();
      }
      const sources = await loadGroundingSources(ctx.artifacts, ctx.grounding);
      const batch = await content.reviseScenes({ instructions, sources, existing: ctx.scenes, signal: ctx.signal });
      return parseUpdateBatch(batch);
    }
  };
}

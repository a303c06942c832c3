import { parseUpdateBatch } from '@/lib/scenes/batch';
import { requireSceneFields } from '@/lib/producers/preconditions';
import type { StageProducer } from '@/lib/producers/types';
import type { UpdateBatch } from '@/types/scenes';

export type AnnotationRequest = {
  scenes: { index: number; speech: string }[];
  signal?: AbortSignal;
};

export interface AnnotationCollaborator {
  /** Returns `{ updates: [{ index, elevenlabs }] }`, the speech with expressive audio tags added. */
  annotate(req: AnnotationRequest): Promise<UpdateBatch>;
}

export function createAnnotationProducer({ annotator }: { annotator: AnnotationCollaborator }): StageProducer {
  return {
    stage: 'annotation',
    group: 'annotation',
    async produce(ctx) {
      requireSceneFields(ctx.scenes, { stage: 'audio tagging', fields: ['speech'], ownerStage: 'narration' });
      const scenes = ctx.scenes.map((scene, index) => ({ index, speech: scene.speech ?? '' }));
      return parseUpdateBatch(await annotator.annotate({ scenes, signal: ctx.signal }));
    }
  };
}

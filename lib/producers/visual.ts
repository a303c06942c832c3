import { loadSlides } from '@/lib/grounding';
import { PreconditionError, StageCancelledError } from '@/lib/pipeline/errors';
import { parseUpdateBatch } from '@/lib/scenes/batch';
import { requireSceneFields } from '@/lib/producers/preconditions';
import type { ProducerContext, StageProducer } from '@/lib/producers/types';
import type { UpdateBatch } from '@/types/scenes';

export type IllustrationRequest = {
  comment: string;
  speech: string;
  signal?: AbortSignal;
};

export interface ImageCollaborator {
  /** Returns the image as a `data:image/...;base64,` URI. */
  illustrate(req: IllustrationRequest): Promise<string>;
}

export type CompositionRequest = {
  scenes: { index: number; comment: string; speech: string; duration: string }[];
  instructions: string;
  signal?: AbortSignal;
};

export interface HtmlCollaborator {
  /** Returns `{ updates: [{ index, html }] }`. */
  compose(req: CompositionRequest): Promise<UpdateBatch>;
}

export function imageSlideHtml(src: string): string {
  return `<html><body><img style="width: 100%" src="${src.replace(/"/g, '&quot;')}" /></body></html>`;
}

function requireTimedScenes(ctx: ProducerContext) {
  requireSceneFields(ctx.scenes, { stage: 'visual generation', fields: ['duration'], ownerStage: 'audio synthesis' });
}

/** Reuses the imported deck's slide thumbnails, one per scene. */
export function createSlideVisualProducer(): StageProducer {
  return {
    stage: 'visual:slides',
    group: 'visual',
    async produce(ctx) {
      requireTimedScenes(ctx);
      if (!ctx.slides) {
        throw new PreconditionError('No slide deck was imported for this session', 'Import the slides, or generate images instead.');
      }
      const slides = await loadSlides(ctx.artifacts, ctx.slides);
      if (slides.length !== ctx.scenes.length) {
        throw new PreconditionError(
          `The deck has ${slides.length} slides but there are ${ctx.scenes.length} scenes`,
          'Regenerate narration with exactly one scene per slide.'
        );
      }
      // a slide without a thumbnail yields a patch with no html, which the apply step skips
      return {
        updates: slides.map((slide, index) => ({
          index,
          html: slide.pngBase64 === null ? undefined : imageSlideHtml(slide.pngBase64)
        }))
      };
    }
  };
}

export function createGeneratedVisualProducer({ images }: { images: ImageCollaborator }): StageProducer {
  return {
    stage: 'visual:images',
    group: 'visual',
    async produce(ctx) {
      requireTimedScenes(ctx);
      const updates: { index: number; html: string }[] = [];
      for (const [index, scene] of ctx.scenes.entries()) {
        if (ctx.signal?.aborted) {
          throw new StageCancelledError('visual:images');
        }
        console.info(`[visual][images] scene ${index}: ${scene.comment ?? ''}`);
        const src = await images.illustrate({ comment: scene.comment ?? '', speech: scene.speech ?? '', signal: ctx.signal });
        updates.push({ index, html: imageSlideHtml(src) });
      }
      return { updates };
    }
  };
}

/** Interactive co-creation of HTML slides from the user's instructions. */
export function createCoCreatedVisualProducer({
  composer,
  instructions
}: {
  composer: HtmlCollaborator;
  instructions: string;
}): StageProducer {
  return {
    stage: 'visual:cocreate',
    group: 'visual',
    async produce(ctx) {
      requireTimedScenes(ctx);
      const scenes = ctx.scenes.map((scene, index) => ({
        index,
        comment: scene.comment ?? '',
        speech: scene.speech ?? '',
        duration: scene.duration ?? ''
      }));
      return parseUpdateBatch(await composer.compose({ scenes, instructions, signal: ctx.signal }));
    }
  };
}

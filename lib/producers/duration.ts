import { PreconditionError } from '@/lib/pipeline/errors';
import { AUTO_DURATION, isRecord } from '@/lib/scenes/fieldGroups';
import { requireSceneFields } from '@/lib/producers/preconditions';
import type { ProducedBatch, StageProducer } from '@/lib/producers/types';
import { saveArtifact } from '@/lib/session';
import type { ArtifactStore } from '@/lib/artifacts/store';
import type { AudioArtifactRef, Scene } from '@/types/scenes';

export type SynthesisRequest = {
  segments: { text: string }[];
  voice: string;
  signal?: AbortSignal;
};

export type SynthesisResult = {
  audio: Buffer;
  mimeType: string;
  // aligned with `segments`; an entry without a duration produces no update
  timings: unknown[];
};

export interface SpeechSynthesizer {
  voices(): readonly string[];
  synthesize(req: SynthesisRequest): Promise<SynthesisResult>;
}

export function narrationText(scene: Scene): string {
  return scene.elevenlabs ?? scene.speech ?? '';
}

async function storeAudio(artifacts: ArtifactStore, voice: string, audio: Buffer, mimeType: string): Promise<AudioArtifactRef> {
  const ref = await saveArtifact(artifacts, `voiceover_${voice}.mp3`, audio, mimeType, 'audio');
  return { ...ref, kind: 'audio', voice };
}

export function createDurationProducer({ synthesizer, voice }: { synthesizer: SpeechSynthesizer; voice: string }): StageProducer {
  return {
    stage: 'duration',
    group: 'duration',
    async produce(ctx): Promise<ProducedBatch> {
      requireSceneFields(ctx.scenes, {
        stage: 'audio synthesis',
        fields: ['elevenlabs', 'speech'],
        ownerStage: 'audio tagging'
      });
      const voices = synthesizer.voices();
      if (!voices.includes(voice)) {
        throw new PreconditionError(`Unknown voice "${voice}"`, `Choose one of: ${voices.join(', ')}.`);
      }

      const segments = ctx.scenes.map((scene) => ({ text: narrationText(scene) }));
      const result = await synthesizer.synthesize({ segments, voice, signal: ctx.signal });
      const audio = await storeAudio(ctx.artifacts, voice, result.audio, result.mimeType);

      const updates = result.timings.flatMap((timing, index) =>
        isRecord(timing) && 'duration' in timing ? [{ index, duration: timing.duration }] : []
      );
      return { updates, audio };
    }
  };
}

/** Stores pre-recorded audio and leaves every scene's timing to be derived later. */
export function createPlaceholderDurationProducer({
  audio,
  voice = 'placeholder'
}: {
  audio: Buffer;
  voice?: string;
}): StageProducer {
  return {
    stage: 'duration:placeholder',
    group: 'duration',
    async produce(ctx): Promise<ProducedBatch> {
      if (!ctx.scenes.length) {
        throw new PreconditionError('No scenes exist yet, so audio cannot be attached', 'Run the narration stage first.');
      }
      const ref = await storeAudio(ctx.artifacts, voice, audio, 'audio/mpeg');
      return {
        updates: ctx.scenes.map((_, index) => ({ index, duration: AUTO_DURATION })),
        audio: ref
      };
    }
  };
}

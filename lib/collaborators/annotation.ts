import { callJson } from '@/lib/openai-client';
import { loadPrompt } from '@/lib/prompts';
import { UpdateBatchSchema } from '@/lib/scenes/batch';
import type { AnnotationCollaborator } from '@/lib/producers/annotation';

const AudioTagUpdatesJsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    updates: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        properties: {
          index: { type: 'integer', minimum: 0 },
          elevenlabs: { type: 'string' }
        },
        required: ['index', 'elevenlabs']
      }
    }
  },
  required: ['updates']
} as const;

export function openaiAnnotation({ model }: { model?: string } = {}): AnnotationCollaborator {
  return {
    annotate({ scenes, signal }) {
      return callJson({
        system: loadPrompt('audio-tags.system.md'),
        user: ['SCENES', JSON.stringify(scenes, null, 2)].join('\n'),
        schema: { name: 'AudioTagUpdates', schema: AudioTagUpdatesJsonSchema },
        parser: UpdateBatchSchema,
        temperature: 0.4,
        model,
        agent: 'AudioTags',
        signal
      });
    }
  };
}

import { z } from 'zod';
import { callJson } from '@/lib/openai-client';
import { loadPrompt } from '@/lib/prompts';
import { UpdateBatchSchema } from '@/lib/scenes/batch';
import type { NarrationCollaborator, NarrationMode } from '@/lib/producers/narration';
import { renderScenes, renderSources, sourceFiles } from '@/lib/collaborators/sources';

const SceneListSchema = z.object({
  scenes: z.array(z.unknown())
});

const SceneListJsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    scenes: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        additionalProperties: false,
        properties: {
          comment: { type: 'string' },
          speech: { type: 'string' }
        },
        required: ['comment', 'speech']
      }
    }
  },
  required: ['scenes']
} as const;

const NarrationUpdatesJsonSchema = {
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
          comment: { type: 'string' },
          speech: { type: 'string' }
        },
        required: ['index', 'comment', 'speech']
      }
    }
  },
  required: ['updates']
} as const;

const MODE_PROMPTS: Record<NarrationMode, string> = {
  per_slide: 'narration-per-slide.system.md',
  summary: 'narration-summary.system.md',
  concept: 'narration-concept.system.md'
};

export function openaiNarration({ model }: { model?: string } = {}): NarrationCollaborator {
  return {
    async draftScenes({ mode, sources, existing, signal }) {
      const user = [
        `Mode: ${mode}`,
        `Existing scenes: ${existing.length}`,
        '',
        'SOURCE MATERIAL',
        renderSources(sources) || '[see attached files]'
      ].join('\n');
      const result = await callJson({
        system: loadPrompt(MODE_PROMPTS[mode]),
        user,
        files: sourceFiles(sources),
        schema: { name: 'SceneList', schema: SceneListJsonSchema },
        parser: SceneListSchema,
        model,
        agent: `Narration:${mode}`,
        signal
      });
      return result.scenes;
    },

    async reviseScenes({ instructions, sources, existing, signal }) {
      const user = [
        'CURRENT SCENES',
        renderScenes(existing),
        '',
        'INSTRUCTIONS',
        instructions.trim(),
        '',
        'SOURCE MATERIAL',
        renderSources(sources) || '[none]'
      ].join('\n');
      return callJson({
        system: loadPrompt('narration-revise.system.md'),
        user,
        files: sourceFiles(sources),
        schema: { name: 'NarrationUpdates', schema: NarrationUpdatesJsonSchema },
        parser: UpdateBatchSchema,
        model,
        agent: 'Narration:revise',
        signal
      });
    }
  };
}

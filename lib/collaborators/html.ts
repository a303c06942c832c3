import { callJson } from '@/lib/openai-client';
import { loadPrompt } from '@/lib/prompts';
import { UpdateBatchSchema } from '@/lib/scenes/batch';
import type { HtmlCollaborator } from '@/lib/producers/visual';

const HtmlUpdatesJsonSchema = {
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
          html: { type: 'string' }
        },
        required: ['index', 'html']
      }
    }
  },
  required: ['updates']
} as const;

export function openaiHtml({ model }: { model?: string } = {}): HtmlCollaborator {
  return {
    compose({ scenes, instructions, signal }) {
      const user = [
        'SCENES',
        JSON.stringify(scenes, null, 2),
        '',
        'INSTRUCTIONS',
        instructions.trim() || 'Create one clean, readable slide per scene.'
      ].join('\n');
      return callJson({
        system: loadPrompt('html-slides.system.md'),
        user,
        schema: { name: 'HtmlUpdates', schema: HtmlUpdatesJsonSchema },
        parser: UpdateBatchSchema,
        model,
        agent: 'HtmlSlides',
        signal
      });
    }
  };
}

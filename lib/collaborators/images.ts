import { loadPipelineConfig } from '@/config/pipeline';
import { getOpenAI, toCollaboratorError } from '@/lib/openai-client';
import { loadPrompt } from '@/lib/prompts';
import { CollaboratorError } from '@/lib/pipeline/errors';
import type { ImageCollaborator } from '@/lib/producers/visual';

export function openaiImages({ model }: { model?: string } = {}): ImageCollaborator {
  const imageModel = model ?? loadPipelineConfig().imageModel;
  return {
    async illustrate({ comment, speech, signal }) {
      const prompt = [
        loadPrompt('scene-image.system.md'),
        '',
        `Scene context: ${comment}.`,
        `Narration: "${speech}"`
      ].join('\n');
      let b64: string | undefined;
      try {
        const res = await getOpenAI().images.generate({ model: imageModel, prompt, size: '1536x1024', n: 1 }, { signal });
        b64 = res.data?.[0]?.b64_json;
      } catch (err) {
        throw toCollaboratorError(err, 'images');
      }
      if (!b64) {
        throw new CollaboratorError('OpenAI images returned no image data');
      }
      return `data:image/png;base64,${b64}`;
    }
  };
}

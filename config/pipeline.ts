import { join } from 'node:path';
import { z } from 'zod';

const EffortSchema = z.enum(['low', 'medium', 'high']);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-5'),
  OPENAI_REASONING_EFFORT: EffortSchema.catch('medium').default('medium'),
  OPENAI_TTS_MODEL: z.string().default('gpt-4o-mini-tts'),
  OPENAI_TTS_VOICE: z.string().default('alloy'),
  OPENAI_IMAGE_MODEL: z.string().default('gpt-image-1'),
  OPENAI_MAX_COST_USD: z.coerce.number().nonnegative().optional().catch(undefined),
  VIDEO_STORAGE_DIR: z.string().optional(),
  NARRATION_WPM: z.coerce.number().min(80).max(240).catch(150).default(150)
});

export type PipelineConfig = {
  apiKey?: string;
  model: string;
  reasoningEffort: z.infer<typeof EffortSchema>;
  ttsModel: string;
  ttsVoice: string;
  imageModel: string;
  maxCostUsd: number;
  storageDir: string;
  wordsPerMinute: number;
};

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = EnvSchema.parse(env);
  return {
    apiKey: parsed.OPENAI_API_KEY || undefined,
    model: parsed.OPENAI_MODEL,
    reasoningEffort: parsed.OPENAI_REASONING_EFFORT,
    ttsModel: parsed.OPENAI_TTS_MODEL,
    ttsVoice: parsed.OPENAI_TTS_VOICE,
    imageModel: parsed.OPENAI_IMAGE_MODEL,
    maxCostUsd: parsed.OPENAI_MAX_COST_USD ?? Number.POSITIVE_INFINITY,
    storageDir: parsed.VIDEO_STORAGE_DIR || join(process.cwd(), '.video-artifacts'),
    wordsPerMinute: parsed.NARRATION_WPM
  };
}

import { loadPipelineConfig } from '@/config/pipeline';
import { getOpenAI, toCollaboratorError } from '@/lib/openai-client';
import { StageCancelledError } from '@/lib/pipeline/errors';
import { AUTO_DURATION, formatDuration } from '@/lib/scenes/fieldGroups';
import type { SpeechSynthesizer } from '@/lib/producers/duration';

export const OPENAI_VOICES = ['alloy', 'ash', 'coral', 'echo', 'fable', 'onyx', 'nova', 'sage', 'shimmer'] as const;

type OpenAIVoice = (typeof OPENAI_VOICES)[number];

function isOpenAIVoice(voice: string): voice is OpenAIVoice {
  return OPENAI_VOICES.some((v) => v === voice);
}

export type SpeechOptions = {
  model?: string;
  concurrency?: number;
  retries?: number;
  // 'auto' leaves timing to the renderer; 'estimate' derives it from the speaking rate
  timing?: 'auto' | 'estimate';
  wordsPerMinute?: number;
};

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/** Audio tags such as `[short pause]` are read aloud by OpenAI voices, so they are dropped. */
export function stripAudioTags(text: string): string {
  return text.replace(/\[[^\]]*\]/g, ' ').replace(/\s+/g, ' ').trim();
}

export function estimateDuration(text: string, wordsPerMinute: number): string {
  const words = stripAudioTags(text).split(/\s+/).filter(Boolean).length || 1;
  return formatDuration(Math.max(1, (words / Math.max(80, wordsPerMinute)) * 60));
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function openaiSpeech(options: SpeechOptions = {}): SpeechSynthesizer {
  const config = loadPipelineConfig();
  const model = options.model ?? config.ttsModel;
  const retries = Math.max(1, options.retries ?? 3);
  const wordsPerMinute = options.wordsPerMinute ?? config.wordsPerMinute;

  async function synthesizeOne(text: string, voice: OpenAIVoice, signal?: AbortSignal): Promise<Buffer> {
    let attempt = 0;
    let lastError: unknown;
    while (attempt < retries) {
      attempt += 1;
      try {
        const response = await getOpenAI().audio.speech.create(
          { model, voice, input: stripAudioTags(text) || '.', response_format: 'mp3' },
          { signal }
        );
        return Buffer.from(await response.arrayBuffer());
      } catch (err) {
        lastError = err;
        const status = statusOf(err);
        if (signal?.aborted || attempt >= retries || (status && status < 500 && status !== 429)) {
          break;
        }
        await sleep(Math.min(8000, 500 * 2 ** (attempt - 1)));
      }
    }
    throw toCollaboratorError(lastError, 'speech');
  }

  return {
    voices: () => OPENAI_VOICES,

    async synthesize({ segments, voice, signal }) {
      if (!isOpenAIVoice(voice)) {
        throw toCollaboratorError(new Error(`voice ${voice} is not supported`), 'speech');
      }
      const concurrency = Math.max(1, Math.min(options.concurrency ?? 3, 8));
      const queue = segments.map((segment, index) => ({ segment, index }));
      const parts: Buffer[] = Array.from({ length: segments.length }, () => Buffer.alloc(0));

      // once any segment fails the stage is lost, so the other workers stop taking work
      let failed = false;
      const workers = Array.from({ length: concurrency }, async () => {
        while (queue.length && !failed) {
          const item = queue.shift();
          if (!item) break;
          try {
            if (signal?.aborted) throw new StageCancelledError('duration');
            parts[item.index] = await synthesizeOne(item.segment.text, voice, signal);
          } catch (err) {
            failed = true;
            throw err;
          }
          console.info(`[tts] segment ${item.index + 1}/${segments.length} voice=${voice}`);
        }
      });
      await Promise.all(workers);

      // mp3 frames concatenate into one playable stream
      return {
        audio: Buffer.concat(parts),
        mimeType: 'audio/mpeg',
        timings: segments.map((segment) => ({
          duration: options.timing === 'estimate' ? estimateDuration(segment.text, wordsPerMinute) : AUTO_DURATION
        }))
      };
    }
  };
}

import type { GroundingSource } from '@/lib/grounding';
import type { InputFile } from '@/lib/openai-client';
import type { Scene } from '@/types/scenes';

const MAX_SOURCE_CHARS = 16000;

export function renderSources(sources: GroundingSource[]): string {
  const parts = sources
    .filter((source) => source.text)
    .map((source) => `### ${source.ref.key}\n${(source.text ?? '').trim()}`);
  const joined = parts.join('\n\n');
  return joined.length > MAX_SOURCE_CHARS ? joined.slice(0, MAX_SOURCE_CHARS) : joined;
}

export function sourceFiles(sources: GroundingSource[]): InputFile[] {
  return sources.flatMap((source) => (source.file ? [source.file] : []));
}

export function renderScenes(scenes: readonly Scene[]): string {
  if (!scenes.length) return '[no scenes yet]';
  return JSON.stringify(
    scenes.map((scene, index) => ({ index, comment: scene.comment ?? null, speech: scene.speech ?? null })),
    null,
    2
  );
}

import { readFileSync } from 'node:fs';
import { join } from 'node:path';

const cache = new Map<string, string>();

export function loadPrompt(name: string): string {
  const cached = cache.get(name);
  if (cached !== undefined) {
    return cached;
  }
  const full = join(process.cwd(), 'prompts', name);
  const text = readFileSync(full, 'utf-8').trim();
  cache.set(name, text);
  return text;
}

#!/usr/bin/env tsx
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { loadPipelineConfig } from '@/config/pipeline';
import { FileArtifactStore } from '@/lib/artifacts/fileStore';
import { openaiAnnotation } from '@/lib/collaborators/annotation';
import { openaiHtml } from '@/lib/collaborators/html';
import { openaiImages } from '@/lib/collaborators/images';
import { openaiNarration } from '@/lib/collaborators/narration';
import { openaiSpeech } from '@/lib/collaborators/speech';
import { runWithCostTracking } from '@/lib/cost-tracker';
import { exportVideo } from '@/lib/export';
import { importMarkdown, importPdf } from '@/lib/grounding';
import { runPipeline } from '@/lib/pipeline/runner';
import { createAnnotationProducer } from '@/lib/producers/annotation';
import { createDurationProducer } from '@/lib/producers/duration';
import { createNarrationProducer, type NarrationMode } from '@/lib/producers/narration';
import { createCoCreatedVisualProducer, createGeneratedVisualProducer } from '@/lib/producers/visual';
import { createSession, describeSession } from '@/lib/session';

function flag(args: string[], name: string): string | undefined {
  const hit = args.find((arg) => arg.startsWith(`--${name}=`));
  return hit ? hit.slice(name.length + 3) : undefined;
}

async function main() {
  const args = process.argv.slice(2);
  const file = args.find((arg) => !arg.startsWith('--'));
  if (!file) {
    console.error('Usage: npm run video -- <lesson.md|lesson.pdf> [--mode=summary|concept] [--voice=alloy] [--visual=images|html] [--instructions=...]');
    process.exit(1);
  }

  const config = loadPipelineConfig();
  const modeArg = flag(args, 'mode');
  const mode: NarrationMode = modeArg === 'concept' ? 'concept' : 'summary';
  const voice = flag(args, 'voice') ?? config.ttsVoice;
  const visual = flag(args, 'visual') === 'html' ? 'html' : 'images';
  const instructions = flag(args, 'instructions') ?? '';

  const session = createSession({ artifacts: new FileArtifactStore(config.storageDir) });
  const bytes = await readFile(file);
  if (file.toLowerCase().endsWith('.pdf')) {
    await importPdf(session, basename(file), bytes);
  } else {
    await importMarkdown(session, basename(file), bytes.toString('utf8'));
  }

  const { value, cost } = await runWithCostTracking(async () => {
    const runs = await runPipeline(session, [
      createNarrationProducer({ content: openaiNarration(), mode }),
      createAnnotationProducer({ annotator: openaiAnnotation() }),
      createDurationProducer({ synthesizer: openaiSpeech({ timing: 'estimate' }), voice }),
      visual === 'html'
        ? createCoCreatedVisualProducer({ composer: openaiHtml(), instructions })
        : createGeneratedVisualProducer({ images: openaiImages() })
    ]);
    const failed = runs.find((run) => run.status === 'error');
    if (failed) {
      return { runs, exported: null };
    }
    return { runs, exported: await exportVideo(session) };
  });

  for (const run of value.runs) {
    console.error(`${run.stage}: ${run.status === 'success' ? run.message : `${run.message} -> ${run.nextStep}`}`);
  }
  console.error(`Estimated cost: $${cost.totalCostUsd.toFixed(4)} (${cost.inputTokens + cost.outputTokens} tokens)`);
  console.log(JSON.stringify({ session: describeSession(session), export: value.exported }, null, 2));
  if (!value.exported || value.exported.status === 'error') {
    process.exit(1);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

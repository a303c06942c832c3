import { PreconditionError, toErrorStatus, type ErrorStatus } from '@/lib/pipeline/errors';
import { requireSceneFields } from '@/lib/producers/preconditions';
import { saveArtifact, type Session } from '@/lib/session';
import type { ArtifactRef, VideoExport } from '@/types/scenes';

export const EXPORT_KEY = 'final_video_export.json';

export type ExportStatus =
  | { status: 'success'; message: string; export: ArtifactRef; sceneCount: number }
  | ErrorStatus;

export async function buildVideoExport(session: Session): Promise<VideoExport> {
  const scenes = session.ledger.read();
  requireSceneFields(scenes, { stage: 'export', fields: ['html'], ownerStage: 'visual' });

  if (!session.audio) {
    throw new PreconditionError('No narration audio has been synthesized', 'Run the audio synthesis stage first.');
  }
  const { bytes, mimeType } = await session.artifacts.load(session.audio.key, session.audio.version);
  if (mimeType !== 'audio/mpeg') {
    throw new PreconditionError(`Unexpected audio mime type ${mimeType}`, 'Re-run audio synthesis with mp3 output.');
  }

  return {
    scenes,
    audio: `data:audio/mpeg;base64,${bytes.toString('base64')}`
  };
}

/** Snapshots the ledger plus audio into the final JSON artifact. */
export async function exportVideo(session: Session): Promise<ExportStatus> {
  try {
    const bundle = await buildVideoExport(session);
    const json = JSON.stringify(bundle, null, 2);
    const ref = await saveArtifact(session.artifacts, EXPORT_KEY, Buffer.from(json, 'utf8'), 'application/json', 'json');
    session.finalExport = ref;
    console.info(`[pipeline][export] saved ${ref.key}@v${ref.version} scenes=${bundle.scenes.length}`);
    return {
      status: 'success',
      message: `Saved the video export with ${bundle.scenes.length} scenes.`,
      export: ref,
      sceneCount: bundle.scenes.length
    };
  } catch (err) {
    const status = toErrorStatus(err);
    console.warn(`[pipeline][export] ${status.kind}: ${status.message}`);
    return status;
  }
}

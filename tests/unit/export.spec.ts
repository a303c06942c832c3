import { describe, it, expect } from 'vitest';
import { EXPORT_KEY, exportVideo } from '@/lib/export';
import { saveArtifact } from '@/lib/session';
import type { Scene } from '@/types/scenes';
import { makeSession } from '../helpers/session';

const readyScenes: Scene[] = [
  { comment: 'Intro', speech: 'Hi.', elevenlabs: '[warm] Hi.', duration: '1.00s', html: '<div>1</div>' },
  { comment: 'Outro', speech: 'Bye.', duration: 'auto', html: '<div>2</div>' }
];

async function attachAudio(session: ReturnType<typeof makeSession>, bytes: string, mimeType = 'audio/mpeg') {
  const ref = await saveArtifact(session.artifacts, 'voiceover_alloy.mp3', Buffer.from(bytes), mimeType, 'audio');
  session.audio = { ...ref, kind: 'audio', voice: 'alloy' };
}

describe('exportVideo', () => {
  it('bundles the scenes with the audio as a data uri', async () => {
    const session = makeSession(readyScenes);
    await attachAudio(session, 'mp3-bytes');

    const status = await exportVideo(session);

    expect(status).toEqual({
      status: 'success',
      message: 'Saved the video export with 2 scenes.',
      export: { key: EXPORT_KEY, version: 0, mimeType: 'application/json', kind: 'json' },
      sceneCount: 2
    });
    const stored = await session.artifacts.load(EXPORT_KEY);
    expect(JSON.parse(stored.bytes.toString('utf8'))).toEqual({
      scenes: readyScenes,
      audio: `data:audio/mpeg;base64,${Buffer.from('mp3-bytes').toString('base64')}`
    });
    expect(session.finalExport?.version).toBe(0);
  });

  it('uses the audio version recorded on the session', async () => {
    const session = makeSession(readyScenes);
    await attachAudio(session, 'first take');
    const firstTake = session.audio;
    await attachAudio(session, 'second take');
    session.audio = firstTake;

    await exportVideo(session);
    const stored = await session.artifacts.load(EXPORT_KEY);

    expect(JSON.parse(stored.bytes.toString('utf8')).audio).toBe(
      `data:audio/mpeg;base64,${Buffer.from('first take').toString('base64')}`
    );
  });

  it('asks for visuals when a scene has no html', async () => {
    const session = makeSession([readyScenes[0], { speech: 'Bye.', duration: 'auto' }]);
    await attachAudio(session, 'mp3-bytes');

    expect(await exportVideo(session)).toEqual({
      status: 'error',
      kind: 'precondition',
      message: 'Scenes 1 have no html, so export cannot run',
      nextStep: 'Run the visual stage first.'
    });
    expect(await session.artifacts.list()).toEqual(['voiceover_alloy.mp3']);
  });

  it('asks for audio when none was synthesized', async () => {
    const session = makeSession(readyScenes);

    expect(await exportVideo(session)).toMatchObject({
      status: 'error',
      kind: 'precondition',
      message: 'No narration audio has been synthesized'
    });
    expect(session.finalExport).toBeUndefined();
  });

  it('rejects audio that is not mp3', async () => {
    const session = makeSession(readyScenes);
    await attachAudio(session, 'RIFF', 'audio/wav');

    expect(await exportVideo(session)).toMatchObject({ kind: 'precondition', message: 'Unexpected audio mime type audio/wav' });
  });
});

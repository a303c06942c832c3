import { randomUUID } from 'node:crypto';
import type { ArtifactStore } from '@/lib/artifacts/store';
import { SceneLedger } from '@/lib/scenes/ledger';
import type {
  ApplyResult,
  ArtifactKind,
  ArtifactRef,
  AudioArtifactRef,
  FieldGroupName,
  SceneField
} from '@/types/scenes';

export type AppliedLogEntry = {
  stage: string;
  group: FieldGroupName;
  result: ApplyResult;
  appliedAt: string;
};

/**
 * Everything one video-building session owns. Passed explicitly to every stage;
 * at most one stage runs against it at a time (see `activeStage`).
 */
export type Session = {
  id: string;
  ledger: SceneLedger;
  artifacts: ArtifactStore;
  grounding: ArtifactRef[];
  slides?: ArtifactRef;
  audio?: AudioArtifactRef;
  finalExport?: ArtifactRef;
  applied: AppliedLogEntry[];
  activeStage: string | null;
};

export function createSession({ artifacts, id, ledger }: { artifacts: ArtifactStore; id?: string; ledger?: SceneLedger }): Session {
  return {
    id: id ?? `ses_${randomUUID().slice(0, 8)}`,
    ledger: ledger ?? new SceneLedger(),
    artifacts,
    grounding: [],
    applied: [],
    activeStage: null
  };
}

export async function saveArtifact(
  artifacts: ArtifactStore,
  key: string,
  bytes: Uint8Array,
  mimeType: string,
  kind: ArtifactKind
): Promise<ArtifactRef> {
  const version = await artifacts.save(key, bytes, mimeType);
  return { key, version, mimeType, kind };
}

export type SessionSummary = {
  id: string;
  sceneCount: number;
  coverage: Record<SceneField, number>;
  grounding: ArtifactRef[];
  slides: ArtifactRef | null;
  audio: AudioArtifactRef | null;
  finalExport: ArtifactRef | null;
  activeStage: string | null;
  lastApplied: AppliedLogEntry | null;
};

export function describeSession(session: Session): SessionSummary {
  const scenes = session.ledger.read();
  const count = (field: SceneField) => scenes.filter((scene) => typeof scene[field] === 'string').length;
  const coverage: Record<SceneField, number> = {
    comment: count('comment'),
    speech: count('speech'),
    elevenlabs: count('elevenlabs'),
    duration: count('duration'),
    html: count('html')
  };
  return {
    id: session.id,
    sceneCount: scenes.length,
    coverage,
    grounding: [...session.grounding],
    slides: session.slides ?? null,
    audio: session.audio ?? null,
    finalExport: session.finalExport ?? null,
    activeStage: session.activeStage,
    lastApplied: session.applied[session.applied.length - 1] ?? null
  };
}

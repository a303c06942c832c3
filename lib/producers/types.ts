import type { ArtifactStore } from '@/lib/artifacts/store';
import type { ArtifactRef, AudioArtifactRef, FieldGroupName, Scene, UpdateBatch } from '@/types/scenes';

/** Read-only view of the session handed to a producer. */
export type ProducerContext = {
  scenes: readonly Scene[];
  artifacts: ArtifactStore;
  grounding: readonly ArtifactRef[];
  slides?: ArtifactRef;
  signal?: AbortSignal;
};

export type ProducedBatch = UpdateBatch & {
  // Set by stages that also store synthesized narration audio.
  audio?: AudioArtifactRef;
};

export interface StageProducer {
  stage: string;
  group: FieldGroupName;
  produce(ctx: ProducerContext): Promise<ProducedBatch>;
}

import { PreconditionError } from '@/lib/pipeline/errors';
import type { Scene, SceneField } from '@/types/scenes';

type Requirement = {
  stage: string;
  // any one of these fields satisfies the requirement
  fields: readonly SceneField[];
  ownerStage: string;
};

/** Throws when the ledger is empty or a scene lacks every field in `fields`. */
export function requireSceneFields(scenes: readonly Scene[], { stage, fields, ownerStage }: Requirement): void {
  if (!scenes.length) {
    throw new PreconditionError(`No scenes exist yet, so ${stage} cannot run`, `Run the ${ownerStage} stage first.`);
  }
  const missing = scenes
    .map((scene, index) => ({ scene, index }))
    .filter(({ scene }) => !fields.some((field) => typeof scene[field] === 'string'))
    .map(({ index }) => index);
  if (missing.length) {
    throw new PreconditionError(
      `Scenes ${missing.join(', ')} have no ${fields.join(' or ')}, so ${stage} cannot run`,
      `Run the ${ownerStage} stage first.`
    );
  }
}

import { z } from 'zod';
import { mergeUpdates } from '@/lib/scenes/apply';
import { SCENE_FIELDS, type ApplyResult, type FieldGroupName, type Scene, type UpdateBatch } from '@/types/scenes';

const SceneSnapshotSchema = z.array(
  z.object({
    comment: z.string().optional(),
    speech: z.string().optional(),
    elevenlabs: z.string().optional(),
    duration: z.string().optional(),
    html: z.string().optional()
  })
);

function copyScene(scene: Scene): Scene {
  return { ...scene };
}

/**
 * Ordered, growable sequence of scene records shared by every stage.
 *
 * Reads hand out copies; `apply` is the single write path.
 */
export class SceneLedger {
  private scenes: Scene[] = [];

  static restore(snapshot: unknown): SceneLedger {
    const ledger = new SceneLedger();
    ledger.scenes = SceneSnapshotSchema.parse(snapshot).map((scene) => {
      const out: Scene = {};
      for (const field of SCENE_FIELDS) {
        const value = scene[field];
        if (typeof value === 'string') out[field] = value;
      }
      return out;
    });
    return ledger;
  }

  read(): Scene[] {
    return this.scenes.map(copyScene);
  }

  length(): number {
    return this.scenes.length;
  }

  at(index: number): Scene | null {
    const scene = this.scenes[index];
    return scene ? copyScene(scene) : null;
  }

  apply(group: FieldGroupName, batch: UpdateBatch | null | undefined): ApplyResult {
    const { scenes, result } = mergeUpdates(this.scenes, group, batch);
    this.scenes = scenes;
    return result;
  }

  toJSON(): Scene[] {
    return this.read();
  }
}

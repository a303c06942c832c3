export const SCENE_FIELDS = ['comment', 'speech', 'elevenlabs', 'duration', 'html'] as const;

export type SceneField = (typeof SCENE_FIELDS)[number];

// Position in the ledger is the scene's index; it is never stored on the record.
export type Scene = Partial<Record<SceneField, string>>;

export type FieldGroupName = 'narration' | 'annotation' | 'duration' | 'visual';

export type NarrationUpdate = { index: number; comment: string; speech: string };
export type AnnotationUpdate = { index: number; elevenlabs: string };
export type DurationUpdate = { index: number; duration: string };
export type VisualUpdate = { index: number; html: string };

export type UpdateFor = {
  narration: NarrationUpdate;
  annotation: AnnotationUpdate;
  duration: DurationUpdate;
  visual: VisualUpdate;
};

// Wire format of a stage's proposals. Items stay unknown until the apply engine validates them.
export type UpdateBatch = {
  updates: readonly unknown[];
};

export type SkipReason =
  | 'invalid_shape'
  | 'invalid_index'
  | 'missing_field'
  | 'invalid_field'
  | 'foreign_field'
  | 'index_out_of_range';

export type SkippedPatch = {
  patch: unknown;
  reason: SkipReason;
  detail: string;
};

export type ApplyResult = {
  updatedCount: number;
  createdCount: number;
  skipped: SkippedPatch[];
};

export type ArtifactKind = 'pdf' | 'json' | 'markdown' | 'audio';

export type ArtifactRef = {
  key: string;
  version: number;
  mimeType: string;
  kind: ArtifactKind;
};

export type AudioArtifactRef = ArtifactRef & {
  kind: 'audio';
  voice: string;
};

export type SlideImage = {
  notes: string;
  pngBase64: string | null;
};

export type VideoExport = {
  scenes: Scene[];
  audio: string;
};

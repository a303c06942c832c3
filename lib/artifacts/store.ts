import { PreconditionError } from '@/lib/pipeline/errors';

export type StoredArtifact = {
  bytes: Buffer;
  mimeType: string;
};

export interface ArtifactStore {
  /** Stores a new version under `key` and returns its version number. */
  save(key: string, bytes: Uint8Array, mimeType: string): Promise<number>;
  /** Loads a version, or the latest one when `version` is omitted. */
  load(key: string, version?: number): Promise<StoredArtifact>;
  list(): Promise<string[]>;
  versions(key: string): Promise<number[]>;
}

export function missingArtifact(key: string, version?: number): PreconditionError {
  const label = typeof version === 'number' ? `${key}@v${version}` : key;
  return new PreconditionError(`Artifact ${label} not found`, 'Re-run the stage that saves this artifact.');
}

export class MemoryArtifactStore implements ArtifactStore {
  private readonly entries = new Map<string, StoredArtifact[]>();

  async save(key: string, bytes: Uint8Array, mimeType: string): Promise<number> {
    const history = this.entries.get(key) ?? [];
    history.push({ bytes: Buffer.from(bytes), mimeType });
    this.entries.set(key, history);
    return history.length - 1;
  }

  async load(key: string, version?: number): Promise<StoredArtifact> {
    const history = this.entries.get(key);
    const entry = history?.[version ?? history.length - 1];
    if (!entry) {
      throw missingArtifact(key, version);
    }
    return { bytes: Buffer.from(entry.bytes), mimeType: entry.mimeType };
  }

  async list(): Promise<string[]> {
    return [...this.entries.keys()].sort();
  }

  async versions(key: string): Promise<number[]> {
    return (this.entries.get(key) ?? []).map((_, idx) => idx);
  }
}

import { createHash } from 'node:crypto';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { missingArtifact, type ArtifactStore, type StoredArtifact } from '@/lib/artifacts/store';
import { PreconditionError } from '@/lib/pipeline/errors';

const MetaSchema = z.object({
  key: z.string(),
  versions: z.array(z.object({ version: z.number().int().nonnegative(), mimeType: z.string() }))
});

type ArtifactMeta = z.infer<typeof MetaSchema>;

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

const PLAIN_KEY = /^[a-z0-9][a-z0-9._-]*$/i;

// Keys that need escaping get a hash suffix, so "a/b" and "a_b" never share a directory.
function dirName(key: string): string {
  if (PLAIN_KEY.test(key)) return key;
  const digest = createHash('sha256').update(key).digest('hex').slice(0, 12);
  return `${key.replace(/[^a-z0-9._-]+/gi, '_')}-${digest}`;
}

/**
 * Artifact store on disk: `<root>/<key>/v<version>.bin` with a `meta.json` index per key.
 */
export class FileArtifactStore implements ArtifactStore {
  constructor(private readonly root: string) {}

  private dirFor(key: string): string {
    return join(this.root, dirName(key));
  }

  private async readMeta(dir: string): Promise<ArtifactMeta | null> {
    try {
      const data = await readFile(join(dir, 'meta.json'), 'utf8');
      return MetaSchema.parse(JSON.parse(data));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  // meta.json written for a different key means the directory is not ours
  private async readMetaFor(key: string, dir: string): Promise<ArtifactMeta | null> {
    const meta = await this.readMeta(dir);
    return meta && meta.key === key ? meta : null;
  }

  async save(key: string, bytes: Uint8Array, mimeType: string): Promise<number> {
    const dir = this.dirFor(key);
    await mkdir(dir, { recursive: true });
    const existing = await this.readMeta(dir);
    if (existing && existing.key !== key) {
      throw new PreconditionError(
        `Artifact key ${key} maps to the directory of ${existing.key}`,
        'Save the artifact under a different key.'
      );
    }
    const meta = existing ?? { key, versions: [] };
    const version = meta.versions.length;
    await writeFile(join(dir, `v${version}.bin`), bytes);
    meta.versions.push({ version, mimeType });
    await writeFile(join(dir, 'meta.json'), JSON.stringify(meta, null, 2), 'utf8');
    return version;
  }

  async load(key: string, version?: number): Promise<StoredArtifact> {
    const dir = this.dirFor(key);
    const meta = await this.readMetaFor(key, dir);
    const entry = meta?.versions[version ?? meta.versions.length - 1];
    if (!meta || !entry) {
      throw missingArtifact(key, version);
    }
    const bytes = await readFile(join(dir, `v${entry.version}.bin`));
    return { bytes, mimeType: entry.mimeType };
  }

  async list(): Promise<string[]> {
    let dirs: string[];
    try {
      dirs = await readdir(this.root);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    const keys: string[] = [];
    for (const name of dirs) {
      const meta = await this.readMeta(join(this.root, name));
      if (meta) keys.push(meta.key);
    }
    return keys.sort();
  }

  async versions(key: string): Promise<number[]> {
    const dir = this.dirFor(key);
    const meta = await this.readMetaFor(key, dir);
    return meta ? meta.versions.map((v) => v.version) : [];
  }
}

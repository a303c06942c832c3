import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileArtifactStore } from '@/lib/artifacts/fileStore';
import { MemoryArtifactStore, type ArtifactStore } from '@/lib/artifacts/store';
import { importMarkdown, importPdf, listGrounding } from '@/lib/grounding';
import { PreconditionError } from '@/lib/pipeline/errors';
import { makeSession } from '../helpers/session';

function storeContract(name: string, create: () => Promise<ArtifactStore>) {
  describe(name, () => {
    it('versions repeated saves under the same key', async () => {
      const store = await create();
      expect(await store.save('notes.md', Buffer.from('v0'), 'text/markdown')).toBe(0);
      expect(await store.save('notes.md', Buffer.from('v1'), 'text/markdown')).toBe(1);

      expect((await store.load('notes.md')).bytes.toString('utf8')).toBe('v1');
      expect((await store.load('notes.md', 0)).bytes.toString('utf8')).toBe('v0');
      expect(await store.versions('notes.md')).toEqual([0, 1]);
    });

    it('lists keys in order', async () => {
      const store = await create();
      await store.save('voiceover_alloy.mp3', Buffer.from('a'), 'audio/mpeg');
      await store.save('deck.slides.json', Buffer.from('[]'), 'application/json');

      expect(await store.list()).toEqual(['deck.slides.json', 'voiceover_alloy.mp3']);
      expect((await store.load('deck.slides.json')).mimeType).toBe('application/json');
    });

    it('reports missing artifacts as a precondition', async () => {
      const store = await create();
      await store.save('a.md', Buffer.from('x'), 'text/markdown');

      await expect(store.load('missing.md')).rejects.toBeInstanceOf(PreconditionError);
      await expect(store.load('a.md', 3)).rejects.toThrow('Artifact a.md@v3 not found');
      expect(await store.versions('missing.md')).toEqual([]);
    });
  });
}

storeContract('MemoryArtifactStore', async () => new MemoryArtifactStore());

describe('FileArtifactStore', () => {
  let root = '';

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'video-artifacts-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  storeContract('on disk', async () => new FileArtifactStore(root));

  it('reads what another instance wrote', async () => {
    await new FileArtifactStore(root).save('final_video_export.json', Buffer.from('{}'), 'application/json');
    const reopened = new FileArtifactStore(root);

    expect(await reopened.list()).toEqual(['final_video_export.json']);
    expect((await reopened.load('final_video_export.json')).bytes.toString('utf8')).toBe('{}');
  });

  it('keeps keys apart that only differ in escaped characters', async () => {
    const store = new FileArtifactStore(root);
    await store.save('lesson/intro.md', Buffer.from('nested'), 'text/markdown');

    await expect(store.load('lesson_intro.md')).rejects.toThrow('Artifact lesson_intro.md not found');
    expect(await store.versions('lesson_intro.md')).toEqual([]);

    expect(await store.save('lesson_intro.md', Buffer.from('flat'), 'text/markdown')).toBe(0);
    expect((await store.load('lesson/intro.md')).bytes.toString('utf8')).toBe('nested');
    expect((await store.load('lesson_intro.md')).bytes.toString('utf8')).toBe('flat');
    expect(await store.list()).toEqual(['lesson/intro.md', 'lesson_intro.md']);
  });

  it('never writes outside its root for dot keys', async () => {
    const store = new FileArtifactStore(join(root, 'store'));
    await store.save('..', Buffer.from('x'), 'text/plain');

    expect(await readdir(root)).toEqual(['store']);
    expect(await store.list()).toEqual(['..']);
    expect((await store.load('..')).bytes.toString('utf8')).toBe('x');
  });

  it('lists nothing when the root does not exist yet', async () => {
    expect(await new FileArtifactStore(join(root, 'nope')).list()).toEqual([]);
  });
});

describe('importPdf', () => {
  it('refuses bytes that are not a pdf', async () => {
    const session = makeSession();
    await expect(importPdf(session, 'Lesson', Buffer.from('<html>login</html>'))).rejects.toThrow('"Lesson" is not a PDF');
    expect(session.grounding).toEqual([]);
  });

  it('stores a pdf as grounding', async () => {
    const session = makeSession();
    const ref = await importPdf(session, 'Lesson Plan', Buffer.from('%PDF-1.7 test'));

    expect(ref).toEqual({ key: 'lesson_plan.pdf', version: 0, mimeType: 'application/pdf', kind: 'pdf' });
    expect(session.grounding).toEqual([ref]);
  });
});

describe('listGrounding', () => {
  it('is empty for a new session', () => {
    expect(listGrounding(makeSession())).toEqual({ count: 0, grounding: [] });
  });

  it('lists imports in order with their versions', async () => {
    const session = makeSession();
    await importMarkdown(session, 'Loops', '# Loops');
    await importPdf(session, 'Loops', Buffer.from('%PDF-1.7'));
    await importMarkdown(session, 'Loops', '# Loops, again');

    const listing = listGrounding(session);
    listing.grounding.pop();

    expect(listGrounding(session)).toEqual({
      count: 3,
      grounding: [
        { key: 'loops.md', version: 0, mimeType: 'text/markdown', kind: 'markdown' },
        { key: 'loops.pdf', version: 0, mimeType: 'application/pdf', kind: 'pdf' },
        { key: 'loops.md', version: 1, mimeType: 'text/markdown', kind: 'markdown' }
      ]
    });
  });
});

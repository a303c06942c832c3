import { z } from 'zod';
import type { ArtifactStore } from '@/lib/artifacts/store';
import { MalformedOutputError, PreconditionError } from '@/lib/pipeline/errors';
import { saveArtifact, type Session } from '@/lib/session';
import type { ArtifactRef, SlideImage } from '@/types/scenes';

export const SlideImagesSchema = z.array(
  z.object({
    notes: z.string().default(''),
    pngBase64: z.string().nullable().default(null)
  })
);

export type GroundingSource = {
  ref: ArtifactRef;
  text?: string;
  file?: { filename: string; mimeType: string; data: Buffer };
};

function slug(name: string): string {
  const base = name.trim().toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
  return base || 'source';
}

export async function importMarkdown(session: Session, name: string, markdown: string): Promise<ArtifactRef> {
  const text = markdown.replace(/\r/g, '').trim();
  if (!text) {
    throw new PreconditionError(`Markdown source "${name}" is empty`, 'Provide lesson content with some text in it.');
  }
  const ref = await saveArtifact(session.artifacts, `${slug(name)}.md`, Buffer.from(text, 'utf8'), 'text/markdown', 'markdown');
  session.grounding.push(ref);
  return ref;
}

export async function importPdf(session: Session, name: string, bytes: Uint8Array): Promise<ArtifactRef> {
  // private documents often come back as an HTML login page instead of a PDF
  if (Buffer.from(bytes.subarray(0, 4)).toString('latin1') !== '%PDF') {
    throw new PreconditionError(
      `"${name}" is not a PDF`,
      'Export the document as PDF (it may require sharing permissions) and import it again.'
    );
  }
  const ref = await saveArtifact(session.artifacts, `${slug(name)}.pdf`, bytes, 'application/pdf', 'pdf');
  session.grounding.push(ref);
  return ref;
}

/** Stores slide thumbnails and notes; the notes ground narration and the images can become scene visuals. */
export async function importSlides(session: Session, name: string, slides: SlideImage[]): Promise<ArtifactRef> {
  if (!slides.length) {
    throw new PreconditionError(`Slide deck "${name}" has no slides`, 'Import a deck with at least one slide.');
  }
  const json = JSON.stringify(slides);
  const ref = await saveArtifact(session.artifacts, `${slug(name)}.slides.json`, Buffer.from(json, 'utf8'), 'application/json', 'json');
  session.grounding.push(ref);
  session.slides = ref;
  return ref;
}

export type GroundingListing = {
  count: number;
  grounding: ArtifactRef[];
};

/** The grounding artifacts imported so far, in import order. */
export function listGrounding(session: Session): GroundingListing {
  return { count: session.grounding.length, grounding: session.grounding.map((ref) => ({ ...ref })) };
}

export async function loadSlides(artifacts: ArtifactStore, ref: ArtifactRef): Promise<SlideImage[]> {
  const { bytes, mimeType } = await artifacts.load(ref.key, ref.version);
  if (mimeType !== 'application/json') {
    throw new PreconditionError(`Unexpected mime type ${mimeType} for slides`, 'Import the slide deck again.');
  }
  let raw: unknown;
  try {
    raw = JSON.parse(bytes.toString('utf8'));
  } catch {
    throw new MalformedOutputError(`Slide artifact ${ref.key} is not valid JSON`);
  }
  const parsed = SlideImagesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedOutputError(`Slide artifact ${ref.key} does not hold a slide list`);
  }
  return parsed.data;
}

function renderSlideNotes(slides: SlideImage[]): string {
  return slides.map((slide, idx) => `### Slide ${idx + 1}\n${slide.notes.trim() || '[no speaker notes]'}`).join('\n\n');
}

export async function loadGroundingSources(artifacts: ArtifactStore, refs: readonly ArtifactRef[]): Promise<GroundingSource[]> {
  const sources: GroundingSource[] = [];
  for (const ref of refs) {
    if (ref.kind === 'pdf') {
      const { bytes } = await artifacts.load(ref.key, ref.version);
      sources.push({ ref, file: { filename: ref.key, mimeType: ref.mimeType, data: bytes } });
    } else if (ref.kind === 'json') {
      sources.push({ ref, text: renderSlideNotes(await loadSlides(artifacts, ref)) });
    } else if (ref.kind === 'markdown') {
      const { bytes } = await artifacts.load(ref.key, ref.version);
      sources.push({ ref, text: bytes.toString('utf8') });
    }
  }
  return sources;
}

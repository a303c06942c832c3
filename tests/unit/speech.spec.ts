import { beforeEach, describe, expect, it, vi } from 'vitest';

const { speechCreate } = vi.hoisted(() => ({ speechCreate: vi.fn() }));

vi.mock('@/lib/openai-client', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@/lib/openai-client')>();
  return {
    ...actual,
    getOpenAI: () => ({ audio: { speech: { create: speechCreate } } })
  };
});

const { estimateDuration, openaiSpeech, stripAudioTags } = await import('@/lib/collaborators/speech');

function audioResponse(text: string) {
  return { arrayBuffer: async () => new TextEncoder().encode(text).buffer };
}

describe('speech helpers', () => {
  it('drops bracketed audio tags', () => {
    expect(stripAudioTags('[excited] Hello  [short pause] world ')).toBe('Hello world');
  });

  it('estimates duration from the speaking rate', () => {
    expect(estimateDuration('word '.repeat(150), 150)).toBe('60.00s');
    expect(estimateDuration('[laughs] Hi there', 150)).toBe('1.00s');
  });
});

describe('openaiSpeech', () => {
  beforeEach(() => {
    speechCreate.mockReset();
  });

  it('synthesizes each segment and joins the audio in scene order', async () => {
    speechCreate.mockImplementation(async (params: { input: string }) => audioResponse(`<${params.input}>`));
    const synth = openaiSpeech({ concurrency: 2, timing: 'estimate', wordsPerMinute: 120 });

    const result = await synth.synthesize({
      segments: [{ text: '[warm] First scene' }, { text: 'Second' }, { text: 'Third one here' }],
      voice: 'alloy'
    });

    expect(result.audio.toString('utf8')).toBe('<First scene><Second><Third one here>');
    expect(result.mimeType).toBe('audio/mpeg');
    expect(result.timings).toEqual([{ duration: '1.00s' }, { duration: '1.00s' }, { duration: '1.50s' }]);
    expect(speechCreate).toHaveBeenCalledTimes(3);
    expect(speechCreate.mock.calls[0][0]).toMatchObject({ voice: 'alloy', input: 'First scene', response_format: 'mp3' });
  });

  it('leaves timing to the renderer by default', async () => {
    speechCreate.mockImplementation(async () => audioResponse('x'));
    const result = await openaiSpeech().synthesize({ segments: [{ text: 'Hello' }], voice: 'nova' });

    expect(result.timings).toEqual([{ duration: 'auto' }]);
  });

  it('gives up immediately on a client error', async () => {
    speechCreate.mockRejectedValue(Object.assign(new Error('bad voice settings'), { status: 400 }));

    await expect(openaiSpeech({ retries: 3 }).synthesize({ segments: [{ text: 'Hi' }], voice: 'alloy' })).rejects.toThrow(
      'OpenAI speech failed: bad voice settings'
    );
    expect(speechCreate).toHaveBeenCalledTimes(1);
  });

  it('stops handing out segments once one of them fails', async () => {
    speechCreate.mockImplementation(async (params: { input: string }) => {
      if (params.input === 'Scene 0') {
        throw Object.assign(new Error('bad voice settings'), { status: 400 });
      }
      await new Promise((resolve) => setTimeout(resolve, 5));
      return audioResponse(params.input);
    });
    const segments = Array.from({ length: 10 }, (_, i) => ({ text: `Scene ${i}` }));

    await expect(openaiSpeech({ concurrency: 2 }).synthesize({ segments, voice: 'alloy' })).rejects.toThrow('bad voice settings');
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(speechCreate).toHaveBeenCalledTimes(2);
    expect(speechCreate.mock.calls.map((call) => call[0].input)).toEqual(['Scene 0', 'Scene 1']);
  });

  it('refuses voices it does not offer', async () => {
    const synth = openaiSpeech();
    expect(synth.voices()).toContain('alloy');
    await expect(synth.synthesize({ segments: [{ text: 'Hi' }], voice: 'robot' })).rejects.toThrow('voice robot is not supported');
    expect(speechCreate).not.toHaveBeenCalled();
  });
});

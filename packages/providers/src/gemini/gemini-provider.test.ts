import { beforeEach, describe, expect, it, vi } from 'vitest';
import { NetworkError, ProviderError } from '@coach/shared';
import { GeminiProvider, classifyGeminiError } from './gemini-provider.js';

const mocks = vi.hoisted(() => ({
  getGenerativeModel: vi.fn(),
  generateContent: vi.fn(),
  generateContentStream: vi.fn(),
}));

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = mocks.getGenerativeModel;
  },
}));

function createProvider(): GeminiProvider {
  return new GeminiProvider({ apiKey: 'test-secret', model: 'gemini-2.0-flash', maxOutputTokens: 512, temperature: 0.7 });
}

async function* chunks(...texts: string[]) {
  for (const text of texts) {
    yield { text: () => text };
  }
}

describe('GeminiProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.getGenerativeModel.mockReturnValue({
      generateContent: mocks.generateContent,
      generateContentStream: mocks.generateContentStream,
    });
  });

  it('streams text chunks and maps turns to gemini roles', async () => {
    mocks.generateContentStream.mockResolvedValue({ stream: chunks('Hel', '', 'lo') });
    const provider = createProvider();

    const received: string[] = [];
    for await (const text of provider.stream({
      systemInstruction: 'Be brief.',
      turns: [
        { role: 'user', text: 'hi' },
        { role: 'assistant', text: 'hello' },
        { role: 'user', text: "I'm stuck" },
      ],
    })) {
      received.push(text);
    }

    expect(received).toEqual(['Hel', 'lo']);
    expect(mocks.getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-2.0-flash',
      systemInstruction: 'Be brief.',
      generationConfig: { temperature: 0.7, maxOutputTokens: 512, responseMimeType: undefined },
    });
    expect(mocks.generateContentStream.mock.calls[0]?.[0]).toEqual({
      contents: [
        { role: 'user', parts: [{ text: 'hi' }] },
        { role: 'model', parts: [{ text: 'hello' }] },
        { role: 'user', parts: [{ text: "I'm stuck" }] },
      ],
    });
  });

  it('requests JSON output for completions', async () => {
    mocks.generateContent.mockResolvedValue({ response: { text: () => '{"route":"quick_nudge"}' } });
    const provider = createProvider();

    const text = await provider.complete({ turns: [{ role: 'user', text: 'classify' }], json: true, temperature: 0 });

    expect(text).toBe('{"route":"quick_nudge"}');
    expect(mocks.getGenerativeModel.mock.calls[0]?.[0]).toMatchObject({
      generationConfig: { temperature: 0, responseMimeType: 'application/json' },
    });
  });

  it('maps stream failures to typed errors', async () => {
    mocks.generateContentStream.mockRejectedValue({ status: 503, message: 'service unavailable from upstream' });
    const provider = createProvider();

    const consume = async () => {
      for await (const text of provider.stream({ turns: [{ role: 'user', text: 'hi' }] })) {
        expect(text).toBeDefined();
      }
    };

    await expect(consume()).rejects.toBeInstanceOf(ProviderError);
  });

  it('maps rate limits and network failures', async () => {
    mocks.generateContent.mockRejectedValueOnce({ status: 429, message: 'Too many requests' });
    mocks.generateContent.mockRejectedValueOnce(new Error('Failed to fetch: ECONNRESET upstream'));
    const provider = createProvider();

    const rateLimited = await provider.complete({ turns: [{ role: 'user', text: 'a' }] }).catch((error: unknown) => error);
    expect(rateLimited).toBeInstanceOf(ProviderError);
    expect(rateLimited).toMatchObject({ statusCode: 429, retryable: true });

    await expect(provider.complete({ turns: [{ role: 'user', text: 'b' }] })).rejects.toBeInstanceOf(NetworkError);
  });
});

describe('classifyGeminiError', () => {
  it.each([
    [{ status: 401, message: 'Invalid API key supplied' }, 'authentication'],
    [{ status: 404, message: 'models/gemini-x:generateContent model not found' }, 'model_not_found'],
    [{ status: 429, message: 'Resource exhausted: quota' }, 'quota_exceeded'],
    [{ message: 'Request timed out' }, 'network_timeout'],
    [{ error: { code: 400, message: 'bad field' } }, 'bad_request'],
    ['something odd', 'unknown'],
  ])('classifies %j as %s', (error, category) => {
    expect(classifyGeminiError(error).category).toBe(category);
  });

  it('drops the transport method suffix from model ids', () => {
    expect(classifyGeminiError({ status: 404, message: 'models/gemini-x:generateContent not found' }).message).toBe(
      'models/gemini-x not found',
    );
  });
});

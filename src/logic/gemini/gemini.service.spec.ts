import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { GeminiService } from './gemini.service';
import { GENAI_CLIENT } from './gemini.constants';

describe('GeminiService', () => {
  let service: GeminiService;
  const embedContent = jest.fn();
  const generateContent = jest.fn();
  const env: Record<string, string | number> = {
    GEMINI_EMBED_MODEL: 'test-embed-model',
    GEMINI_CHAT_MODEL: 'test-chat-model',
    EMBEDDING_DIMENSIONS: 3,
  };

  beforeEach(async () => {
    embedContent.mockReset();
    generateContent.mockReset();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GeminiService,
        { provide: GENAI_CLIENT, useValue: { models: { embedContent, generateContent } } },
        { provide: ConfigService, useValue: { get: (key: string) => env[key] } },
      ],
    }).compile();

    service = module.get<GeminiService>(GeminiService);
  });

  it('reads the model identifiers from configuration', () => {
    expect(service.embedModel).toBe('test-embed-model');
    expect(service.chatModel).toBe('test-chat-model');
    expect(service.embeddingDimensions).toBe(3);
  });

  it('requests query embeddings at the configured dimensionality', async () => {
    embedContent.mockResolvedValue({ embeddings: [{ values: [0.1, 0.2, 0.3] }] });

    await expect(service.embedTexts(['bonjour'])).resolves.toEqual([[0.1, 0.2, 0.3]]);
    expect(embedContent).toHaveBeenCalledWith({
      model: 'test-embed-model',
      contents: ['bonjour'],
      config: { taskType: 'RETRIEVAL_QUERY', outputDimensionality: 3 },
    });
  });

  it('drops embeddings without values', async () => {
    embedContent.mockResolvedValue({ embeddings: [{}] });

    await expect(service.embedTexts(['bonjour'])).resolves.toEqual([]);
  });

  it('wraps provider failures when embedding', async () => {
    embedContent.mockRejectedValue(new Error('quota exceeded'));

    await expect(service.embedTexts(['bonjour'])).rejects.toThrow('Failed to generate embeddings: quota exceeded');
  });

  it('sends a single user message with the per-call options', async () => {
    generateContent.mockResolvedValue({ text: 'Réponse' });

    await expect(service.complete('prompt', { temperature: 0.4, maxOutputTokens: 200 })).resolves.toBe('Réponse');
    expect(generateContent).toHaveBeenCalledWith({
      model: 'test-chat-model',
      contents: [{ role: 'user', parts: [{ text: 'prompt' }] }],
      config: { temperature: 0.4, maxOutputTokens: 200 },
    });
  });

  it('lets the caller override the model', async () => {
    generateContent.mockResolvedValue({ text: 'ok' });

    await service.complete('prompt', { temperature: 0, maxOutputTokens: 10, model: 'other-model' });
    expect(generateContent.mock.calls[0][0].model).toBe('other-model');
  });

  it('treats an empty completion as a failure', async () => {
    generateContent.mockResolvedValue({ text: '  ' });

    await expect(service.complete('prompt', { temperature: 0, maxOutputTokens: 10 }))
      .rejects.toThrow('Failed to generate content: empty response from model');
  });

  it('wraps provider failures when generating', async () => {
    generateContent.mockRejectedValue(new Error('401 Unauthorized'));

    await expect(service.complete('prompt', { temperature: 0, maxOutputTokens: 10 }))
      .rejects.toThrow('Failed to generate content: 401 Unauthorized');
  });
});

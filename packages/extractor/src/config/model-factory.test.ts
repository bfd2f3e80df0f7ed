import { createOpenAI } from '@ai-sdk/openai';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { createExtractionModel } from './model-factory';

vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: vi.fn(),
}));

describe('createExtractionModel', () => {
  const chat = vi.fn();

  beforeEach(() => {
    chat.mockReturnValue({ modelId: 'vision-large' });
    vi.mocked(createOpenAI).mockReturnValue(
      Object.assign(vi.fn(), { chat }) as unknown as ReturnType<
        typeof createOpenAI
      >,
    );
  });

  test('creates a chat model against the configured endpoint', () => {
    const model = createExtractionModel({
      apiKey: 'test-secret',
      baseUrl: 'https://api.example.test/v1',
      model: 'vision-large',
    });

    expect(createOpenAI).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'https://api.example.test/v1',
    });
    expect(chat).toHaveBeenCalledWith('vision-large');
    expect(model).toEqual({ modelId: 'vision-large' });
  });
});

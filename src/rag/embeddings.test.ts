import { describe, it, expect, vi } from 'vitest';

import { EmbeddingGenerator } from './embeddings';

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('EmbeddingGenerator', () => {
  it('posts each text to the embeddings endpoint', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ embedding: [0.1, 0.2] }))
      .mockResolvedValueOnce(jsonResponse({ embedding: [0.3, '0.4'] }));
    const generator = new EmbeddingGenerator({
      baseUrl: 'http://ollama.test:11434',
      model: 'test-embed',
      fetchImpl,
      logger: createSilentLogger(),
    });

    await expect(generator.embed(['first', 'second'])).resolves.toEqual([[0.1, 0.2], [0.3, 0.4]]);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://ollama.test:11434/api/embeddings');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({ model: 'test-embed', prompt: 'first' });
  });

  it('does not retry client errors', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('bad input', { status: 400 }));
    const sleep = vi.fn(async () => undefined);
    const generator = new EmbeddingGenerator({
      baseUrl: 'http://ollama.test:11434',
      model: 'test-embed',
      fetchImpl,
      sleep,
      logger: createSilentLogger(),
    });

    await expect(generator.embed(['text'])).rejects.toThrow('Embedding request failed (status 400): bad input');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries server errors before succeeding', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('overloaded', { status: 500 }))
      .mockResolvedValueOnce(jsonResponse({ embedding: [1, 0] }));
    const sleep = vi.fn(async () => undefined);
    const logger = createSilentLogger();
    const generator = new EmbeddingGenerator({
      baseUrl: 'http://ollama.test:11434',
      model: 'test-embed',
      fetchImpl,
      sleep,
      logger,
    });

    await expect(generator.embed(['text'])).resolves.toEqual([[1, 0]]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('retries rate limiting even though it is a client error', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
      .mockResolvedValueOnce(jsonResponse({ embedding: [0, 1] }));
    const generator = new EmbeddingGenerator({
      baseUrl: 'http://ollama.test:11434',
      model: 'test-embed',
      fetchImpl,
      sleep: async () => undefined,
      logger: createSilentLogger(),
    });

    await expect(generator.embed(['text'])).resolves.toEqual([[0, 1]]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured number of attempts', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () => new Response('down', { status: 503 }));
    const generator = new EmbeddingGenerator({
      baseUrl: 'http://ollama.test:11434',
      model: 'test-embed',
      maxAttempts: 2,
      fetchImpl,
      sleep: async () => undefined,
      logger: createSilentLogger(),
    });

    await expect(generator.embed(['text'])).rejects.toThrow('Embedding request failed (status 503): down');
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('rejects responses without an embedding array', async () => {
    const generator = new EmbeddingGenerator({
      baseUrl: 'http://ollama.test:11434',
      model: 'test-embed',
      maxAttempts: 1,
      fetchImpl: vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ vector: [] })),
      logger: createSilentLogger(),
    });

    await expect(generator.embed(['text'])).rejects.toThrow(
      'Embedding request failed: Embedding response did not include an array of numbers.',
    );
  });

  it('refuses an invalid base URL', () => {
    expect(() => new EmbeddingGenerator({ baseUrl: 'not a url', model: 'test-embed' })).toThrow(
      'Invalid embedding service URL "not a url"',
    );
  });
});

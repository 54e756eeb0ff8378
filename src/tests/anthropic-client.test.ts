/**
 * Completion Client Tests
 *
 * Uses in-memory stand-ins for `anthropic.messages` and `anthropic.models`;
 * nothing here reaches the network.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import {
  AnthropicCompletionClient,
  createCompletionClient,
  listModels,
  type MessageCreator,
  type ModelCatalog,
  type ModelSummary,
} from '../clients/anthropic/client.js';
import { classifyCompletionError, isPlausibleModelId } from '../config/models.js';
import { ConfigurationError } from '../chat/errors.js';

const AVAILABLE: ModelSummary[] = [
  { id: 'claude-test-1', display_name: 'Claude Test 1' },
  { id: 'claude-test-2', display_name: 'Claude Test 2' },
];

function fakeCatalog(known: ModelSummary[] = AVAILABLE) {
  const listed = vi.fn();
  const catalog: ModelCatalog = {
    retrieve: vi.fn(async (modelId: string) => {
      const match = known.find(model => model.id === modelId);
      if (!match) throw new Error(`model: ${modelId} not_found_error`);
      return match;
    }),
    async *list() {
      listed();
      yield* known;
    },
  };
  return { catalog, listed };
}

function fakeMessages(content: Array<{ type: string; text?: string }>) {
  const create = vi.fn(async () => ({ content }));
  const messages: MessageCreator = { create };
  return { messages, create };
}

const baseConfig = {
  apiKey: 'test-key',
  model: 'claude-test-1',
  maxTokens: 256,
  timeoutMs: 1000,
  verifyModel: true,
};

describe('Completion Client', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('AnthropicCompletionClient', () => {
    it('sends the prompt as a single user message', async () => {
      const { messages, create } = fakeMessages([{ type: 'text', text: 'hi' }]);
      const client = new AnthropicCompletionClient(messages, 'claude-test-1', 256);

      await client.complete('user: hello\n');

      expect(create).toHaveBeenCalledWith({
        model: 'claude-test-1',
        max_tokens: 256,
        messages: [{ role: 'user', content: 'user: hello\n' }],
      });
    });

    it('joins text blocks and skips everything else', async () => {
      const { messages } = fakeMessages([
        { type: 'text', text: 'Hello' },
        { type: 'tool_use' },
        { type: 'text', text: ' world' },
      ]);
      const client = new AnthropicCompletionClient(messages, 'claude-test-1', 256);

      expect(await client.complete('user: hi\n')).toBe('Hello world');
    });
  });

  describe('createCompletionClient', () => {
    it('fails without an API key', async () => {
      const { catalog } = fakeCatalog();
      const { messages } = fakeMessages([]);

      const result = await createCompletionClient(
        { ...baseConfig, apiKey: null },
        { messages, models: catalog }
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ConfigurationError);
        expect(result.error.setting).toBe('ANTHROPIC_API_KEY');
      }
      expect(catalog.retrieve).not.toHaveBeenCalled();
    });

    it('resolves the configured model', async () => {
      const { catalog } = fakeCatalog();
      const { messages } = fakeMessages([{ type: 'text', text: 'ready' }]);

      const result = await createCompletionClient(baseConfig, { messages, models: catalog });

      expect(catalog.retrieve).toHaveBeenCalledWith('claude-test-1');
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.model).toBe('claude-test-1');
        expect(await result.value.complete('user: hi\n')).toBe('ready');
      }
    });

    it('reports an unknown model and lists the alternatives', async () => {
      const { catalog, listed } = fakeCatalog();
      const { messages } = fakeMessages([]);

      const result = await createCompletionClient(
        { ...baseConfig, model: 'claude-missing' },
        { messages, models: catalog }
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.setting).toBe('PARLEY_MODEL');
        expect(result.error.message).toBe(
          "Model 'claude-missing' could not be resolved: model: claude-missing not_found_error"
        );
      }
      expect(listed).toHaveBeenCalledOnce();
      expect(console.error).toHaveBeenCalledWith('   - claude-test-2 (Claude Test 2)');
    });

    it('skips the lookup when verification is off', async () => {
      const { catalog } = fakeCatalog();
      const { messages } = fakeMessages([]);

      const result = await createCompletionClient(
        { ...baseConfig, model: 'claude-missing', verifyModel: false },
        { messages, models: catalog }
      );

      expect(result.ok).toBe(true);
      expect(catalog.retrieve).not.toHaveBeenCalled();
    });
  });

  describe('listModels', () => {
    it('collects every model from the catalog', async () => {
      const { catalog } = fakeCatalog();

      expect(await listModels(catalog)).toEqual(AVAILABLE);
    });
  });
});

describe('classifyCompletionError', () => {
  it('classifies SDK connection errors', () => {
    expect(classifyCompletionError(new Anthropic.APIConnectionTimeoutError())).toEqual({
      reason: 'timeout',
    });
    expect(
      classifyCompletionError(new Anthropic.APIConnectionError({ message: 'Connection error.' }))
    ).toEqual({ reason: 'unavailable' });
  });

  it('classifies SDK status errors', () => {
    const rateLimited = new Anthropic.RateLimitError(429, undefined, 'rate limited', undefined);
    const unauthorized = new Anthropic.AuthenticationError(401, undefined, 'invalid x-api-key', undefined);
    const badRequest = new Anthropic.BadRequestError(400, undefined, 'prompt is too long', undefined);

    expect(classifyCompletionError(rateLimited)).toEqual({ reason: 'rate_limited', statusCode: 429 });
    expect(classifyCompletionError(unauthorized)).toEqual({ reason: 'auth', statusCode: 401 });
    expect(classifyCompletionError(badRequest)).toEqual({ reason: 'invalid_request', statusCode: 400 });
  });

  it('falls back to matching error text', () => {
    expect(classifyCompletionError(new Error('fetch failed'))).toEqual({ reason: 'unavailable' });
    expect(classifyCompletionError(new Error('Quota exhausted'))).toEqual({ reason: 'rate_limited' });
    expect(classifyCompletionError(new Error('ETIMEDOUT'))).toEqual({ reason: 'timeout' });
    expect(classifyCompletionError(new Error('something odd'))).toEqual({ reason: 'unknown' });
  });
});

describe('isPlausibleModelId', () => {
  it('accepts claude model ids', () => {
    expect(isPlausibleModelId('claude-sonnet-4-20250514')).toBe(true);
    expect(isPlausibleModelId('claude-3-5-haiku-latest')).toBe(true);
  });

  it('rejects other ids', () => {
    expect(isPlausibleModelId('gpt-4o-mini')).toBe(false);
    expect(isPlausibleModelId('Claude Sonnet')).toBe(false);
  });
});

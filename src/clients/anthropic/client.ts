/**
 * Anthropic Completion Client
 * Sends assembled prompts to Claude and resolves the configured model at startup
 */

import Anthropic from '@anthropic-ai/sdk';
import { ConfigurationError } from '../../chat/errors.js';
import type { ParleyConfig } from '../../config/env.js';
import { err, ok, type Result } from '../../types/index.js';

/**
 * Text-completion boundary the chat core calls into
 */
export interface CompletionClient {
  readonly model: string;
  complete(prompt: string): Promise<string>;
}

export interface ModelSummary {
  id: string;
  display_name: string;
}

/**
 * The slice of `anthropic.models` used to resolve and enumerate models
 */
export interface ModelCatalog {
  retrieve(modelId: string): PromiseLike<ModelSummary>;
  list(): AsyncIterable<ModelSummary>;
}

/**
 * The slice of `anthropic.messages` used to request completions
 */
export interface MessageCreator {
  create(params: {
    model: string;
    max_tokens: number;
    messages: Array<{ role: 'user'; content: string }>;
  }): PromiseLike<{ content: Array<{ type: string; text?: string }> }>;
}

export class AnthropicCompletionClient implements CompletionClient {
  readonly model: string;
  private messages: MessageCreator;
  private maxTokens: number;

  constructor(messages: MessageCreator, model: string, maxTokens: number) {
    this.messages = messages;
    this.model = model;
    this.maxTokens = maxTokens;
  }

  /**
   * Send the prompt as a single user message and join the text blocks of the reply
   */
  async complete(prompt: string): Promise<string> {
    const message = await this.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [{ role: 'user', content: prompt }],
    });

    return message.content
      .map(block => (block.type === 'text' && block.text !== undefined ? block.text : ''))
      .join('');
  }
}

/**
 * Build the SDK client. Retries are off; the timeout bounds each request.
 */
export function createAnthropic(config: Pick<ParleyConfig, 'apiKey' | 'timeoutMs'>): Anthropic {
  return new Anthropic({
    apiKey: config.apiKey ?? undefined,
    timeout: config.timeoutMs,
    maxRetries: 0,
  });
}

/**
 * Enumerate models available to the configured key
 */
export async function listModels(catalog: ModelCatalog): Promise<ModelSummary[]> {
  const models: ModelSummary[] = [];
  for await (const model of catalog.list()) {
    models.push({ id: model.id, display_name: model.display_name });
  }
  return models;
}

export interface CompletionClientDeps {
  messages: MessageCreator;
  models: ModelCatalog;
}

/**
 * Resolve a completion client from configuration.
 *
 * Runs once at startup. A missing key or a model the API will not resolve
 * yields a ConfigurationError; when the model lookup fails the available
 * models are logged so the operator can pick one.
 */
export async function createCompletionClient(
  config: Pick<ParleyConfig, 'apiKey' | 'model' | 'maxTokens' | 'timeoutMs' | 'verifyModel'>,
  deps?: CompletionClientDeps
): Promise<Result<CompletionClient, ConfigurationError>> {
  if (!config.apiKey) {
    console.error('[CompletionClient] ANTHROPIC_API_KEY not found in the environment');
    console.error('[CompletionClient] Add ANTHROPIC_API_KEY=your_key_here to your .env file');
    return err(
      new ConfigurationError(
        'ANTHROPIC_API_KEY is not set. Add it to your .env file and restart.',
        'ANTHROPIC_API_KEY'
      )
    );
  }

  const { messages, models }: CompletionClientDeps = deps ?? createAnthropic(config);

  if (config.verifyModel) {
    try {
      await models.retrieve(config.model);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[CompletionClient] Requested model '${config.model}' failed to load: ${message}`);
      await logAvailableModels(models);
      return err(
        new ConfigurationError(
          `Model '${config.model}' could not be resolved: ${message}`,
          'PARLEY_MODEL'
        )
      );
    }
  }

  console.log(`[CompletionClient] Model '${config.model}' ready`);
  return ok(new AnthropicCompletionClient(messages, config.model, config.maxTokens));
}

async function logAvailableModels(catalog: ModelCatalog): Promise<void> {
  try {
    const available = await listModels(catalog);
    console.error('[CompletionClient] Available models:');
    for (const model of available) {
      console.error(`   - ${model.id} (${model.display_name})`);
    }
    console.error('[CompletionClient] Set PARLEY_MODEL to one of the above and restart');
  } catch (error) {
    console.error('[CompletionClient] Could not list models:', error instanceof Error ? error.message : error);
    console.error('[CompletionClient] Check that the API key is valid and has access to the Models API');
  }
}

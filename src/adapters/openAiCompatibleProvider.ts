import { generateText, wrapLanguageModel, type LanguageModel, type LanguageModelV1Middleware } from 'ai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { GenerateRequest, Provider, ProviderConfig } from '../core/types';
import { normalizeProviderError } from './errors';

export type OpenAiCompatibleProviderOptions = {
  /** Replaces the global fetch; tests use it to stay off the network. */
  fetch?: typeof fetch;
};

// Schemaless JSON goes out as response_format json_object with the prompts untouched.
const jsonObjectResponse: LanguageModelV1Middleware = {
  transformParams: async ({ params }) => ({ ...params, responseFormat: { type: 'json' } }),
};

function callSettings(model: LanguageModel, request: GenerateRequest, signal: AbortSignal) {
  return {
    model,
    system: request.systemPrompt,
    prompt: request.userPrompt,
    temperature: request.temperature,
    maxRetries: 0,
    abortSignal: signal,
  };
}

/**
 * Chat-completion provider for any backend speaking the OpenAI wire format.
 * The SDK client is created on the first call and then shared by every
 * concurrent request to this provider.
 */
export function createOpenAiCompatibleProvider(
  config: ProviderConfig,
  options: OpenAiCompatibleProviderOptions = {}
): Provider {
  let chatModel: LanguageModel | undefined;
  let jsonModel: LanguageModel | undefined;

  function modelClient(): LanguageModel {
    if (!chatModel) {
      const client = createOpenAICompatible({
        name: config.name,
        baseURL: config.baseUrl,
        apiKey: config.apiKey,
        fetch: options.fetch,
      });
      chatModel = client.chatModel(config.model);
    }
    return chatModel;
  }

  function jsonModelClient(): LanguageModel {
    if (!jsonModel) {
      jsonModel = wrapLanguageModel({ model: modelClient(), middleware: jsonObjectResponse });
    }
    return jsonModel;
  }

  return {
    name: config.name,
    model: config.model,
    timeoutMs: config.timeoutMs,

    async generate(request, { signal }) {
      try {
        const model = request.jsonMode ? jsonModelClient() : modelClient();
        const result = await generateText(callSettings(model, request, signal));
        return result.text;
      } catch (error) {
        // an aborted call is already settled by the gateway's deadline
        if (signal.aborted) throw error;
        throw normalizeProviderError(error, config.name);
      }
    },
  };
}

import OpenAI from 'openai';
import type { LLMOraclePort, OracleRequest } from '../../../application/ports/LLMOraclePort.js';
import { OracleUnavailableError } from '../../../domain/errors.js';

export interface OpenAIChatOracleOptions {
  temperature: number;
  maxTokens: number;
}

/** Chat completions against any OpenAI-compatible endpoint (OpenRouter, Ollama, OpenAI itself). */
export class OpenAIChatOracle implements LLMOraclePort {
  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAIChatOracleOptions,
  ) {}

  static fromSettings(settings: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    temperature: number;
    maxTokens: number;
  }): OpenAIChatOracle {
    const client = new OpenAI({
      baseURL: settings.baseUrl,
      // the SDK refuses an empty key; local endpoints ignore it
      apiKey: settings.apiKey || 'local',
      timeout: settings.timeoutMs,
      maxRetries: settings.maxRetries,
    });
    return new OpenAIChatOracle(client, { temperature: settings.temperature, maxTokens: settings.maxTokens });
  }

  async complete(request: OracleRequest): Promise<string> {
    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({
      role: 'user',
      content: `${request.prompt}\n\nDOKUMENT:\n${request.context}`,
    });

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: request.modelId,
        messages,
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens,
        ...(request.responseFormat === 'json' ? { response_format: { type: 'json_object' as const } } : {}),
      });
    } catch (error) {
      throw new OracleUnavailableError(
        `Oracle request to ${request.modelId} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error },
      );
    }

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new OracleUnavailableError(`Oracle ${request.modelId} returned no content`);
    }
    return content;
  }
}

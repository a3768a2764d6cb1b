import Anthropic from '@anthropic-ai/sdk';
import { BaseCompletionProvider } from './base.js';
import type { CompletionRequest, ProviderConfig } from './types.js';

export class AnthropicCompletionProvider extends BaseCompletionProvider {
  readonly name = 'anthropic';
  readonly defaultModel = 'claude-sonnet-4-20250514';

  private client: Anthropic | null = null;

  constructor(config: ProviderConfig = {}) {
    super(config);
  }

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({
        apiKey: this.config.apiKey,
        ...(this.config.baseUrl ? { baseURL: this.config.baseUrl } : {}),
        maxRetries: 0,
      });
    }
    return this.client;
  }

  isAvailable(): boolean {
    return !!this.config.apiKey;
  }

  protected async _complete(request: CompletionRequest & { model: string }): Promise<string> {
    const response = await this.getClient().messages.create({
      model: request.model,
      max_tokens: request.maxTokens,
      messages: [{ role: 'user', content: request.prompt }],
      ...(request.system ? { system: request.system } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    });

    let content = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      }
    }
    return content;
  }
}

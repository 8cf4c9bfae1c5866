import { InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { DEFAULT_BEDROCK_MODEL_ID } from '../config';
import { GenerationError, describeError } from '../errors';

/**
 * Anything that turns a prompt into a completion. ContentService depends on this
 * rather than on Bedrock directly.
 */
export interface TextGenerator {
  generateText(prompt: string): Promise<string>;
}

/** The slice of BedrockRuntimeClient this service uses. */
export interface InvokeModelClient {
  send(command: InvokeModelCommand): Promise<{ body?: Uint8Array }>;
}

interface ClaudeContentBlock {
  type?: string;
  text?: unknown;
}

const MAX_TOKENS = 4096;

const firstText = (payload: unknown): string | undefined => {
  if (typeof payload !== 'object' || payload === null || !('content' in payload)) {
    return undefined;
  }
  const { content } = payload;
  if (!Array.isArray(content) || content.length === 0) {
    return undefined;
  }
  const block: ClaudeContentBlock = content[0];
  return typeof block?.text === 'string' ? block.text : undefined;
};

export class BedrockService implements TextGenerator {
  constructor(
    private readonly client: InvokeModelClient,
    private readonly modelId = DEFAULT_BEDROCK_MODEL_ID
  ) {}

  async generateText(prompt: string): Promise<string> {
    let body: Uint8Array | undefined;

    try {
      const response = await this.client.send(new InvokeModelCommand({
        modelId: this.modelId,
        contentType: 'application/json',
        accept: 'application/json',
        body: JSON.stringify({
          anthropic_version: 'bedrock-2023-05-31',
          max_tokens: MAX_TOKENS,
          messages: [
            { role: 'user', content: prompt }
          ]
        })
      }));
      body = response.body;
    } catch (error) {
      console.error(`[BedrockService] InvokeModel failed for ${this.modelId}:`, error);
      throw new GenerationError(describeError(error), { cause: error });
    }

    if (!body) {
      throw new GenerationError('Empty response body from Bedrock');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(new TextDecoder().decode(body));
    } catch (error) {
      throw new GenerationError(`Failed to parse Bedrock response: ${describeError(error)}`, { cause: error });
    }

    const text = firstText(payload);
    if (text === undefined) {
      throw new GenerationError('No content in Bedrock response');
    }

    return text;
  }
}

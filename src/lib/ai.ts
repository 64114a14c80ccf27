import { generateText } from 'ai';
import { createGateway } from '@ai-sdk/gateway';

export interface TextGenerationRequest {
  system?: string;
  prompt: string;
  temperature?: number;
  maxOutputTokens?: number;
}

/**
 * Anything that turns a prompt into reply text. The pipeline only depends on
 * this signature so tests can substitute a stub.
 */
export type TextGenerator = (request: TextGenerationRequest) => Promise<string>;

export interface GatewayTextGeneratorOptions {
  apiKey: string;
  modelId: string;
  timeoutMs: number;
}

export function createGatewayTextGenerator(opts: GatewayTextGeneratorOptions): TextGenerator {
  const gateway = createGateway({ apiKey: opts.apiKey });
  const model = gateway(opts.modelId);

  return async (request) => {
    const { text } = await generateText({
      model,
      system: request.system,
      prompt: request.prompt,
      temperature: request.temperature,
      maxOutputTokens: request.maxOutputTokens,
      abortSignal: AbortSignal.timeout(opts.timeoutMs),
    });

    if (!text) {
      throw new Error(`AI returned empty response (${opts.modelId})`);
    }
    return text;
  };
}

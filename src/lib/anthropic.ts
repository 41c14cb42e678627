import Anthropic from '@anthropic-ai/sdk';

let anthropicClient: Anthropic | null = null;

/**
 * Lazily create the Anthropic client so modules can be imported in test/dev
 * environments even when credentials are not configured.
 */
export function getAnthropicClient(apiKey: string | undefined): Anthropic {
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY is required when FF_REVIEW_NARRATIVE is enabled');
  }
  if (!anthropicClient) {
    anthropicClient = new Anthropic({ apiKey });
  }
  return anthropicClient;
}

/**
 * Text of the first text block in a response, or '' when there is none.
 */
export function extractResponseText(response: Anthropic.Message): string {
  const firstBlock = response.content[0];
  return firstBlock?.type === 'text' ? firstBlock.text : '';
}

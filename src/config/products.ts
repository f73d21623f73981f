/**
 * Known products on the status page and the lowercase phrases that identify them.
 * Order matters: when two products score the same, the earlier one wins.
 */

export interface ProductDefinition {
  name: string;
  keywords: readonly string[];
}

export const PRODUCT_KEYWORDS: readonly ProductDefinition[] = [
  {
    name: 'Chat Completions API',
    keywords: ['chat completions', 'gpt-4', 'gpt-4o', 'gpt-4.1', 'gpt-3.5', 'chatgpt']
  },
  {
    name: 'Responses API',
    keywords: ['responses api', 'response api', 'responses endpoint', 'response endpoint']
  },
  {
    name: 'Assistants API',
    keywords: ['assistants api', 'assistant api', 'assistant']
  },
  {
    name: 'Batch API',
    keywords: ['batch api', 'batch job', 'batch endpoint']
  },
  {
    name: 'Realtime API',
    keywords: ['realtime api', 'realtime', 'webrtc']
  },
  {
    name: 'Embeddings API',
    keywords: ['embeddings api', 'embedding', 'embeddings']
  },
  {
    name: 'Moderation API',
    keywords: ['moderation', 'moderate', 'moderations endpoint']
  },
  {
    name: 'Vector Stores API',
    keywords: ['vector store', 'vector database']
  },
  {
    name: 'Fine-tuning API',
    keywords: ['fine-tuning', 'fine tuning', 'fine-tune']
  },
  {
    name: 'Image Generation API',
    keywords: ['image generation', 'images api', 'image', 'dall-e']
  }
] as const;

// Display label for webhook events that match no known product
export const FALLBACK_PRODUCT_LABEL = 'OpenAI Platform / Multiple services';

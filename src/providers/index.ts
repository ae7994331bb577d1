// Model Gateway registry
// Lazily builds the configured gateway; one instance per process

import { OpenAIGateway } from './openai.js';
import type { ModelGateway } from './types.js';

let gateway: ModelGateway | null = null;

export function getModelGateway(): ModelGateway {
  if (!gateway) {
    gateway = new OpenAIGateway();
  }
  return gateway;
}

export { OpenAIGateway } from './openai.js';
export type { ModelGateway, ModelReply, ConverseOptions } from './types.js';

export interface OracleRequest {
  prompt: string;
  context: string;
  modelId: string;
  systemPrompt?: string;
  responseFormat?: 'json' | 'text';
}

export interface LLMOraclePort {
  complete(request: OracleRequest): Promise<string>;
}

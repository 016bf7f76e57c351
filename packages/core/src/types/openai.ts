export interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string | null;
  /** Present when the gateway renders reasoning as a separate field. */
  reasoning_content?: string;
}

export interface OpenAIResponse {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: OpenAIChoice[];
  usage: OpenAIUsage;
}

export type OpenAIFinishReason = 'stop' | 'length' | 'content_filter';

export interface OpenAIChoice {
  index: number;
  message: OpenAIMessage;
  finish_reason: OpenAIFinishReason | null;
}

export interface OpenAIUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface OpenAIStreamChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: Partial<OpenAIMessage>;
    finish_reason: OpenAIFinishReason | null;
  }>;
}

export interface OpenAIError {
  error: {
    message: string;
    type: string;
    code: string | null;
  };
}

export interface OpenAIModelInfo {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
}

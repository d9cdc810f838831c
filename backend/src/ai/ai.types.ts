import type { z } from 'zod';

export type AiMessageRole = 'system' | 'user' | 'assistant' | 'tool';

export type AiContentPart =
  | { type: 'text'; text: string }
  /** `url` is either a remote http(s) URL or a `data:` URL with an inlined base64 payload. */
  | { type: 'image'; url: string };

/**
 * A tool invocation requested by the model, detached from any SDK shape.
 * `argumentText` is the raw JSON the model produced for the call.
 */
export interface AiToolCall {
  callId: string;
  name: string;
  argumentText: string;
}

export interface AiSystemMessage {
  role: 'system';
  content: string;
}

export interface AiUserMessage {
  role: 'user';
  content: string | AiContentPart[];
}

export interface AiAssistantMessage {
  role: 'assistant';
  content: string;
  toolCalls?: AiToolCall[];
}

export interface AiToolMessage {
  role: 'tool';
  content: string;
  toolCallId: string;
  toolName: string;
}

export type AiMessage =
  | AiSystemMessage
  | AiUserMessage
  | AiAssistantMessage
  | AiToolMessage;

export interface AiToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: z.ZodObject<z.ZodRawShape>;
}

export type AiToolChoice = 'auto' | 'none' | 'required';

export interface ChatCompletionOptions {
  model?: string;
  messages: AiMessage[];
  tools?: readonly AiToolDefinition[];
  toolChoice?: AiToolChoice;
  temperature?: number;
  maxTokens?: number;
}

export interface ChatCompletionResult {
  role: 'assistant';
  content: string;
  toolCalls: AiToolCall[];
  finishReason?: string | null;
  raw?: unknown;
}

export interface EmbedTextOptions {
  model?: string;
  inputs: string[];
}

export interface EmbedTextResult {
  embeddings: number[][];
  raw?: unknown;
}

export interface TranscribeAudioOptions {
  model?: string;
  audio: Uint8Array;
  /** Original file name; providers may use its extension to tell the format. */
  fileName?: string;
}

export interface TranscribeAudioResult {
  text: string;
  language?: string;
  raw?: unknown;
}

import {
  tool,
  type ImagePart,
  type ModelMessage,
  type TextPart,
  type ToolCallPart,
  type ToolSet,
} from 'ai';
import type {
  AiContentPart,
  AiMessage,
  AiToolCall,
  AiToolDefinition,
} from '../ai.types.js';
import { parseToolArguments, type ToolArguments } from '../tool-arguments.js';

const DATA_URL_PATTERN = /^data:([^;,]+);base64,(.*)$/s;

/**
 * Minimal view of a tool call returned by `generateText`; both static and
 * dynamic tool calls carry these fields.
 */
export interface SdkToolCall {
  toolCallId: string;
  toolName: string;
  input: unknown;
}

export function toModelMessages(messages: readonly AiMessage[]): ModelMessage[] {
  return messages.map((message): ModelMessage => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return {
          role: 'user',
          content:
            typeof message.content === 'string'
              ? message.content
              : message.content.map(toUserPart),
        };
      case 'assistant': {
        if (!message.toolCalls?.length) {
          return { role: 'assistant', content: message.content };
        }
        const parts: Array<TextPart | ToolCallPart> = [];
        if (message.content.length > 0) {
          parts.push({ type: 'text', text: message.content });
        }
        for (const call of message.toolCalls) {
          parts.push({
            type: 'tool-call',
            toolCallId: call.callId,
            toolName: call.name,
            input: parseToolArguments(call.argumentText),
          });
        }
        return { role: 'assistant', content: parts };
      }
      case 'tool':
        return {
          role: 'tool',
          content: [
            {
              type: 'tool-result',
              toolCallId: message.toolCallId,
              toolName: message.toolName,
              output: { type: 'text', value: message.content },
            },
          ],
        };
    }
  });
}

export function toToolSet(definitions: readonly AiToolDefinition[]): ToolSet {
  const tools: ToolSet = {};
  for (const definition of definitions) {
    tools[definition.name] = tool<ToolArguments, never>({
      description: definition.description,
      inputSchema: definition.parameters,
    });
  }
  return tools;
}

export function fromSdkToolCall(call: SdkToolCall): AiToolCall {
  // Calls that failed schema validation keep their unparsed text as input
  const argumentText =
    typeof call.input === 'string'
      ? call.input
      : JSON.stringify(call.input ?? {});

  return {
    callId: call.toolCallId,
    name: call.toolName,
    argumentText,
  };
}

function toUserPart(part: AiContentPart): TextPart | ImagePart {
  if (part.type === 'text') {
    return { type: 'text', text: part.text };
  }

  const match = DATA_URL_PATTERN.exec(part.url);
  if (match) {
    return { type: 'image', image: match[2], mediaType: match[1] };
  }
  return { type: 'image', image: new URL(part.url) };
}

import { Logger } from '@nestjs/common';
import type { z } from 'zod';
import type { AiToolDefinition, ToolArguments } from '../ai/index.js';

export type ToolHandler = (args: ToolArguments) => unknown;

export class ToolArgumentError extends Error {
  public readonly code = 'TOOL_INVALID_ARGUMENTS';
  public readonly cause?: Error;

  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = 'ToolArgumentError';
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

/** Validates a tool's argument mapping against its descriptor schema. */
export function parseToolInput<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  args: ToolArguments,
): z.infer<TSchema> {
  const result = schema.safeParse(args);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; ');
    throw new ToolArgumentError(`Invalid arguments - ${detail}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Maps tool names to handlers. `execute` never throws: unknown tools and
 * handler failures come back as `{"error": ...}` payloads for the model.
 */
export class ToolRegistry {
  private readonly logger = new Logger(ToolRegistry.name);
  private readonly handlers = new Map<string, ToolHandler>();

  constructor(private readonly descriptors: readonly AiToolDefinition[]) {}

  register(name: string, handler: ToolHandler): void {
    this.handlers.set(name, handler);
  }

  getHandler(name: string): ToolHandler | undefined {
    return this.handlers.get(name);
  }

  getTools(): readonly AiToolDefinition[] {
    return this.descriptors;
  }

  async execute(name: string, args: ToolArguments): Promise<string> {
    const handler = this.handlers.get(name);
    if (!handler) {
      this.logger.warn(`Model requested unknown tool: ${name}`);
      return JSON.stringify({ error: `Unknown tool: ${name}` });
    }

    try {
      const result = await handler(args);
      if (typeof result === 'string') {
        return result;
      }
      if (result === null || result === undefined) {
        return 'Done';
      }
      return JSON.stringify(result);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Tool ${name} failed: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      return JSON.stringify({ error: message });
    }
  }
}

import { BadRequestException } from '@nestjs/common';
import type { z } from 'zod';

/** Parses a request payload, turning zod issues into a 400 response. */
export function parseRequest<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  value: unknown,
): z.infer<TSchema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new BadRequestException({
      code: 'BAD_REQUEST',
      message: 'Request validation failed',
      issues: result.error.issues,
    });
  }
  return result.data;
}

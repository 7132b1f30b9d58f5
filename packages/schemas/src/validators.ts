import type { ZodError } from 'zod';
import { SchemaValidationError } from '@verita/shared/src/utils/errors.js';
import { VerificationConfigSchema } from './verification-config.schema.js';
import type { VerificationConfig } from './verification-config.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateVerificationConfig(data: unknown): VerificationConfig {
  const result = VerificationConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError(
      'Invalid verification configuration',
      formatZodErrors(result.error),
    );
  }

  return result.data;
}

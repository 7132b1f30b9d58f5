import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export const RelevanceGateResultSchema = z.object({
  is_news: z.boolean(),
  reason: z.string().optional(),
});

export type RelevanceGateResult = z.infer<typeof RelevanceGateResultSchema>;

export const QueryToolArgumentsSchema = z.object({
  query: z.string().min(1).describe('The search query'),
});

export const ClaimToolArgumentsSchema = z.object({
  claim: z.string().min(1).describe('The claim to fact-check'),
});

export const QueryToolArgumentsJsonSchema = zodToJsonSchema(QueryToolArgumentsSchema, {
  $refStrategy: 'none',
  target: 'openApi3',
});

export const ClaimToolArgumentsJsonSchema = zodToJsonSchema(ClaimToolArgumentsSchema, {
  $refStrategy: 'none',
  target: 'openApi3',
});

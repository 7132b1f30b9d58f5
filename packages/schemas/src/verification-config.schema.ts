import { z } from 'zod';

const AgentConfigSchema = z.object({
  maxIterations: z.number().int().min(1).max(50).default(10),
  maxToolResultChars: z.number().int().min(200).default(6000),
  maxResultsPerSearch: z.number().int().min(1).max(20).default(5),
});

const SearchConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  retryDelayMs: z.number().int().min(0).default(1000),
  attemptTimeoutMs: z.number().int().min(1000).default(20000),
  minTitleLength: z.number().int().min(0).default(5),
  factCheckSites: z
    .array(z.string().min(1))
    .min(1)
    .default(['snopes.com', 'factcheck.org', 'politifact.com', 'reuters.com/fact-check']),
  newsKeywords: z.array(z.string().min(1)).default(['news', 'latest']),
  appendCurrentYear: z.boolean().default(true),
});

const LlmConfigSchema = z.object({
  model: z.string().min(1).default('gemini-2.0-flash'),
  location: z.string().min(1).default('europe-west1'),
  requestTimeoutMs: z.number().int().min(1000).default(60000),
});

export const VerificationConfigSchema = z.object({
  $schema: z.string().optional(),
  agent: AgentConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  llm: LlmConfigSchema.default({}),
});

export type VerificationConfig = z.infer<typeof VerificationConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;

import type { ToolInvocation, ToolName } from '@verita/shared/src/types/conversation.types.js';
import {
  isSearchErrorMarker,
  type SearchRecord,
} from '@verita/shared/src/types/verification.types.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import type { ToolDefinition } from '../llm/reasoning-model.js';
import type { SearchProvider } from '../services/web-search/types.js';
import { ClaimToolArgumentsJsonSchema, QueryToolArgumentsJsonSchema } from './agent-output.schemas.js';

const log = createChildLogger('agent:tools');

interface RegisteredTool {
  readonly definition: ToolDefinition;
  readonly argument: 'query' | 'claim';
  run(provider: SearchProvider, value: string, signal?: AbortSignal): Promise<readonly SearchRecord[]>;
}

const REGISTERED_TOOLS: Readonly<Record<ToolName, RegisteredTool>> = {
  general_search: {
    definition: {
      name: 'general_search',
      description:
        'Search the web for general information to verify facts. Use this to find background on a claim.',
      parameters: QueryToolArgumentsJsonSchema as Record<string, unknown>,
    },
    argument: 'query',
    run: (provider, value, signal) => provider.generalSearch(value, signal),
  },
  news_search: {
    definition: {
      name: 'news_search',
      description:
        'Search recent news coverage. Use this to check whether credible outlets report the claimed event.',
      parameters: QueryToolArgumentsJsonSchema as Record<string, unknown>,
    },
    argument: 'query',
    run: (provider, value, signal) => provider.newsSearch(value, signal),
  },
  fact_check_search: {
    definition: {
      name: 'fact_check_search',
      description:
        'Search fact-checking websites (Snopes, FactCheck.org, PolitiFact, Reuters Fact Check) for existing fact-checks of a claim.',
      parameters: ClaimToolArgumentsJsonSchema as Record<string, unknown>,
    },
    argument: 'claim',
    run: (provider, value, signal) => provider.factCheckSearch(value, signal),
  },
};

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = Object.values(REGISTERED_TOOLS).map(
  (tool) => tool.definition,
);

function isToolName(name: string): name is ToolName {
  return Object.hasOwn(REGISTERED_TOOLS, name);
}

export function serializeToolResult(records: readonly unknown[], maxChars: number): string {
  const json = JSON.stringify(records, null, 2);
  return json.length > maxChars ? json.slice(0, maxChars) : json;
}

export interface ToolExecutorOptions {
  readonly searchProvider: SearchProvider;
  readonly maxToolResultChars: number;
}

/**
 * Runs one tool call and returns the serialized payload for its tool-result
 * turn. Unknown tools and missing arguments become inline error payloads.
 */
export async function executeToolCall(
  invocation: ToolInvocation,
  options: ToolExecutorOptions,
  signal?: AbortSignal,
): Promise<string> {
  const { searchProvider, maxToolResultChars } = options;

  if (!isToolName(invocation.toolName)) {
    return serializeToolResult(
      [{ error: `Unknown tool: ${invocation.toolName}` }],
      maxToolResultChars,
    );
  }

  const tool = REGISTERED_TOOLS[invocation.toolName];
  const value = invocation.arguments[tool.argument]?.trim();
  if (!value) {
    return serializeToolResult(
      [{ error: `Missing required argument "${tool.argument}" for ${invocation.toolName}` }],
      maxToolResultChars,
    );
  }

  const records = await tool.run(searchProvider, value, signal);
  const failure = records.find(isSearchErrorMarker);
  if (failure) {
    log.warn({ tool: invocation.toolName, error: failure.error }, 'Search tool returned an error marker');
  }
  return serializeToolResult(records, maxToolResultChars);
}

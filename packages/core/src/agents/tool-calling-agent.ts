import type { Claim } from '@verita/shared/src/types/verification.types.js';
import type { ToolInvocation, Turn } from '@verita/shared/src/types/conversation.types.js';
import type { AgentConfig } from '@verita/schemas/src/verification-config.schema.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { throwIfAborted } from '@verita/shared/src/utils/async.js';
import type { ReasoningModel, ReasoningResponse } from '../llm/reasoning-model.js';
import type { SearchProvider } from '../services/web-search/types.js';
import { executeToolCall, TOOL_DEFINITIONS } from './agent-tools.js';
import { describeManipulationSignals, detectManipulationSignals } from './manipulation-signals.js';

const log = createChildLogger('agent:tool-calling');

const PAYLOAD_LOG_CHARS = 500;

export const AGENT_SYSTEM_PROMPT = `You are an expert fact-checker and misinformation detection agent. Your job is to analyze text and determine if it contains misinformation or fake news.

You have access to the following tools:
1. general_search - Search the web for general information to verify facts
2. news_search - Search recent news coverage
3. fact_check_search - Search fact-checking websites for existing fact-checks

Instructions:
1. Identify the key claims in the text that need verification.
2. Use your tools to search for evidence and check multiple sources.
3. Look for:
   - Whether credible news sources report the claim
   - Whether fact-checkers have already verified or debunked it
   - Contradictory information from reliable sources
   - Signs of satire, parody, or obvious fabrication
4. After gathering evidence, give your final assessment in this exact JSON format:
{
    "is_misinformation": true/false,
    "confidence": 0.0-1.0,
    "summary": "Brief explanation of your findings",
    "evidence": ["Key evidence points that support your conclusion"],
    "sources_checked": ["Actual URLs from the search results, e.g. https://example.com/article"],
    "recommendation": "What the user should know or do"
}

In "sources_checked", include the actual URLs from the search results you received.
In "evidence", give specific facts you found that support your conclusion.
Be thorough but efficient. If a claim is obviously absurd (like a historical figure being found alive), you can decide quickly. For nuanced claims, gather more evidence.`;

export type AgentTermination = 'answer' | 'iteration-cap';

export interface AgentRunResult {
  readonly finalText: string;
  readonly iterations: number;
  readonly terminatedBy: AgentTermination;
  readonly toolCallCount: number;
}

export interface ToolCallingAgentDeps {
  readonly reasoningModel: ReasoningModel;
  readonly searchProvider: SearchProvider;
  readonly config: AgentConfig;
}

export interface ToolCallingAgent {
  run(claim: Claim, signal?: AbortSignal): Promise<AgentRunResult>;
}

export function buildInitialUserMessage(claimText: string): string {
  const hint = describeManipulationSignals(detectManipulationSignals(claimText));
  const message = `Please analyze the following text for misinformation:\n\n${claimText}`;
  return hint ? `${message}\n\n${hint}` : message;
}

export function createToolCallingAgent(deps: ToolCallingAgentDeps): ToolCallingAgent {
  const { reasoningModel, searchProvider, config } = deps;
  const executorOptions = {
    searchProvider,
    maxToolResultChars: config.maxToolResultChars,
  };

  return {
    async run(claim: Claim, signal?: AbortSignal): Promise<AgentRunResult> {
      const turns: Turn[] = [
        { kind: 'system', content: AGENT_SYSTEM_PROMPT },
        { kind: 'user', content: buildInitialUserMessage(claim.text) },
      ];

      let lastContent = '';
      let toolCallCount = 0;

      for (let iteration = 1; iteration <= config.maxIterations; iteration++) {
        throwIfAborted(signal);
        log.debug({ claimId: claim.id, iteration }, 'Requesting model turn');

        let response: ReasoningResponse;
        try {
          response = await reasoningModel.complete({ turns, tools: TOOL_DEFINITIONS }, signal);
        } catch (error) {
          throwIfAborted(signal);
          log.error(
            {
              claimId: claim.id,
              iteration,
              error: error instanceof Error ? error.message : String(error),
            },
            'Reasoning model failed, ending agent loop without an answer',
          );
          return { finalText: '', iterations: iteration, terminatedBy: 'answer', toolCallCount };
        }

        lastContent = response.content;

        if (response.toolCalls.length === 0) {
          log.info({ claimId: claim.id, iteration, toolCallCount }, 'Agent produced final answer');
          return {
            finalText: response.content,
            iterations: iteration,
            terminatedBy: 'answer',
            toolCallCount,
          };
        }

        turns.push({
          kind: 'assistant',
          content: response.content,
          toolInvocations: response.toolCalls,
        });

        for (const invocation of response.toolCalls) {
          turns.push(await runTool(invocation, claim.id, iteration, signal));
          toolCallCount++;
        }
      }

      log.warn(
        { claimId: claim.id, maxIterations: config.maxIterations, toolCallCount },
        'Agent reached iteration cap, returning last model text',
      );
      return {
        finalText: lastContent,
        iterations: config.maxIterations,
        terminatedBy: 'iteration-cap',
        toolCallCount,
      };
    },
  };

  async function runTool(
    invocation: ToolInvocation,
    claimId: string,
    iteration: number,
    signal?: AbortSignal,
  ): Promise<Turn> {
    log.info(
      { claimId, iteration, tool: invocation.toolName, arguments: invocation.arguments },
      'Executing tool call',
    );

    const content = await executeToolCall(invocation, executorOptions, signal);
    log.debug(
      { claimId, tool: invocation.toolName, payload: content.slice(0, PAYLOAD_LOG_CHARS) },
      'Tool call completed',
    );

    return {
      kind: 'tool-result',
      correlationId: invocation.correlationId,
      toolName: invocation.toolName,
      content,
    };
  }
}

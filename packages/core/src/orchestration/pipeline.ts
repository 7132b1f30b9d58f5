import { StateGraph, START, END, type LangGraphRunnableConfig } from '@langchain/langgraph';
import type { Claim, Verdict } from '@verita/shared/src/types/verification.types.js';
import type { VerificationConfig } from '@verita/schemas/src/verification-config.schema.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { throwIfAborted } from '@verita/shared/src/utils/async.js';
import { AgentError } from '@verita/shared/src/utils/errors.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { ReasoningModel } from '../llm/reasoning-model.js';
import type { SearchProvider } from '../services/web-search/types.js';
import { extractJsonObject, type ExtractionResult } from '../llm/json-extraction.js';
import { createRelevanceGate } from '../agents/relevance-gate.js';
import { createToolCallingAgent } from '../agents/tool-calling-agent.js';
import { assembleVerdict } from '../agents/verdict-assembler.js';
import { PipelineGraphAnnotation, type PipelineGraphState } from './pipeline-state.js';

const log = createChildLogger('orchestration:pipeline');

export interface PipelineConfig {
  readonly config: VerificationConfig;
  readonly llmClient: LlmClient;
  readonly reasoningModel: ReasoningModel;
  readonly searchProvider: SearchProvider;
}

export interface ClassifyOptions {
  readonly signal?: AbortSignal;
}

export interface Pipeline {
  classify(claim: Claim, options?: ClassifyOptions): Promise<Verdict>;
}

const AGENT_SKIPPED: ExtractionResult = {
  ok: false,
  failure: { reason: 'Agent did not run', excerpt: '' },
};

function routeAfterGate(state: PipelineGraphState): string {
  return state.gateResult?.isNews === false ? 'assemble' : 'agent';
}

export function createPipeline(pipelineConfig: PipelineConfig): Pipeline {
  const { config, llmClient, reasoningModel, searchProvider } = pipelineConfig;

  log.info(
    { maxIterations: config.agent.maxIterations, model: config.llm.model },
    'Initializing verification pipeline',
  );

  const gate = createRelevanceGate(llmClient);
  const agent = createToolCallingAgent({ reasoningModel, searchProvider, config: config.agent });

  const graph = new StateGraph(PipelineGraphAnnotation)
    .addNode(
      'relevanceGate',
      async (state: PipelineGraphState, runConfig: LangGraphRunnableConfig) => ({
        gateResult: await gate.isFactCheckable(state.claim.text, runConfig.signal),
      }),
    )
    .addNode('agent', async (state: PipelineGraphState, runConfig: LangGraphRunnableConfig) => {
      const agentResult = await agent.run(state.claim, runConfig.signal);
      const extraction = extractJsonObject(agentResult.finalText);
      if (!extraction.ok) {
        log.warn(
          { claimId: state.claim.id, failure: extraction.failure },
          'Could not extract a verdict from the agent answer',
        );
      }
      return { agentResult, extraction };
    })
    .addNode('assemble', (state: PipelineGraphState) => {
      if (!state.gateResult) {
        throw new AgentError('Verdict assembly reached without a gate result');
      }
      return { verdict: assembleVerdict(state.extraction ?? AGENT_SKIPPED, state.gateResult) };
    })
    .addEdge(START, 'relevanceGate')
    .addConditionalEdges('relevanceGate', routeAfterGate, {
      agent: 'agent',
      assemble: 'assemble',
    })
    .addEdge('agent', 'assemble')
    .addEdge('assemble', END)
    .compile();

  return {
    async classify(claim: Claim, options?: ClassifyOptions): Promise<Verdict> {
      const signal = options?.signal;
      const runLog = createChildLogger('orchestration:pipeline', { claimId: claim.id });
      runLog.info({ modality: claim.modality }, 'Classifying claim');

      let result: PipelineGraphState;
      try {
        result = await graph.invoke(
          {
            claim,
            gateResult: undefined,
            agentResult: undefined,
            extraction: undefined,
            verdict: undefined,
          },
          { signal },
        );
      } catch (error) {
        throwIfAborted(signal);
        throw error;
      }

      if (!result.verdict) {
        throw new AgentError(`Pipeline finished without a verdict for claim ${claim.id}`);
      }

      runLog.info(
        {
          isNews: result.verdict.isNews,
          isMisinformation: result.verdict.isMisinformation,
          confidence: result.verdict.confidence,
          iterations: result.agentResult?.iterations,
          terminatedBy: result.agentResult?.terminatedBy,
        },
        'Classification complete',
      );

      return result.verdict;
    },
  };
}

import { Annotation } from '@langchain/langgraph';
import type { Claim, GateResult, Verdict } from '@verita/shared/src/types/verification.types.js';
import type { AgentRunResult } from '../agents/tool-calling-agent.js';
import type { ExtractionResult } from '../llm/json-extraction.js';

export const PipelineGraphAnnotation = Annotation.Root({
  claim: Annotation<Claim>,
  gateResult: Annotation<GateResult | undefined>,
  agentResult: Annotation<AgentRunResult | undefined>,
  extraction: Annotation<ExtractionResult | undefined>,
  verdict: Annotation<Verdict | undefined>,
});

export type PipelineGraphState = typeof PipelineGraphAnnotation.State;

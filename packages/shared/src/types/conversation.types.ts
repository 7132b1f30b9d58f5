export type ToolName = 'general_search' | 'news_search' | 'fact_check_search';

export interface ToolInvocation {
  /** As requested by the model; may name a tool that does not exist. */
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, string>>;
  readonly correlationId: string;
}

export interface SystemTurn {
  readonly kind: 'system';
  readonly content: string;
}

export interface UserTurn {
  readonly kind: 'user';
  readonly content: string;
}

export interface AssistantTurn {
  readonly kind: 'assistant';
  readonly content: string;
  readonly toolInvocations: readonly ToolInvocation[];
}

export interface ToolResultTurn {
  readonly kind: 'tool-result';
  readonly correlationId: string;
  readonly toolName: string;
  readonly content: string;
}

export type Turn = SystemTurn | UserTurn | AssistantTurn | ToolResultTurn;

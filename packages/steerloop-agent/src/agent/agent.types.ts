import {
  ActionOutcome,
  ErrorPayload,
  Message,
  MessageContentBlock,
  ProposedAction,
} from '@steerloop/shared';
import { ExecutionTarget } from '../execution/execution-target';

export const AGENT_MODEL_SERVICE = Symbol('AGENT_MODEL_SERVICE');
export const LOCAL_FUNCTION_HANDLERS = Symbol('LOCAL_FUNCTION_HANDLERS');

/**
 * JSON schema declaration of a function the model may call.
 */
export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface AgentResponse {
  contentBlocks: MessageContentBlock[];
  tokenUsage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
}

export interface AgentModelService {
  generateMessage(
    systemPrompt: string,
    messages: Message[],
    tools: ToolDeclaration[],
    signal?: AbortSignal,
  ): Promise<AgentResponse>;
}

export interface LocalFunctionContext {
  target: ExecutionTarget;
  signal?: AbortSignal;
}

/**
 * A function implemented in-process. Search handlers are tagged so the
 * screenshot policy can tell them apart.
 */
export interface LocalFunctionHandler {
  name: string;
  category: 'search_function' | 'function';
  invoke(
    args: Record<string, unknown>,
    context: LocalFunctionContext,
  ): Promise<unknown>;
}

export type Exchange = Readonly<{
  index: number;
  response: Readonly<AgentResponse>;
  actions: readonly ProposedAction[];
  outcomes: readonly ActionOutcome[];
}>;

export type TurnStatus = 'completed' | 'cancelled' | 'failed';

export type CancellationReason = 'interrupted' | 'deadline' | 'exchange_limit';

export interface TurnOptions {
  target: ExecutionTarget;
  // Generated when absent; used by `turn.*` events and `turn.cancel`
  turnId?: string;
  systemPrompt?: string;
  signal?: AbortSignal;
  // Overrides the configured turn deadline
  deadlineMs?: number;
}

export type TurnResult =
  | {
      status: 'completed';
      exchanges: Exchange[];
      history: Message[];
      finalResponse: Readonly<AgentResponse>;
    }
  | {
      status: 'cancelled';
      reason: CancellationReason;
      exchanges: Exchange[];
      history: Message[];
    }
  | {
      // The model request failed; completed exchanges are kept
      status: 'failed';
      error: ErrorPayload;
      exchanges: Exchange[];
      history: Message[];
    };

export interface TurnEventPayload {
  turnId: string;
}

export interface TurnExchangeEvent extends TurnEventPayload {
  exchange: Exchange;
}

export interface TurnCancelledEvent extends TurnEventPayload {
  reason: CancellationReason;
  completedExchanges: number;
}

export interface TurnFailedEvent extends TurnEventPayload {
  error: ErrorPayload;
  completedExchanges: number;
}

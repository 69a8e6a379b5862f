import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2, OnEvent } from '@nestjs/event-emitter';
import { randomUUID } from 'crypto';
import {
  ActionOutcome,
  Message,
  MessageContentType,
  ProposedAction,
  Role,
  SafetyCheck,
  extractProposedActions,
  extractText,
  isComputerCallContentBlock,
  sanitizeMessage,
} from '@steerloop/shared';
import { linkAbortController, throwIfAborted } from '../common/abort';
import {
  SafetyBlockedError,
  TargetBusyError,
  errorToPayload,
  isTurnInterrupt,
} from '../common/errors';
import { snapshot } from '../common/immutable';
import { agentConfig, AgentSettings } from '../config/agent.config';
import { ExecutionTarget } from '../execution/execution-target';
import { ACTION_LOG_PREFIX } from '../logger/winston-logger.service';
import { AcknowledgementService } from '../safety/acknowledgement.service';
import { SafetyGate } from '../safety/safety-gate.service';
import { defaultSystemPrompt } from './agent.constants';
import { AgentDispatcher, failureOutcome } from './agent.dispatcher';
import { outcomeToToolResult } from './agent.outcomes';
import {
  AGENT_MODEL_SERVICE,
  AgentModelService,
  AgentResponse,
  CancellationReason,
  Exchange,
  ToolDeclaration,
  TurnCancelledEvent,
  TurnEventPayload,
  TurnExchangeEvent,
  TurnFailedEvent,
  TurnOptions,
  TurnResult,
} from './agent.types';

export const TURN_STARTED_EVENT = 'turn.started';
export const TURN_EXCHANGE_EVENT = 'turn.exchange';
export const TURN_COMPLETED_EVENT = 'turn.completed';
export const TURN_CANCELLED_EVENT = 'turn.cancelled';
export const TURN_FAILED_EVENT = 'turn.failed';
export const TURN_CANCEL_EVENT = 'turn.cancel';

// A completed exchange shares nothing with the turn's history
function freezeExchange(
  index: number,
  response: AgentResponse,
  actions: ProposedAction[],
  outcomes: ActionOutcome[],
): Exchange {
  return snapshot({ index, response, actions, outcomes });
}

/**
 * Drives a turn: asks the model for its next response, runs the proposed
 * actions one at a time and feeds the outcomes back until the model stops
 * proposing actions.
 */
@Injectable()
export class AgentProcessor {
  private readonly logger = new Logger(AgentProcessor.name);
  private readonly activeTargets = new WeakSet<ExecutionTarget>();
  private readonly activeTurns = new Map<string, AbortController>();

  constructor(
    @Inject(agentConfig.KEY) private readonly settings: AgentSettings,
    @Inject(AGENT_MODEL_SERVICE)
    private readonly modelService: AgentModelService,
    private readonly dispatcher: AgentDispatcher,
    private readonly safetyGate: SafetyGate,
    private readonly acknowledgements: AcknowledgementService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  @OnEvent(TURN_CANCEL_EVENT)
  handleTurnCancel({ turnId }: TurnEventPayload) {
    const controller = this.activeTurns.get(turnId);
    if (!controller) {
      this.logger.log(`Ignoring cancel event for unknown turn ${turnId}`);
      return;
    }
    this.logger.log(`Cancel event received for turn ${turnId}`);
    controller.abort();
  }

  isActive(turnId: string): boolean {
    return this.activeTurns.has(turnId);
  }

  /**
   * Runs one turn to completion, cancellation or failure. The returned
   * history is the given history followed by the user input and every
   * completed exchange; the caller's array is not modified. Only a busy
   * target is reported by throwing.
   */
  async runFullTurn(
    initialInput: string,
    toolDeclarations: readonly ToolDeclaration[],
    history: readonly Message[],
    options: TurnOptions,
  ): Promise<TurnResult> {
    const { target } = options;
    if (this.activeTargets.has(target)) {
      throw new TargetBusyError();
    }

    const turnId = options.turnId ?? randomUUID();
    const systemPrompt = options.systemPrompt ?? defaultSystemPrompt();
    const link = linkAbortController(
      options.signal,
      options.deadlineMs ?? this.settings.turnTimeoutMs,
    );
    const signal = link.controller.signal;
    const exchanges: Exchange[] = [];
    const turnHistory: Message[] = [...history];

    if (initialInput.trim().length > 0) {
      turnHistory.push({
        role: Role.User,
        content: [{ type: MessageContentType.Text, text: initialInput }],
      });
    }

    this.activeTargets.add(target);
    this.activeTurns.set(turnId, link.controller);
    this.logger.log(`Starting turn ${turnId}`);
    this.eventEmitter.emit(TURN_STARTED_EVENT, { turnId });

    const cancelled = (reason: CancellationReason): TurnResult => {
      this.logger.warn(
        `Turn ${turnId} cancelled (${reason}) after ${exchanges.length} exchange(s)`,
      );
      const event: TurnCancelledEvent = {
        turnId,
        reason,
        completedExchanges: exchanges.length,
      };
      this.eventEmitter.emit(TURN_CANCELLED_EVENT, event);
      return {
        status: 'cancelled',
        reason,
        exchanges,
        history: turnHistory,
      };
    };

    try {
      for (;;) {
        if (exchanges.length >= this.settings.maxExchanges) {
          return cancelled('exchange_limit');
        }
        throwIfAborted(signal);

        const response = await this.modelService.generateMessage(
          systemPrompt,
          turnHistory,
          [...toolDeclarations],
          signal,
        );
        throwIfAborted(signal);

        const actions = extractProposedActions(response.contentBlocks);
        const assistantMessage: Message = {
          role: Role.Assistant,
          content: response.contentBlocks,
        };
        this.logger.debug(
          `Exchange ${exchanges.length}: ${JSON.stringify(sanitizeMessage(assistantMessage))}`,
        );

        if (actions.length === 0) {
          turnHistory.push(assistantMessage);
          const exchange = freezeExchange(exchanges.length, response, [], []);
          this.recordExchange(turnId, exchanges, exchange);
          this.logger.log(
            `Turn ${turnId} completed: ${extractText(response.contentBlocks) ?? '(no text)'}`,
          );
          this.eventEmitter.emit(TURN_COMPLETED_EVENT, { turnId });
          return {
            status: 'completed',
            exchanges,
            history: turnHistory,
            finalResponse: exchange.response,
          };
        }

        // Outcomes reach history only once the whole exchange has resolved
        const outcomes: ActionOutcome[] = [];
        for (const action of actions) {
          throwIfAborted(signal);
          outcomes.push(
            await this.resolveAction(action, target, toolDeclarations, signal),
          );
        }

        const resultMessage: Message = {
          role: Role.User,
          content: outcomes.map(outcomeToToolResult),
        };
        this.logger.debug(
          `Outcomes: ${JSON.stringify(sanitizeMessage(resultMessage))}`,
        );
        turnHistory.push(assistantMessage, resultMessage);
        this.recordExchange(
          turnId,
          exchanges,
          freezeExchange(exchanges.length, response, actions, outcomes),
        );
      }
    } catch (error) {
      if (isTurnInterrupt(error) || signal.aborted) {
        return cancelled(link.timedOut() ? 'deadline' : 'interrupted');
      }
      const payload = errorToPayload(error);
      this.logger.error(
        `Turn ${turnId} failed after ${exchanges.length} exchange(s): ${payload.message}`,
        error instanceof Error ? error.stack : undefined,
      );
      const event: TurnFailedEvent = {
        turnId,
        error: payload,
        completedExchanges: exchanges.length,
      };
      this.eventEmitter.emit(TURN_FAILED_EVENT, event);
      return {
        status: 'failed',
        error: payload,
        exchanges,
        history: turnHistory,
      };
    } finally {
      link.dispose();
      this.activeTargets.delete(target);
      this.activeTurns.delete(turnId);
    }
  }

  private recordExchange(
    turnId: string,
    exchanges: Exchange[],
    exchange: Exchange,
  ): void {
    exchanges.push(exchange);
    const event: TurnExchangeEvent = { turnId, exchange };
    this.eventEmitter.emit(TURN_EXCHANGE_EVENT, event);
  }

  private async resolveAction(
    action: ProposedAction,
    target: ExecutionTarget,
    toolDeclarations: readonly ToolDeclaration[],
    signal: AbortSignal,
  ): Promise<ActionOutcome> {
    const verdict = this.safetyGate.check(action);

    if (verdict.verdict === 'block') {
      this.logger.warn(`${ACTION_LOG_PREFIX} ${action.callId} blocked`);
      return failureOutcome(
        action,
        new SafetyBlockedError(
          verdict.reasons.map((reason) => reason.message).join('; '),
          { reasons: verdict.reasons },
        ),
      );
    }

    let acknowledgedSafetyChecks: SafetyCheck[] = [];
    if (verdict.verdict === 'require_ack') {
      const approved = await this.acknowledgements.request(
        action,
        verdict.reasons,
        signal,
      );
      if (!approved) {
        this.logger.warn(
          `${ACTION_LOG_PREFIX} ${action.callId} was not acknowledged`,
        );
        return failureOutcome(
          action,
          new SafetyBlockedError('The action was not acknowledged', {
            reasons: verdict.reasons,
          }),
        );
      }
      if (isComputerCallContentBlock(action)) {
        acknowledgedSafetyChecks = action.pendingSafetyChecks;
      }
    }

    return this.dispatcher.dispatch(action, target, toolDeclarations, signal, {
      acknowledgedSafetyChecks,
    });
  }
}

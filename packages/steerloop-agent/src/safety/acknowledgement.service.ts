import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ProposedAction } from '@steerloop/shared';
import { TurnInterrupt, errorMessage } from '../common/errors';
import { agentConfig, AgentSettings } from '../config/agent.config';
import { SafetyReason } from './safety-gate.service';

export const ACK_REQUESTED_EVENT = 'safety.ack.requested';
export const ACK_RESPONDED_EVENT = 'safety.ack.responded';

export interface AcknowledgementRequest {
  callId: string;
  action: ProposedAction;
  reasons: SafetyReason[];
}

export interface AcknowledgementResponse {
  callId: string;
  approved: boolean;
}

export function isAcknowledgementResponse(
  value: unknown,
): value is AcknowledgementResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'callId' in value &&
    typeof value.callId === 'string' &&
    'approved' in value &&
    typeof value.approved === 'boolean'
  );
}

/**
 * Obtains the external confirmation that a `require_ack` verdict waits for.
 * In `event` mode the request is published on the event emitter and the
 * first matching response, or the timeout, decides.
 */
@Injectable()
export class AcknowledgementService {
  private readonly logger = new Logger(AcknowledgementService.name);

  constructor(
    private readonly eventEmitter: EventEmitter2,
    @Inject(agentConfig.KEY) private readonly settings: AgentSettings,
  ) {}

  async request(
    action: ProposedAction,
    reasons: SafetyReason[],
    signal?: AbortSignal,
  ): Promise<boolean> {
    const { ackMode, ackTimeoutMs } = this.settings.safety;

    switch (ackMode) {
      case 'auto':
        this.logger.log(`Auto-acknowledging ${action.callId}`);
        return true;
      case 'deny':
        this.logger.warn(`Acknowledgement denied for ${action.callId}`);
        return false;
      case 'event':
        return this.awaitResponse(action, reasons, ackTimeoutMs, signal);
    }
  }

  private async awaitResponse(
    action: ProposedAction,
    reasons: SafetyReason[],
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    if (signal?.aborted) {
      throw new TurnInterrupt();
    }

    const waiting = this.eventEmitter.waitFor(ACK_RESPONDED_EVENT, {
      timeout: timeoutMs,
      filter: (payload: unknown) =>
        isAcknowledgementResponse(payload) && payload.callId === action.callId,
      handleError: false,
      Promise,
      overload: false,
    });
    const onAbort = () => waiting.cancel('turn cancelled');
    signal?.addEventListener('abort', onAbort, { once: true });

    const request: AcknowledgementRequest = {
      callId: action.callId,
      action,
      reasons,
    };
    this.eventEmitter.emit(ACK_REQUESTED_EVENT, request);

    try {
      const [payload]: unknown[] = await waiting;
      return isAcknowledgementResponse(payload) && payload.approved;
    } catch (error) {
      if (signal?.aborted) {
        throw new TurnInterrupt();
      }
      this.logger.warn(
        `No acknowledgement for ${action.callId}: ${errorMessage(error)}`,
      );
      return false;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

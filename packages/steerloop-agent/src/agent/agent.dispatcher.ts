import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ActionCategory,
  ActionOutcome,
  ComputerAction,
  ComputerCallContentBlock,
  FailureOutcome,
  FunctionCallContentBlock,
  ProposedAction,
  SafetyCheck,
  ScreenshotCapture,
  describeComputerAction,
  getActionCategory,
  isComputerAction,
  isComputerCallContentBlock,
} from '@steerloop/shared';
import {
  UnroutableActionError,
  SafetyBlockedError,
  errorToPayload,
  isTurnInterrupt,
  errorMessage,
} from '../common/errors';
import { agentConfig, AgentSettings } from '../config/agent.config';
import {
  ExecutionTarget,
  TargetFunction,
  getTargetFunction,
} from '../execution/execution-target';
import { ACTION_LOG_PREFIX } from '../logger/winston-logger.service';
import { SafetyGate } from '../safety/safety-gate.service';
import { PLACEHOLDER_FUNCTION_RESULT } from './agent.constants';
import {
  TargetCallOptions,
  callTarget,
  captureScreenshot,
  executeComputerAction,
} from './agent.computer-use';
import {
  LOCAL_FUNCTION_HANDLERS,
  LocalFunctionHandler,
  ToolDeclaration,
} from './agent.types';
import { shouldCapture } from './screenshot-policy';
import { ScreenshotStore } from './screenshot-store.service';

export type FunctionRouteTarget =
  | { kind: 'environment_function'; fn: TargetFunction }
  | { kind: 'local_function'; handler: LocalFunctionHandler }
  | { kind: 'stub_function' };

export type ActionRoute =
  | { kind: 'builtin'; call: ComputerCallContentBlock; action: ComputerAction }
  | (FunctionRouteTarget & { call: FunctionCallContentBlock })
  | { kind: 'unroutable'; reason: string };

export interface DispatchOptions {
  acknowledgedSafetyChecks?: SafetyCheck[];
}

export function failureOutcome(
  action: ProposedAction,
  error: unknown,
): FailureOutcome {
  return {
    kind: 'failure',
    callId: action.callId,
    toolKind: isComputerCallContentBlock(action) ? 'computer' : 'function',
    error: errorToPayload(error),
  };
}

/**
 * Routes each proposed action to the target, a local handler or the
 * placeholder stub, and turns whatever happens into an ActionOutcome.
 * Only cancellation escapes as an exception.
 */
@Injectable()
export class AgentDispatcher {
  private readonly logger = new Logger(AgentDispatcher.name);
  private readonly handlers: ReadonlyMap<string, LocalFunctionHandler>;

  constructor(
    @Inject(agentConfig.KEY) private readonly settings: AgentSettings,
    private readonly safetyGate: SafetyGate,
    private readonly screenshotStore: ScreenshotStore,
    @Inject(LOCAL_FUNCTION_HANDLERS) handlers: LocalFunctionHandler[],
  ) {
    this.handlers = new Map(handlers.map((handler) => [handler.name, handler]));
  }

  resolveRoute(
    action: ProposedAction,
    target: ExecutionTarget,
    toolDeclarations: readonly ToolDeclaration[],
  ): ActionRoute {
    if (isComputerCallContentBlock(action)) {
      return isComputerAction(action.action)
        ? { kind: 'builtin', call: action, action: action.action }
        : {
            kind: 'unroutable',
            reason: `Unsupported computer action "${action.action.requested}"`,
          };
    }

    if (!toolDeclarations.some((tool) => tool.name === action.name)) {
      return {
        kind: 'unroutable',
        reason: `Function "${action.name}" is not declared`,
      };
    }
    const fn = getTargetFunction(target, action.name);
    if (fn) {
      return { kind: 'environment_function', call: action, fn };
    }
    const handler = this.handlers.get(action.name);
    if (handler) {
      return { kind: 'local_function', call: action, handler };
    }
    return { kind: 'stub_function', call: action };
  }

  async dispatch(
    action: ProposedAction,
    target: ExecutionTarget,
    toolDeclarations: readonly ToolDeclaration[],
    signal?: AbortSignal,
    options: DispatchOptions = {},
  ): Promise<ActionOutcome> {
    const route = this.resolveRoute(action, target, toolDeclarations);
    const callOptions: TargetCallOptions = {
      timeoutMs: this.settings.executionTimeoutMs,
      signal,
    };

    try {
      switch (route.kind) {
        case 'unroutable':
          throw new UnroutableActionError(route.reason);
        case 'builtin':
          return await this.runBuiltin(
            route.call,
            route.action,
            target,
            callOptions,
            options.acknowledgedSafetyChecks ?? [],
          );
        default:
          return await this.runFunction(
            route.call,
            route,
            target,
            callOptions,
          );
      }
    } catch (error) {
      if (isTurnInterrupt(error)) {
        throw error;
      }
      const outcome = failureOutcome(action, error);
      this.logger.warn(
        `${ACTION_LOG_PREFIX} ${action.callId} failed with ${outcome.error.code}: ${outcome.error.message}`,
      );
      return outcome;
    }
  }

  private async runBuiltin(
    call: ComputerCallContentBlock,
    action: ComputerAction,
    target: ExecutionTarget,
    callOptions: TargetCallOptions,
    acknowledgedSafetyChecks: SafetyCheck[],
  ): Promise<ActionOutcome> {
    const category = getActionCategory(action);
    this.logger.verbose(
      `${ACTION_LOG_PREFIX} ${call.callId} ${describeComputerAction(action)}`,
    );

    const requested = await executeComputerAction(
      target,
      action,
      callOptions,
      this.logger,
    );
    const screenshot =
      requested ?? (await this.captureAfter(category, target, callOptions));
    if (screenshot) {
      await this.screenshotStore.save(screenshot, action.action);
    }

    const currentUrl = await this.readCurrentUrl(target, callOptions);
    if (currentUrl !== undefined) {
      const verdict = this.safetyGate.checkUrl(currentUrl);
      if (verdict.verdict === 'block') {
        throw new SafetyBlockedError(
          `The target navigated to a blocked page: ${currentUrl}`,
          { url: currentUrl, reasons: verdict.reasons },
        );
      }
    }

    return {
      kind: 'computer_result',
      callId: call.callId,
      action: action.action,
      ...(screenshot ? { screenshot } : {}),
      ...(currentUrl !== undefined ? { currentUrl } : {}),
      acknowledgedSafetyChecks,
    };
  }

  private async runFunction(
    call: FunctionCallContentBlock,
    route: FunctionRouteTarget,
    target: ExecutionTarget,
    callOptions: TargetCallOptions,
  ): Promise<ActionOutcome> {
    this.logger.verbose(
      `${ACTION_LOG_PREFIX} ${call.callId} ${call.name}(${call.rawArguments}) via ${route.kind}`,
    );

    let result: unknown;
    let category: ActionCategory;
    switch (route.kind) {
      case 'environment_function': {
        const { fn } = route;
        result = await callTarget(
          `function ${call.name}`,
          (signal) => fn(call.arguments, signal),
          callOptions,
        );
        category = 'environment_function';
        break;
      }
      case 'local_function':
        result = await route.handler.invoke(call.arguments, {
          target,
          signal: callOptions.signal,
        });
        category = route.handler.category;
        break;
      case 'stub_function':
        result = PLACEHOLDER_FUNCTION_RESULT;
        category = 'function';
        break;
    }

    const screenshot = await this.captureAfter(category, target, callOptions);
    if (screenshot) {
      await this.screenshotStore.save(screenshot, call.name);
    }

    return {
      kind: 'function_result',
      callId: call.callId,
      name: call.name,
      route: route.kind,
      result,
      ...(screenshot ? { screenshot } : {}),
    };
  }

  /**
   * Post-action capture. A failed capture leaves the completed action's
   * result in place and is only logged.
   */
  private async captureAfter(
    category: ActionCategory,
    target: ExecutionTarget,
    callOptions: TargetCallOptions,
  ): Promise<ScreenshotCapture | undefined> {
    if (!shouldCapture(category, this.settings.screenshotMode)) {
      return undefined;
    }
    try {
      return await captureScreenshot(target, callOptions);
    } catch (error) {
      if (isTurnInterrupt(error)) {
        throw error;
      }
      this.logger.warn(
        `Screenshot after ${category} action failed: ${errorMessage(error)}`,
      );
      return undefined;
    }
  }

  private async readCurrentUrl(
    target: ExecutionTarget,
    callOptions: TargetCallOptions,
  ): Promise<string | undefined> {
    if (!target.currentUrl) {
      return undefined;
    }
    const currentUrl = target.currentUrl.bind(target);
    return callTarget(
      'current url',
      (signal) => currentUrl(signal),
      callOptions,
    );
  }
}

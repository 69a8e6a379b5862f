import { Logger } from '@nestjs/common';
import {
  ComputerAction,
  ScreenshotCapture,
  describeComputerAction,
} from '@steerloop/shared';
import { runWithDeadline } from '../common/abort';
import { AgentError, ExecutionTargetError, errorMessage } from '../common/errors';
import { ExecutionTarget } from '../execution/execution-target';
import { DEFAULT_WAIT_MS } from './agent.constants';

export interface TargetCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs one target operation under the execution deadline. Anything the
 * target throws that is not already an agent error is reported as an
 * ExecutionTargetError; cancellation passes through untouched.
 */
export async function callTarget<T>(
  description: string,
  operation: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, signal }: TargetCallOptions,
): Promise<T> {
  try {
    return await runWithDeadline(operation, {
      timeoutMs,
      signal,
      onTimeout: () =>
        new ExecutionTargetError(
          `${description} did not finish within ${timeoutMs}ms`,
          { timeoutMs },
        ),
    });
  } catch (error) {
    if (error instanceof AgentError) {
      throw error;
    }
    throw new ExecutionTargetError(
      `${description} failed: ${errorMessage(error)}`,
    );
  }
}

export async function captureScreenshot(
  target: ExecutionTarget,
  options: TargetCallOptions,
): Promise<ScreenshotCapture> {
  const data = await callTarget(
    'screenshot',
    (signal) => target.screenshot(signal),
    options,
  );
  return {
    data,
    mediaType: 'image/png',
    capturedAt: new Date().toISOString(),
  };
}

/**
 * Performs a computer action on the target. Only the `screenshot` action
 * produces a capture here; post-action captures are the dispatcher's call.
 */
export async function executeComputerAction(
  target: ExecutionTarget,
  action: ComputerAction,
  options: TargetCallOptions,
  logger: Logger,
): Promise<ScreenshotCapture | undefined> {
  const description = describeComputerAction(action);
  logger.debug(`Executing ${description}`);

  switch (action.action) {
    case 'screenshot':
      return captureScreenshot(target, options);
    case 'click':
      await callTarget(
        description,
        (signal) => target.click(action.coordinates, action.button, signal),
        options,
      );
      return undefined;
    case 'double_click':
      await callTarget(
        description,
        (signal) => target.doubleClick(action.coordinates, signal),
        options,
      );
      return undefined;
    case 'move':
      await callTarget(
        description,
        (signal) => target.move(action.coordinates, signal),
        options,
      );
      return undefined;
    case 'drag':
      await callTarget(
        description,
        (signal) => target.drag(action.path, signal),
        options,
      );
      return undefined;
    case 'scroll':
      await callTarget(
        description,
        (signal) =>
          target.scroll(
            action.coordinates,
            action.scrollX,
            action.scrollY,
            signal,
          ),
        options,
      );
      return undefined;
    case 'keypress':
      await callTarget(
        description,
        (signal) => target.keypress(action.keys, signal),
        options,
      );
      return undefined;
    case 'type':
      await callTarget(
        description,
        (signal) => target.type(action.text, signal),
        options,
      );
      return undefined;
    case 'wait': {
      const durationMs = action.durationMs ?? DEFAULT_WAIT_MS;
      // The wait itself must not count against the execution deadline
      await callTarget(
        description,
        (signal) => target.wait(durationMs, signal),
        { ...options, timeoutMs: options.timeoutMs + durationMs },
      );
      return undefined;
    }
  }
}

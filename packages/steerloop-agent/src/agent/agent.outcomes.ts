import {
  ActionOutcome,
  ImageContentBlock,
  MessageContentType,
  ScreenshotCapture,
  TextContentBlock,
  ToolResultContentBlock,
} from '@steerloop/shared';

function imageBlock(capture: ScreenshotCapture): ImageContentBlock {
  return {
    type: MessageContentType.Image,
    source: {
      media_type: capture.mediaType,
      type: 'base64',
      data: capture.data,
    },
  };
}

function textBlock(text: string): TextContentBlock {
  return { type: MessageContentType.Text, text };
}

function stringifyResult(result: unknown): string {
  if (typeof result === 'string') {
    return result;
  }
  return JSON.stringify(result ?? null);
}

/**
 * Renders an outcome as the tool-result block appended to history.
 */
export function outcomeToToolResult(
  outcome: ActionOutcome,
): ToolResultContentBlock {
  switch (outcome.kind) {
    case 'computer_result': {
      const block: ToolResultContentBlock = {
        type: MessageContentType.ToolResult,
        tool_use_id: outcome.callId,
        toolKind: 'computer',
        content: outcome.screenshot ? [imageBlock(outcome.screenshot)] : [],
        acknowledgedSafetyChecks: outcome.acknowledgedSafetyChecks,
      };
      if (outcome.currentUrl !== undefined) {
        block.currentUrl = outcome.currentUrl;
      }
      return block;
    }
    case 'function_result':
      return {
        type: MessageContentType.ToolResult,
        tool_use_id: outcome.callId,
        toolKind: 'function',
        content: outcome.screenshot
          ? [
              textBlock(stringifyResult(outcome.result)),
              imageBlock(outcome.screenshot),
            ]
          : [textBlock(stringifyResult(outcome.result))],
      };
    case 'failure': {
      const { code, message, details } = outcome.error;
      const text =
        details === undefined
          ? `ERROR [${code}]: ${message}`
          : `ERROR [${code}]: ${message}\n${JSON.stringify(details)}`;
      return {
        type: MessageContentType.ToolResult,
        tool_use_id: outcome.callId,
        toolKind: outcome.toolKind,
        content: [textBlock(text)],
        is_error: true,
      };
    }
  }
}

import OpenAI from 'openai';
import {
  ComputerAction,
  ImageContentBlock,
  Message,
  MessageContentBlock,
  MessageContentType,
  Role,
  ToolResultContentBlock,
  UnsupportedComputerAction,
  isComputerAction,
  isImageContentBlock,
  isTextContentBlock,
  isToolResultContentBlock,
} from '@steerloop/shared';

type InputItem = OpenAI.Responses.ResponseInputItem;
type OpenAIComputerAction = OpenAI.Responses.ResponseComputerToolCall['action'];
type ScreenshotOutput =
  OpenAI.Responses.ResponseComputerToolCallOutputScreenshot & {
    current_url?: string;
  };

function toDataUrl(image: ImageContentBlock): string {
  return `data:${image.source.media_type};base64,${image.source.data}`;
}

export function fromOpenAIComputerAction(
  action: OpenAIComputerAction,
): ComputerAction | UnsupportedComputerAction {
  const requested: string = action.type;
  switch (action.type) {
    case 'click':
      return {
        action: 'click',
        coordinates: { x: action.x, y: action.y },
        button: action.button,
      };
    case 'double_click':
      return {
        action: 'double_click',
        coordinates: { x: action.x, y: action.y },
      };
    case 'move':
      return { action: 'move', coordinates: { x: action.x, y: action.y } };
    case 'drag':
      return {
        action: 'drag',
        path: action.path.map(({ x, y }) => ({ x, y })),
      };
    case 'scroll':
      return {
        action: 'scroll',
        coordinates: { x: action.x, y: action.y },
        scrollX: action.scroll_x,
        scrollY: action.scroll_y,
      };
    case 'keypress':
      return { action: 'keypress', keys: [...action.keys] };
    case 'type':
      return { action: 'type', text: action.text };
    case 'wait':
      return { action: 'wait' };
    case 'screenshot':
      return { action: 'screenshot' };
    default:
      return { action: 'unsupported', requested };
  }
}

export function toOpenAIComputerAction(
  action: ComputerAction,
): OpenAIComputerAction {
  switch (action.action) {
    case 'click':
      return {
        type: 'click',
        x: action.coordinates.x,
        y: action.coordinates.y,
        button: action.button,
      };
    case 'double_click':
      return {
        type: 'double_click',
        x: action.coordinates.x,
        y: action.coordinates.y,
      };
    case 'move':
      return { type: 'move', x: action.coordinates.x, y: action.coordinates.y };
    case 'drag':
      return { type: 'drag', path: action.path.map(({ x, y }) => ({ x, y })) };
    case 'scroll':
      return {
        type: 'scroll',
        x: action.coordinates.x,
        y: action.coordinates.y,
        scroll_x: action.scrollX,
        scroll_y: action.scrollY,
      };
    case 'keypress':
      return { type: 'keypress', keys: action.keys };
    case 'type':
      return { type: 'type', text: action.text };
    case 'wait':
      return { type: 'wait' };
    case 'screenshot':
      return { type: 'screenshot' };
  }
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      Array.isArray(parsed)
    ) {
      return {};
    }
    return Object.fromEntries(Object.entries(parsed));
  } catch {
    return {};
  }
}

function toolResultText(block: ToolResultContentBlock): string {
  return block.content
    .filter(isTextContentBlock)
    .map((content) => content.text)
    .join('\n');
}

interface ResultScreenshot {
  image: ImageContentBlock;
  // False when the image predates the action it answers
  captured: boolean;
}

/**
 * Screenshot each computer call result is answered with: the result's own
 * image, or the latest image seen before it. Calls without one are rendered
 * as plain text, since a computer_call_output must carry a screenshot.
 */
function screenshotsForComputerResults(
  messages: Message[],
): Map<string, ResultScreenshot> {
  const screenshots = new Map<string, ResultScreenshot>();
  let latest: ImageContentBlock | undefined;

  for (const message of messages) {
    for (const block of message.content) {
      if (isImageContentBlock(block)) {
        latest = block;
      }
      if (!isToolResultContentBlock(block)) {
        continue;
      }
      const image = block.content.filter(isImageContentBlock).pop();
      latest = image ?? latest;
      if (block.toolKind === 'computer' && latest) {
        screenshots.set(block.tool_use_id, {
          image: latest,
          captured: image !== undefined,
        });
      }
    }
  }
  return screenshots;
}

/**
 * Converts history into Responses API input items. Tool outputs of one
 * message are emitted together, followed by any extra user content they
 * produced (errors, images returned by functions).
 */
export function formatMessagesForOpenAI(messages: Message[]): InputItem[] {
  const screenshots = screenshotsForComputerResults(messages);
  const sentComputerCalls = new Set<string>();
  const items: InputItem[] = [];

  for (const message of messages) {
    const followUps: InputItem[] = [];

    for (const block of message.content) {
      switch (block.type) {
        case MessageContentType.Text:
          items.push({
            type: 'message',
            role: message.role === Role.User ? 'user' : 'assistant',
            content: block.text,
          });
          break;

        case MessageContentType.Image:
          items.push({
            type: 'message',
            role: 'user',
            content: [
              {
                type: 'input_image',
                detail: 'auto',
                image_url: toDataUrl(block),
              },
            ],
          });
          break;

        case MessageContentType.Reasoning:
          // Without stored responses a reasoning item is only valid with
          // its encrypted content
          if (block.encryptedContent) {
            items.push({
              type: 'reasoning',
              id: block.id,
              summary: block.summary.map((text) => ({
                type: 'summary_text' as const,
                text,
              })),
              encrypted_content: block.encryptedContent,
            });
          }
          break;

        case MessageContentType.ComputerCall:
          if (
            isComputerAction(block.action) &&
            screenshots.has(block.callId)
          ) {
            sentComputerCalls.add(block.callId);
            items.push({
              type: 'computer_call',
              id: block.id,
              call_id: block.callId,
              action: toOpenAIComputerAction(block.action),
              pending_safety_checks: block.pendingSafetyChecks,
              status: 'completed',
            });
          }
          break;

        case MessageContentType.FunctionCall:
          items.push({
            type: 'function_call',
            call_id: block.callId,
            name: block.name,
            arguments: block.rawArguments,
            ...(block.id ? { id: block.id } : {}),
          });
          break;

        case MessageContentType.ToolResult:
          formatToolResult(
            block,
            screenshots,
            sentComputerCalls,
            items,
            followUps,
          );
          break;
      }
    }

    items.push(...followUps);
  }

  return items;
}

function formatToolResult(
  block: ToolResultContentBlock,
  screenshots: Map<string, ResultScreenshot>,
  sentComputerCalls: Set<string>,
  items: InputItem[],
  followUps: InputItem[],
): void {
  const text = toolResultText(block);

  if (block.toolKind === 'function') {
    items.push({
      type: 'function_call_output',
      call_id: block.tool_use_id,
      output: text,
    });
    const images = block.content.filter(isImageContentBlock);
    if (images.length > 0) {
      followUps.push({
        type: 'message',
        role: 'user',
        content: images.map((image) => ({
          type: 'input_image' as const,
          detail: 'auto' as const,
          image_url: toDataUrl(image),
        })),
      });
    }
    return;
  }

  const screenshot = screenshots.get(block.tool_use_id);
  if (!screenshot || !sentComputerCalls.has(block.tool_use_id)) {
    followUps.push({
      type: 'message',
      role: 'user',
      content: `Result of computer action ${block.tool_use_id}: ${text || 'done'}`,
    });
    return;
  }

  const output: ScreenshotOutput = {
    type: 'computer_screenshot',
    image_url: toDataUrl(screenshot.image),
  };
  if (block.currentUrl !== undefined) {
    output.current_url = block.currentUrl;
  }
  items.push({
    type: 'computer_call_output',
    call_id: block.tool_use_id,
    output,
    acknowledged_safety_checks: block.acknowledgedSafetyChecks ?? [],
  });
  if (block.is_error) {
    followUps.push({ type: 'message', role: 'user', content: text });
  }
  if (!screenshot.captured) {
    followUps.push({
      type: 'message',
      role: 'user',
      content: staleScreenshotNotice(block.tool_use_id),
    });
  }
}

export function staleScreenshotNotice(callId: string): string {
  return `No screenshot was taken after computer action ${callId}; the attached screenshot is from before it ran and may not show its effect.`;
}

/**
 * Converts Responses API output items into content blocks.
 */
export function formatOpenAIResponse(
  output: OpenAI.Responses.ResponseOutputItem[],
  onUnsupported: (item: OpenAI.Responses.ResponseOutputItem) => void = () =>
    undefined,
): MessageContentBlock[] {
  const contentBlocks: MessageContentBlock[] = [];

  for (const item of output) {
    switch (item.type) {
      case 'message':
        for (const content of item.content) {
          contentBlocks.push({
            type: MessageContentType.Text,
            text:
              content.type === 'output_text'
                ? content.text
                : `Refusal: ${content.refusal}`,
          });
        }
        break;

      case 'computer_call':
        contentBlocks.push({
          type: MessageContentType.ComputerCall,
          id: item.id,
          callId: item.call_id,
          action: fromOpenAIComputerAction(item.action),
          pendingSafetyChecks: item.pending_safety_checks.map((check) => ({
            id: check.id,
            code: check.code ?? '',
            message: check.message ?? '',
          })),
        });
        break;

      case 'function_call':
        contentBlocks.push({
          type: MessageContentType.FunctionCall,
          ...(item.id ? { id: item.id } : {}),
          callId: item.call_id,
          name: item.name,
          arguments: parseArguments(item.arguments),
          rawArguments: item.arguments,
        });
        break;

      case 'reasoning':
        contentBlocks.push({
          type: MessageContentType.Reasoning,
          id: item.id,
          summary: item.summary.map((part) => part.text),
          ...(item.encrypted_content
            ? { encryptedContent: item.encrypted_content }
            : {}),
        });
        break;

      default:
        onUnsupported(item);
        contentBlocks.push({
          type: MessageContentType.Text,
          text: JSON.stringify(item),
        });
    }
  }

  return contentBlocks;
}

import {
  ComputerCallContentBlock,
  FunctionCallContentBlock,
  ImageContentBlock,
  Message,
  MessageContentBlock,
  MessageContentType,
  ProposedAction,
  ReasoningContentBlock,
  TextContentBlock,
  ToolResultContentBlock,
} from "../types/messageContent.types";

export const OMITTED_IMAGE_DATA = "[omitted]";

/**
 * Type guard to check if an object is a TextContentBlock
 * @param obj The object to validate
 * @returns Type predicate indicating obj is TextContentBlock
 */
export function isTextContentBlock(obj: unknown): obj is TextContentBlock {
  if (!obj || typeof obj !== "object") {
    return false;
  }

  const block = obj as Partial<TextContentBlock>;
  return (
    block.type === MessageContentType.Text && typeof block.text === "string"
  );
}

/**
 * Type guard to check if an object is an ImageContentBlock
 * @param obj The object to validate
 * @returns Type predicate indicating obj is ImageContentBlock
 */
export function isImageContentBlock(obj: unknown): obj is ImageContentBlock {
  if (!obj || typeof obj !== "object") {
    return false;
  }

  const block = obj as Partial<ImageContentBlock>;
  return (
    block.type === MessageContentType.Image &&
    block.source !== undefined &&
    typeof block.source === "object" &&
    typeof block.source.media_type === "string" &&
    typeof block.source.type === "string" &&
    typeof block.source.data === "string"
  );
}

export function isReasoningContentBlock(
  obj: unknown,
): obj is ReasoningContentBlock {
  if (!obj || typeof obj !== "object") {
    return false;
  }

  const block = obj as Partial<ReasoningContentBlock>;
  return (
    block.type === MessageContentType.Reasoning &&
    typeof block.id === "string" &&
    Array.isArray(block.summary)
  );
}

export function isComputerCallContentBlock(
  obj: unknown,
): obj is ComputerCallContentBlock {
  if (!obj || typeof obj !== "object") {
    return false;
  }

  const block = obj as Partial<ComputerCallContentBlock>;
  return (
    block.type === MessageContentType.ComputerCall &&
    typeof block.callId === "string" &&
    block.action !== undefined &&
    typeof block.action === "object"
  );
}

export function isFunctionCallContentBlock(
  obj: unknown,
): obj is FunctionCallContentBlock {
  if (!obj || typeof obj !== "object") {
    return false;
  }

  const block = obj as Partial<FunctionCallContentBlock>;
  return (
    block.type === MessageContentType.FunctionCall &&
    typeof block.callId === "string" &&
    typeof block.name === "string"
  );
}

export function isToolResultContentBlock(
  obj: unknown,
): obj is ToolResultContentBlock {
  if (!obj || typeof obj !== "object") {
    return false;
  }

  const block = obj as Partial<ToolResultContentBlock>;
  return (
    block.type === MessageContentType.ToolResult &&
    typeof block.tool_use_id === "string" &&
    Array.isArray(block.content)
  );
}

export function isProposedAction(obj: unknown): obj is ProposedAction {
  return isComputerCallContentBlock(obj) || isFunctionCallContentBlock(obj);
}

/**
 * Returns the proposed actions of a model response in the order the model
 * emitted them.
 */
export function extractProposedActions(
  blocks: MessageContentBlock[],
): ProposedAction[] {
  return blocks.filter(isProposedAction);
}

/**
 * Concatenated text of all text blocks, or null when the blocks carry none.
 */
export function extractText(blocks: MessageContentBlock[]): string | null {
  const texts = blocks.filter(isTextContentBlock).map((block) => block.text);
  return texts.length > 0 ? texts.join("\n") : null;
}

function sanitizeBlock(block: MessageContentBlock): MessageContentBlock {
  if (isImageContentBlock(block)) {
    return {
      ...block,
      source: { ...block.source, data: OMITTED_IMAGE_DATA },
    };
  }
  if (isToolResultContentBlock(block)) {
    return {
      ...block,
      content: block.content.map((inner) =>
        isImageContentBlock(inner)
          ? { ...inner, source: { ...inner.source, data: OMITTED_IMAGE_DATA } }
          : inner,
      ),
    };
  }
  return block;
}

/**
 * Returns a copy of the message with image payloads replaced, for logging.
 */
export function sanitizeMessage(message: Message): Message {
  return {
    ...message,
    content: message.content.map(sanitizeBlock),
  };
}

import {
  ComputerAction,
  UnsupportedComputerAction,
} from "./computerAction.types";

// Content block types
export enum MessageContentType {
  Text = "text",
  Image = "image",
  Reasoning = "reasoning",
  ComputerCall = "computer_call",
  FunctionCall = "function_call",
  ToolResult = "tool_result",
}

export enum Role {
  User = "user",
  Assistant = "assistant",
}

// Base type with only the discriminator
export type MessageContentBlockBase = {
  type: MessageContentType;
};

export type TextContentBlock = {
  type: MessageContentType.Text;
  text: string;
} & MessageContentBlockBase;

export type ImageContentBlock = {
  type: MessageContentType.Image;
  source: {
    media_type: "image/png";
    type: "base64";
    data: string;
  };
} & MessageContentBlockBase;

export type ReasoningContentBlock = {
  type: MessageContentType.Reasoning;
  id: string;
  summary: string[];
  encryptedContent?: string;
} & MessageContentBlockBase;

/**
 * A check raised by the model provider on a computer call that must be
 * acknowledged before the call may run.
 */
export type SafetyCheck = {
  id: string;
  code: string;
  message: string;
};

export type ComputerCallContentBlock = {
  type: MessageContentType.ComputerCall;
  id: string;
  callId: string;
  action: ComputerAction | UnsupportedComputerAction;
  pendingSafetyChecks: SafetyCheck[];
} & MessageContentBlockBase;

export type FunctionCallContentBlock = {
  type: MessageContentType.FunctionCall;
  id?: string;
  callId: string;
  name: string;
  arguments: Record<string, unknown>;
  // Verbatim argument string as emitted by the model
  rawArguments: string;
} & MessageContentBlockBase;

export type ToolResultContentBlock = {
  type: MessageContentType.ToolResult;
  tool_use_id: string;
  toolKind: "computer" | "function";
  content: (TextContentBlock | ImageContentBlock)[];
  is_error?: boolean;
  acknowledgedSafetyChecks?: SafetyCheck[];
  currentUrl?: string;
} & MessageContentBlockBase;

/** One action instruction emitted by the model. */
export type ProposedAction = ComputerCallContentBlock | FunctionCallContentBlock;

export type MessageContentBlock =
  | TextContentBlock
  | ImageContentBlock
  | ReasoningContentBlock
  | ComputerCallContentBlock
  | FunctionCallContentBlock
  | ToolResultContentBlock;

export type Message = {
  role: Role;
  content: MessageContentBlock[];
};

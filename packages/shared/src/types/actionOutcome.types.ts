import { ComputerActionType } from "./computerAction.types";
import { SafetyCheck } from "./messageContent.types";

export type ErrorPayload = {
  code: string;
  message: string;
  details?: unknown;
};

export type ScreenshotCapture = {
  data: string; // Base64 encoded PNG
  mediaType: "image/png";
  capturedAt: string;
};

export type FunctionRoute =
  | "environment_function"
  | "local_function"
  | "stub_function";

export type ComputerResultOutcome = {
  kind: "computer_result";
  callId: string;
  action: ComputerActionType;
  screenshot?: ScreenshotCapture;
  currentUrl?: string;
  acknowledgedSafetyChecks: SafetyCheck[];
};

export type FunctionResultOutcome = {
  kind: "function_result";
  callId: string;
  name: string;
  route: FunctionRoute;
  result: unknown;
  screenshot?: ScreenshotCapture;
};

export type FailureOutcome = {
  kind: "failure";
  callId: string;
  toolKind: "computer" | "function";
  error: ErrorPayload;
};

export type ActionOutcome =
  | ComputerResultOutcome
  | FunctionResultOutcome
  | FailureOutcome;

import {
  ActionCategory,
  ClickAction,
  ComputerAction,
  ComputerActionType,
  Coordinates,
  DoubleClickAction,
  DragAction,
  KeypressAction,
  MoveAction,
  ScreenshotAction,
  ScrollAction,
  TypeTextAction,
  UnsupportedComputerAction,
  WaitAction,
} from "../types/computerAction.types";

export const COMPUTER_ACTION_TYPES: readonly ComputerActionType[] = [
  "click",
  "double_click",
  "move",
  "drag",
  "scroll",
  "keypress",
  "type",
  "wait",
  "screenshot",
];

/**
 * Type guard factory for computer actions
 */
function createActionTypeGuard<T extends ComputerAction>(
  actionType: T["action"],
): (obj: unknown) => obj is T {
  return (obj: unknown): obj is T => {
    if (!obj || typeof obj !== "object") {
      return false;
    }
    const action = obj as Record<string, unknown>;
    return action.action === actionType;
  };
}

/**
 * Type guards for all computer actions
 */
export const isClickAction = createActionTypeGuard<ClickAction>("click");
export const isDoubleClickAction =
  createActionTypeGuard<DoubleClickAction>("double_click");
export const isMoveAction = createActionTypeGuard<MoveAction>("move");
export const isDragAction = createActionTypeGuard<DragAction>("drag");
export const isScrollAction = createActionTypeGuard<ScrollAction>("scroll");
export const isKeypressAction =
  createActionTypeGuard<KeypressAction>("keypress");
export const isTypeTextAction = createActionTypeGuard<TypeTextAction>("type");
export const isWaitAction = createActionTypeGuard<WaitAction>("wait");
export const isScreenshotAction =
  createActionTypeGuard<ScreenshotAction>("screenshot");

export function isComputerActionType(
  value: unknown,
): value is ComputerActionType {
  return (
    typeof value === "string" &&
    (COMPUTER_ACTION_TYPES as readonly string[]).includes(value)
  );
}

export function isUnsupportedComputerAction(
  obj: unknown,
): obj is UnsupportedComputerAction {
  if (!obj || typeof obj !== "object") {
    return false;
  }
  const action = obj as Record<string, unknown>;
  return action.action === "unsupported";
}

function isCoordinates(value: unknown): value is Coordinates {
  if (!value || typeof value !== "object") {
    return false;
  }
  const point = value as Record<string, unknown>;
  return typeof point.x === "number" && typeof point.y === "number";
}

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === "string")
  );
}

/**
 * Validates that obj is a well-formed computer action, including the
 * parameters each action needs to execute.
 */
export function isComputerAction(obj: unknown): obj is ComputerAction {
  if (!obj || typeof obj !== "object") {
    return false;
  }
  const action = obj as Record<string, unknown>;

  switch (action.action) {
    case "click":
      return (
        isCoordinates(action.coordinates) && typeof action.button === "string"
      );
    case "double_click":
    case "move":
      return isCoordinates(action.coordinates);
    case "drag":
      return Array.isArray(action.path) && action.path.every(isCoordinates);
    case "scroll":
      return (
        isCoordinates(action.coordinates) &&
        typeof action.scrollX === "number" &&
        typeof action.scrollY === "number"
      );
    case "keypress":
      return isStringArray(action.keys);
    case "type":
      return typeof action.text === "string";
    case "wait":
      return (
        action.durationMs === undefined || typeof action.durationMs === "number"
      );
    case "screenshot":
      return true;
    default:
      return false;
  }
}

export function getActionCategory(action: ComputerAction): ActionCategory {
  switch (action.action) {
    case "click":
    case "double_click":
    case "move":
      return "pointer";
    case "drag":
      return "drag";
    case "scroll":
      return "scroll";
    case "keypress":
    case "type":
      return "keyboard";
    case "wait":
      return "wait";
    case "screenshot":
      return "screenshot";
  }
}

/**
 * One-line, human readable rendering used by action logs.
 */
export function describeComputerAction(action: ComputerAction): string {
  switch (action.action) {
    case "click":
      return `click(${action.coordinates.x}, ${action.coordinates.y}, ${action.button})`;
    case "double_click":
      return `double_click(${action.coordinates.x}, ${action.coordinates.y})`;
    case "move":
      return `move(${action.coordinates.x}, ${action.coordinates.y})`;
    case "drag":
      return `drag(${action.path.map((p) => `${p.x},${p.y}`).join(" -> ")})`;
    case "scroll":
      return `scroll(${action.coordinates.x}, ${action.coordinates.y}, dx=${action.scrollX}, dy=${action.scrollY})`;
    case "keypress":
      return `keypress(${action.keys.join("+")})`;
    case "type":
      return `type(${JSON.stringify(action.text)})`;
    case "wait":
      return `wait(${action.durationMs ?? "default"})`;
    case "screenshot":
      return "screenshot()";
  }
}

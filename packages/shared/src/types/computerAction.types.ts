export type Coordinates = { x: number; y: number };
// "wheel" is the middle button
export type Button = "left" | "right" | "wheel" | "back" | "forward";
export type Dimensions = { width: number; height: number };

export type Environment = "browser" | "mac" | "windows" | "ubuntu";

// Define individual computer action types
export type ClickAction = {
  action: "click";
  coordinates: Coordinates;
  button: Button;
};

export type DoubleClickAction = {
  action: "double_click";
  coordinates: Coordinates;
};

export type MoveAction = {
  action: "move";
  coordinates: Coordinates;
};

export type DragAction = {
  action: "drag";
  path: Coordinates[];
};

export type ScrollAction = {
  action: "scroll";
  coordinates: Coordinates;
  scrollX: number;
  scrollY: number;
};

export type KeypressAction = {
  action: "keypress";
  keys: string[];
};

export type TypeTextAction = {
  action: "type";
  text: string;
};

export type WaitAction = {
  action: "wait";
  // Milliseconds; the executor falls back to its own default when absent
  durationMs?: number;
};

export type ScreenshotAction = {
  action: "screenshot";
};

export type ComputerAction =
  | ClickAction
  | DoubleClickAction
  | MoveAction
  | DragAction
  | ScrollAction
  | KeypressAction
  | TypeTextAction
  | WaitAction
  | ScreenshotAction;

export type ComputerActionType = ComputerAction["action"];

/**
 * Placeholder for an action type the model emitted that this runtime does
 * not know; the dispatcher reports it as unroutable.
 */
export type UnsupportedComputerAction = {
  action: "unsupported";
  requested: string;
};

/**
 * Coarse grouping of actions used by the screenshot policy and logging.
 * Function categories are resolved by the dispatcher, not by the action.
 */
export type ActionCategory =
  | "pointer"
  | "drag"
  | "scroll"
  | "keyboard"
  | "wait"
  | "screenshot"
  | "environment_function"
  | "search_function"
  | "function";

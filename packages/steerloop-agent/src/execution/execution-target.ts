import {
  Button,
  Coordinates,
  Dimensions,
  Environment,
} from '@steerloop/shared';

export const EXECUTION_TARGET = Symbol('EXECUTION_TARGET');

/**
 * A custom capability of the target that function calls with the same
 * name are routed to, e.g. `back` or `goto`.
 */
export type TargetFunction = (
  args: Record<string, unknown>,
  signal?: AbortSignal,
) => Promise<unknown>;

export interface PageSnapshot {
  url: string;
  title: string;
  text: string;
  // Serialized document, when the target can read it
  html?: string;
}

/**
 * The environment that physically performs actions: a browser, a desktop
 * container or a remote session. One turn drives a target at a time.
 */
export interface ExecutionTarget {
  readonly environment: Environment;
  getDimensions(): Dimensions;

  /** Returns a base64 encoded PNG of the current surface. */
  screenshot(signal?: AbortSignal): Promise<string>;

  click(
    coordinates: Coordinates,
    button: Button,
    signal?: AbortSignal,
  ): Promise<void>;
  doubleClick(coordinates: Coordinates, signal?: AbortSignal): Promise<void>;
  move(coordinates: Coordinates, signal?: AbortSignal): Promise<void>;
  drag(path: Coordinates[], signal?: AbortSignal): Promise<void>;
  scroll(
    coordinates: Coordinates,
    scrollX: number,
    scrollY: number,
    signal?: AbortSignal,
  ): Promise<void>;
  keypress(keys: string[], signal?: AbortSignal): Promise<void>;
  type(text: string, signal?: AbortSignal): Promise<void>;
  wait(durationMs: number, signal?: AbortSignal): Promise<void>;

  currentUrl?(signal?: AbortSignal): Promise<string | undefined>;
  readPage?(signal?: AbortSignal): Promise<PageSnapshot>;

  readonly functions?: Readonly<Record<string, TargetFunction>>;
}

export function getTargetFunction(
  target: ExecutionTarget,
  name: string,
): TargetFunction | undefined {
  const functions = target.functions;
  if (!functions || !Object.prototype.hasOwnProperty.call(functions, name)) {
    return undefined;
  }
  return functions[name];
}

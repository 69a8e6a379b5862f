import { Logger } from '@nestjs/common';
import {
  Button,
  Coordinates,
  Dimensions,
  Environment,
} from '@steerloop/shared';
import { ExecutionTargetError, errorMessage } from '../common/errors';
import { BrowserInspector } from './browser-inspector';
import {
  ExecutionTarget,
  PageSnapshot,
  TargetFunction,
} from './execution-target';

// Pixels scrolled by one wheel step on the desktop daemon
export const SCROLL_STEP_PIXELS = 100;

export const DEFAULT_INSPECT_TIMEOUT_MS = 10000;

export interface DesktopTargetOptions {
  baseUrl: string;
  environment: Environment;
  display: Dimensions;
  // DevTools endpoint of the desktop browser; enables page URL and content
  browserDebugUrl?: string;
  inspectTimeoutMs?: number;
}

type DaemonButton = 'left' | 'right' | 'middle';

function toDaemonButton(button: Button): DaemonButton {
  switch (button) {
    case 'left':
    case 'right':
      return button;
    case 'wheel':
      return 'middle';
    default:
      throw new ExecutionTargetError(
        `Mouse button "${button}" is not supported by the desktop daemon`,
      );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Execution target backed by the desktop daemon's `/computer-use` endpoint.
 * The page URL and content are only available when the desktop browser's
 * DevTools endpoint is configured.
 */
export class DesktopExecutionTarget implements ExecutionTarget {
  private readonly logger = new Logger(DesktopExecutionTarget.name);
  readonly environment: Environment;
  readonly functions: Readonly<Record<string, TargetFunction>>;
  readonly currentUrl?: (signal?: AbortSignal) => Promise<string | undefined>;
  readonly readPage?: (signal?: AbortSignal) => Promise<PageSnapshot>;

  constructor(private readonly options: DesktopTargetOptions) {
    this.environment = options.environment;
    if (options.browserDebugUrl) {
      const inspector = new BrowserInspector(
        options.browserDebugUrl,
        options.inspectTimeoutMs ?? DEFAULT_INSPECT_TIMEOUT_MS,
      );
      this.currentUrl = (signal) => inspector.currentUrl(signal);
      this.readPage = (signal) => inspector.readPage(signal);
    }
    // Browser shortcuts driven through the keyboard, so function calls with
    // these names reach the focused browser window.
    this.functions = {
      back: async (_args, signal) => {
        await this.keypress(['alt', 'Left'], signal);
        return 'navigated back';
      },
      goto: async (args, signal) => {
        const url = args.url;
        if (typeof url !== 'string' || url.length === 0) {
          throw new ExecutionTargetError('goto requires a "url" argument');
        }
        await this.keypress(['ctrl', 'l'], signal);
        await this.type(url, signal);
        await this.keypress(['Return'], signal);
        return `navigated to ${url}`;
      },
    };
  }

  getDimensions(): Dimensions {
    return { ...this.options.display };
  }

  async screenshot(signal?: AbortSignal): Promise<string> {
    const data = await this.post({ action: 'screenshot' }, signal);
    if (!isRecord(data) || typeof data.image !== 'string') {
      throw new ExecutionTargetError(
        'Failed to take screenshot: No image data received',
      );
    }
    return data.image;
  }

  async click(
    coordinates: Coordinates,
    button: Button,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.post(
      {
        action: 'click_mouse',
        coordinates,
        button: toDaemonButton(button),
        clickCount: 1,
      },
      signal,
    );
  }

  async doubleClick(
    coordinates: Coordinates,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.post(
      { action: 'click_mouse', coordinates, button: 'left', clickCount: 2 },
      signal,
    );
  }

  async move(coordinates: Coordinates, signal?: AbortSignal): Promise<void> {
    await this.post({ action: 'move_mouse', coordinates }, signal);
  }

  async drag(path: Coordinates[], signal?: AbortSignal): Promise<void> {
    await this.post({ action: 'drag_mouse', path, button: 'left' }, signal);
  }

  async scroll(
    coordinates: Coordinates,
    scrollX: number,
    scrollY: number,
    signal?: AbortSignal,
  ): Promise<void> {
    if (scrollY !== 0) {
      await this.post(
        {
          action: 'scroll',
          coordinates,
          direction: scrollY > 0 ? 'down' : 'up',
          scrollCount: toScrollCount(scrollY),
        },
        signal,
      );
    }
    if (scrollX !== 0) {
      await this.post(
        {
          action: 'scroll',
          coordinates,
          direction: scrollX > 0 ? 'right' : 'left',
          scrollCount: toScrollCount(scrollX),
        },
        signal,
      );
    }
  }

  async keypress(keys: string[], signal?: AbortSignal): Promise<void> {
    await this.post({ action: 'type_keys', keys }, signal);
  }

  async type(text: string, signal?: AbortSignal): Promise<void> {
    await this.post({ action: 'type_text', text }, signal);
  }

  async wait(durationMs: number, signal?: AbortSignal): Promise<void> {
    await this.post({ action: 'wait', duration: durationMs }, signal);
  }

  private async post(
    body: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const action = String(body.action);
    this.logger.debug(`Sending ${action} to desktop daemon`);

    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/computer-use`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.error(`Error in ${action} action: ${errorMessage(error)}`);
      throw new ExecutionTargetError(
        `Desktop daemon unreachable during ${action}: ${errorMessage(error)}`,
        { action },
      );
    }

    if (!response.ok) {
      throw new ExecutionTargetError(
        `Desktop responded with status ${response.status} to ${action}`,
        { action, status: response.status },
      );
    }

    const text = await response.text();
    if (text.length === 0) {
      return undefined;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return text;
    }
  }
}

function toScrollCount(delta: number): number {
  return Math.max(1, Math.round(Math.abs(delta) / SCROLL_STEP_PIXELS));
}

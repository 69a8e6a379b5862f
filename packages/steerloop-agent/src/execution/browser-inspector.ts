import { Logger } from '@nestjs/common';
import { RawData, WebSocket } from 'ws';
import { runWithDeadline } from '../common/abort';
import { ExecutionTargetError, errorMessage } from '../common/errors';
import { PageSnapshot } from './execution-target';

interface DevToolsTarget {
  type: string;
  url: string;
  webSocketDebuggerUrl?: string;
}

// Evaluated in the page; returned by value
const READ_PAGE_EXPRESSION = `(() => ({
  url: location.href,
  title: document.title,
  text: document.body ? document.body.innerText : '',
  html: document.documentElement ? document.documentElement.outerHTML : '',
}))()`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isDevToolsTarget(value: unknown): value is DevToolsTarget {
  return (
    isRecord(value) &&
    typeof value.type === 'string' &&
    typeof value.url === 'string' &&
    (value.webSocketDebuggerUrl === undefined ||
      typeof value.webSocketDebuggerUrl === 'string')
  );
}

function isPageSnapshot(value: unknown): value is Required<PageSnapshot> {
  return (
    isRecord(value) &&
    typeof value.url === 'string' &&
    typeof value.title === 'string' &&
    typeof value.text === 'string' &&
    typeof value.html === 'string'
  );
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * Reads the desktop browser's current page through the Chrome DevTools
 * protocol: `/json/list` for the page target, then `Runtime.evaluate` over
 * the target's websocket.
 */
export class BrowserInspector {
  private readonly logger = new Logger(BrowserInspector.name);
  private nextId = 1;

  constructor(
    private readonly debugUrl: string,
    private readonly timeoutMs: number,
  ) {}

  async currentUrl(signal?: AbortSignal): Promise<string | undefined> {
    const page = await this.findPage(signal);
    return page?.url;
  }

  async readPage(signal?: AbortSignal): Promise<PageSnapshot> {
    const page = await this.findPage(signal);
    if (!page?.webSocketDebuggerUrl) {
      throw new ExecutionTargetError(
        `No inspectable browser page at ${this.debugUrl}`,
      );
    }
    const snapshot = await this.evaluate(
      page.webSocketDebuggerUrl,
      READ_PAGE_EXPRESSION,
      signal,
    );
    if (!isPageSnapshot(snapshot)) {
      throw new ExecutionTargetError(
        'The browser returned an unexpected page snapshot',
      );
    }
    return snapshot;
  }

  private async findPage(
    signal?: AbortSignal,
  ): Promise<DevToolsTarget | undefined> {
    const response = await fetch(`${this.debugUrl}/json/list`, { signal });
    if (!response.ok) {
      throw new ExecutionTargetError(
        `Browser debugger responded with status ${response.status}`,
        { status: response.status },
      );
    }
    const targets: unknown = await response.json();
    if (!Array.isArray(targets)) {
      throw new ExecutionTargetError(
        'Browser debugger returned an unexpected target list',
      );
    }
    return targets
      .filter(isDevToolsTarget)
      .find((target) => target.type === 'page');
  }

  private evaluate(
    socketUrl: string,
    expression: string,
    signal?: AbortSignal,
  ): Promise<unknown> {
    return runWithDeadline(
      (deadline) => this.sendEvaluate(socketUrl, expression, deadline),
      {
        timeoutMs: this.timeoutMs,
        signal,
        onTimeout: () =>
          new ExecutionTargetError(
            `Browser did not answer within ${this.timeoutMs}ms`,
          ),
      },
    );
  }

  private sendEvaluate(
    socketUrl: string,
    expression: string,
    signal: AbortSignal,
  ): Promise<unknown> {
    const id = this.nextId++;
    this.logger.debug(`Evaluating in browser page ${socketUrl}`);

    return new Promise<unknown>((resolve, reject) => {
      const socket = new WebSocket(socketUrl);
      let settled = false;

      const finish = (error: Error | undefined, value?: unknown) => {
        if (settled) {
          return;
        }
        settled = true;
        signal.removeEventListener('abort', onAbort);
        socket.close();
        if (error) {
          reject(error);
        } else {
          resolve(value);
        }
      };
      const onAbort = () =>
        finish(new ExecutionTargetError('Browser page read was aborted'));
      signal.addEventListener('abort', onAbort, { once: true });

      socket.on('open', () => {
        socket.send(
          JSON.stringify({
            id,
            method: 'Runtime.evaluate',
            params: { expression, returnByValue: true },
          }),
        );
      });

      socket.on('message', (data) => {
        let message: unknown;
        try {
          message = JSON.parse(rawDataToString(data));
        } catch (error) {
          finish(
            new ExecutionTargetError(
              `Browser sent malformed JSON: ${errorMessage(error)}`,
            ),
          );
          return;
        }
        // Events and answers to other callers
        if (!isRecord(message) || message.id !== id) {
          return;
        }
        if (isRecord(message.error)) {
          finish(
            new ExecutionTargetError(
              `Runtime.evaluate failed: ${String(message.error.message)}`,
            ),
          );
          return;
        }
        const result: Record<string, unknown> = isRecord(message.result)
          ? message.result
          : {};
        if (result.exceptionDetails !== undefined) {
          finish(
            new ExecutionTargetError('Reading the page raised an exception'),
          );
          return;
        }
        const value = isRecord(result.result) ? result.result.value : undefined;
        finish(undefined, value);
      });

      socket.on('error', (error) => {
        finish(
          new ExecutionTargetError(
            `Browser debugger unreachable: ${errorMessage(error)}`,
          ),
        );
      });

      socket.on('close', () => {
        finish(
          new ExecutionTargetError('Browser closed the debugger connection'),
        );
      });
    });
  }
}

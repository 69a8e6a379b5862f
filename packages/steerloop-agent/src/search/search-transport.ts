import { Logger } from '@nestjs/common';
import {
  ExecutionTarget,
  getTargetFunction,
} from '../execution/execution-target';
import { ExecutionTargetError, errorMessage } from '../common/errors';
import { extractTitle, htmlToText } from './html';
import { LoadedPage } from './search-engines';

export const SEARCH_TRANSPORT = Symbol('SEARCH_TRANSPORT');

export interface LoadOptions {
  signal?: AbortSignal;
  humanlike: boolean;
  language?: string;
  target?: ExecutionTarget;
}

export interface SearchTransport {
  readonly kind: 'http' | 'target';
  load(url: string, options: LoadOptions): Promise<LoadedPage>;
}

const USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
];

const DEFAULT_USER_AGENT = USER_AGENTS[0];

/**
 * Fetches result pages directly. Humanlike loads rotate the user agent and
 * send browser-like headers.
 */
export class HttpSearchTransport implements SearchTransport {
  readonly kind = 'http' as const;

  constructor(private readonly random: () => number = Math.random) {}

  async load(url: string, options: LoadOptions): Promise<LoadedPage> {
    const response = await fetch(url, {
      headers: this.headersFor(options),
      redirect: 'follow',
      signal: options.signal,
    });
    const raw = await response.text();
    return {
      status: response.status,
      url: response.url || url,
      title: extractTitle(raw),
      text: htmlToText(raw),
      raw,
    };
  }

  headersFor(options: LoadOptions): Record<string, string> {
    const language = options.language ?? 'en';
    if (!options.humanlike) {
      return { 'User-Agent': DEFAULT_USER_AGENT };
    }
    const index = Math.floor(this.random() * USER_AGENTS.length);
    return {
      'User-Agent': USER_AGENTS[Math.min(index, USER_AGENTS.length - 1)],
      Accept:
        'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': `${language},${language.split('-')[0]};q=0.9,en;q=0.5`,
      'Upgrade-Insecure-Requests': '1',
    };
  }
}

/**
 * Loads result pages in the execution target's browser through its `goto`
 * capability and reads the rendered page back.
 */
export class TargetSearchTransport implements SearchTransport {
  readonly kind = 'target' as const;
  private readonly logger = new Logger(TargetSearchTransport.name);

  async load(url: string, options: LoadOptions): Promise<LoadedPage> {
    const target = options.target;
    const goto = target ? getTargetFunction(target, 'goto') : undefined;
    if (!target || !goto || !target.readPage) {
      throw new ExecutionTargetError(
        'The execution target cannot navigate and read pages for search',
      );
    }

    try {
      await goto({ url }, options.signal);
      const page = await target.readPage(options.signal);
      return {
        url: page.url,
        title: page.title,
        text: page.text,
        raw: page.html ?? page.text,
      };
    } catch (error) {
      this.logger.debug(`Target failed to load ${url}: ${errorMessage(error)}`);
      throw error;
    }
  }
}

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import {
  SearchAttempt,
  SearchEngineId,
  SearchEnginePreference,
  SearchOptions,
  SearchRequest,
  SearchResolution,
} from '@steerloop/shared';
import { runWithDeadline, sleep, throwIfAborted } from '../common/abort';
import {
  SearchAttemptFailedError,
  errorMessage,
  isTurnInterrupt,
} from '../common/errors';
import {
  agentConfig,
  AgentSettings,
  SearchSettings,
} from '../config/agent.config';
import { ExecutionTarget } from '../execution/execution-target';
import { AdaptiveTimeout } from './attempt-timeout';
import { classifyPage, LoadedPage, SEARCH_ENGINES } from './search-engines';
import { ParsedResults, parseResults } from './search-results';
import { SEARCH_TRANSPORT, SearchTransport } from './search-transport';

export const SEARCH_RUNTIME = Symbol('SEARCH_RUNTIME');

export interface SearchRuntime {
  now(): number;
  random(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

const defaultRuntime: SearchRuntime = {
  now: () => Date.now(),
  random: Math.random,
  sleep,
};

export interface SearchContext {
  signal?: AbortSignal;
  target?: ExecutionTarget;
}

export interface EngineStatus {
  engine: SearchEngineId;
  baseUrl: string;
  successCount: number;
  failureCount: number;
}

export const EXCERPT_LENGTH = 500;

// Cuts on code points so a surrogate pair is never split
export function excerptOf(text: string, length = EXCERPT_LENGTH): string {
  return Array.from(text).slice(0, length).join('');
}

/**
 * Engine sequence for one request: the explicit preference first, then the
 * fallback order without duplicates. Only the first engine is used when
 * resilient search is off.
 */
export function computeEngineOrder(
  preference: SearchEnginePreference,
  fallbackOrder: readonly SearchEngineId[],
  resilient: boolean,
): SearchEngineId[] {
  const candidates =
    preference === 'auto' ? [...fallbackOrder] : [preference, ...fallbackOrder];
  const order = candidates.filter(
    (engine, index) => candidates.indexOf(engine) === index,
  );
  return resilient ? order : order.slice(0, 1);
}

/**
 * Default request options taken from configuration, overridden field by
 * field by the caller.
 */
export function defaultSearchOptions(
  settings: SearchSettings,
  overrides: Partial<SearchOptions> = {},
): SearchOptions {
  return {
    engine: overrides.engine ?? settings.engine,
    language: overrides.language ?? settings.language,
    region: overrides.region ?? settings.region,
    safeSearch: overrides.safeSearch ?? settings.safe,
    timePeriod: overrides.timePeriod ?? settings.timePeriod,
    contentType: overrides.contentType ?? settings.contentType,
    site: overrides.site ?? settings.site,
    resultCount: overrides.resultCount ?? settings.resultCount,
    humanlike: overrides.humanlike ?? settings.humanlike,
  };
}

export function createSearchRequest(
  query: string,
  options: SearchOptions,
): SearchRequest {
  return Object.freeze({ query, options: Object.freeze({ ...options }) });
}

@Injectable()
export class ResilientSearchService {
  private readonly logger = new Logger(ResilientSearchService.name);
  private readonly settings: SearchSettings;
  private readonly runtime: SearchRuntime;
  private readonly timeout: AdaptiveTimeout;
  private readonly successCounts = new Map<SearchEngineId, number>();
  private readonly failureCounts = new Map<SearchEngineId, number>();

  constructor(
    @Inject(agentConfig.KEY) settings: AgentSettings,
    @Inject(SEARCH_TRANSPORT) private readonly transport: SearchTransport,
    @Optional() @Inject(SEARCH_RUNTIME) runtime?: SearchRuntime,
  ) {
    this.settings = settings.search;
    this.runtime = runtime ?? defaultRuntime;
    this.timeout = new AdaptiveTimeout(this.settings.timeout);
  }

  get transportKind(): SearchTransport['kind'] {
    return this.transport.kind;
  }

  buildRequest(
    query: string,
    overrides: Partial<SearchOptions> = {},
  ): SearchRequest {
    return createSearchRequest(
      query,
      defaultSearchOptions(this.settings, overrides),
    );
  }

  engineOrderFor(request: SearchRequest): SearchEngineId[] {
    return computeEngineOrder(
      request.options.engine,
      this.settings.fallbackOrder,
      this.settings.resilient,
    );
  }

  listEngines(): EngineStatus[] {
    return computeEngineOrder('auto', this.settings.fallbackOrder, true).map(
      (engine) => ({
        engine,
        baseUrl: SEARCH_ENGINES[engine].baseUrl,
        successCount: this.successCounts.get(engine) ?? 0,
        failureCount: this.failureCounts.get(engine) ?? 0,
      }),
    );
  }

  currentAttemptTimeout(): number {
    return this.timeout.current();
  }

  /**
   * Tries engines one after another until one returns a usable results page.
   * Blocked and failed attempts are recorded and the next engine is tried.
   */
  async resolve(
    request: SearchRequest,
    context: SearchContext = {},
  ): Promise<SearchResolution> {
    const engineOrder = this.engineOrderFor(request);
    const attempts: SearchAttempt[] = [];
    this.logger.log(
      `Resolving search "${request.query}" over ${engineOrder.join(' -> ')}`,
    );

    for (const [index, engine] of engineOrder.entries()) {
      for (let retry = 0; retry <= this.settings.retriesPerEngine; retry++) {
        throwIfAborted(context.signal);
        if (request.options.humanlike && attempts.length > 0) {
          await this.pace(context.signal);
        }

        const attempt = await this.attempt(
          request,
          engine,
          index + 1,
          retry,
          context,
        );
        attempts.push(attempt.record);

        if (
          attempt.record.status === 'success' &&
          attempt.page &&
          attempt.results
        ) {
          this.increment(this.successCounts, engine);
          return {
            status: 'success',
            query: request.query,
            engine,
            url: attempt.page.url,
            pageTitle: attempt.page.title,
            excerpt: excerptOf(attempt.page.text),
            ...attempt.results,
            attempts,
          };
        }

        this.increment(this.failureCounts, engine);
        this.logger.warn(
          `Search engine ${engine} ${attempt.record.status}: ${attempt.record.reason ?? 'unknown'}`,
        );
        // A block will not lift on an immediate retry
        if (attempt.record.status === 'blocked') {
          break;
        }
      }
    }

    this.logger.warn(`All search engines failed for "${request.query}"`);
    return { status: 'exhausted', query: request.query, engineOrder, attempts };
  }

  private async attempt(
    request: SearchRequest,
    engine: SearchEngineId,
    ordinal: number,
    retry: number,
    context: SearchContext,
  ): Promise<{
    record: SearchAttempt;
    page?: LoadedPage;
    results?: ParsedResults;
  }> {
    const strategy = SEARCH_ENGINES[engine];
    const url = strategy.buildUrl(request);
    const timeoutMs = this.timeout.current();
    const startedAt = this.runtime.now();

    try {
      const page = await runWithDeadline(
        (signal) =>
          this.transport.load(url, {
            signal,
            humanlike: request.options.humanlike,
            language: request.options.language,
            target: context.target,
          }),
        {
          timeoutMs,
          signal: context.signal,
          onTimeout: () =>
            new SearchAttemptFailedError(
              `${engine} did not answer within ${timeoutMs}ms`,
            ),
        },
      );
      const elapsedMs = this.runtime.now() - startedAt;
      const results = parseResults(engine, page.raw, strategy.baseUrl);
      const classification = classifyPage(strategy, page, {
        query: request.query,
        resultCount: results.organicResults.length,
        detection: this.settings.detection,
        emptyResultPolicy: this.settings.emptyResultPolicy,
      });
      if (classification.status === 'success') {
        this.timeout.record(elapsedMs);
      }
      return {
        record: {
          engine,
          ordinal,
          retry,
          status: classification.status,
          url,
          elapsedMs,
          reason: classification.reason,
        },
        page,
        results,
      };
    } catch (error) {
      if (isTurnInterrupt(error)) {
        throw error;
      }
      return {
        record: {
          engine,
          ordinal,
          retry,
          status: 'error',
          url,
          elapsedMs: this.runtime.now() - startedAt,
          reason: errorMessage(error),
        },
      };
    }
  }

  private async pace(signal?: AbortSignal): Promise<void> {
    const { min, max } = this.settings.humanlikeDelayMs;
    const delay = Math.round(min + this.runtime.random() * (max - min));
    this.logger.debug(`Pacing next search attempt by ${delay}ms`);
    await this.runtime.sleep(delay, signal);
  }

  private increment(
    counts: Map<SearchEngineId, number>,
    engine: SearchEngineId,
  ): void {
    counts.set(engine, (counts.get(engine) ?? 0) + 1);
  }
}

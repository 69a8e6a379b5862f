import { registerAs } from '@nestjs/config';
import { plainToInstance, Transform } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import {
  Dimensions,
  Environment,
  SearchContentType,
  SearchEngineId,
  SearchEnginePreference,
  SearchTimePeriod,
} from '@steerloop/shared';
import { ConfigurationError } from '../common/errors';
import { deepFreeze } from '../common/immutable';

export enum LogLevel {
  NONE = 'NONE',
  ERROR = 'ERROR',
  INFO = 'INFO',
  ACTION = 'ACTION',
  DEBUG = 'DEBUG',
  ALL = 'ALL',
}

export const SCREENSHOT_MODES = ['none', 'search', 'all'] as const;
export type ScreenshotMode = (typeof SCREENSHOT_MODES)[number];

export const SEARCH_ENGINE_IDS: readonly SearchEngineId[] = [
  'google',
  'bing',
  'duckduckgo',
  'yahoo',
];
const SEARCH_ENGINE_PREFERENCES: readonly SearchEnginePreference[] = [
  'auto',
  ...SEARCH_ENGINE_IDS,
];
const SEARCH_TIME_PERIODS: readonly SearchTimePeriod[] = [
  'any',
  'day',
  'week',
  'month',
  'year',
];
const SEARCH_CONTENT_TYPES: readonly SearchContentType[] = [
  'web',
  'images',
  'news',
  'videos',
];
const ENVIRONMENTS: readonly Environment[] = [
  'browser',
  'mac',
  'windows',
  'ubuntu',
];

export const ACK_MODES = ['auto', 'deny', 'event'] as const;
export type AckMode = (typeof ACK_MODES)[number];

export const EMPTY_RESULT_POLICIES = ['fallback', 'accept'] as const;
export type EmptyResultPolicy = (typeof EMPTY_RESULT_POLICIES)[number];

export const SEARCH_TRANSPORT_KINDS = ['http', 'target'] as const;
export type SearchTransportKind = (typeof SEARCH_TRANSPORT_KINDS)[number];

// Anti-automation walls shared by every engine. Matched against the page
// location, title and element attributes, never against result text.
export const DEFAULT_CAPTCHA_MARKERS: readonly string[] = [
  'g-recaptcha',
  'recaptcha/api.js',
  'h-captcha',
  'hcaptcha.com',
  'cf-turnstile',
  'challenges.cloudflare.com',
  'verify you are human',
  'please verify you are a human',
  'just a moment...',
  'attention required!',
];

export const DEFAULT_ENGINE_BLOCK_MARKERS: Readonly<
  Record<SearchEngineId, readonly string[]>
> = {
  google: [
    'google.com/sorry/',
    'unusual traffic from your computer network',
    'consent.google.com',
  ],
  bing: ['/turing/captcha', 'bing.com/challenge'],
  duckduckgo: ['anomaly-modal', 'bots use duckduckgo too'],
  yahoo: ['consent.yahoo.com', 'guce.yahoo.com'],
};

export const DEFAULT_BLOCKED_STATUSES: readonly number[] = [403, 429, 503];

function parseBoolean(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return value;
}

function parseList(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  return value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

function parseIntegerList(value: unknown): unknown {
  const items = parseList(value);
  return Array.isArray(items) ? items.map((item) => Number(item)) : items;
}

// Implicit conversion turns "false" into true before @Transform runs, so
// booleans and lists are parsed from the raw value.
const EnvBoolean = () =>
  Transform(({ obj, key }) => parseBoolean(obj[key]), { toClassOnly: true });
const EnvList = () =>
  Transform(({ obj, key }) => parseList(obj[key]), { toClassOnly: true });
const EnvIntegerList = () =>
  Transform(({ obj, key }) => parseIntegerList(obj[key]), {
    toClassOnly: true,
  });

/**
 * Process environment understood by the agent. Every field has a default so
 * an empty environment is valid apart from the model credentials.
 */
export class AgentEnvironment {
  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsString()
  AGENT_MODEL = 'computer-use-preview';

  @IsInt()
  @Min(1)
  AGENT_MAX_EXCHANGES = 50;

  @IsOptional()
  @IsInt()
  @Min(1)
  AGENT_TURN_TIMEOUT_MS?: number;

  @EnvBoolean()
  @IsBoolean()
  HEADLESS = false;

  @IsEnum(LogLevel)
  LOG_LEVEL: LogLevel = LogLevel.INFO;

  @IsString()
  LOG_DIR = 'logs';

  @IsIn(SCREENSHOT_MODES)
  SCREENSHOT_MODE: ScreenshotMode = 'all';

  @EnvBoolean()
  @IsBoolean()
  SCREENSHOT_SAVE = false;

  @IsString()
  SCREENSHOT_DIR = 'screenshots';

  @IsInt()
  @Min(0)
  SCREENSHOT_MAX_FILES = 100;

  @IsUrl({ require_tld: false })
  DESKTOP_BASE_URL = 'http://localhost:9990';

  @IsIn(ENVIRONMENTS)
  DESKTOP_ENVIRONMENT: Environment = 'ubuntu';

  // Chrome DevTools endpoint of the desktop browser, e.g. http://localhost:9222
  @IsOptional()
  @IsUrl({ require_tld: false, protocols: ['http', 'https'] })
  DESKTOP_BROWSER_DEBUG_URL?: string;

  @IsInt()
  @Min(1)
  DISPLAY_WIDTH = 1280;

  @IsInt()
  @Min(1)
  DISPLAY_HEIGHT = 960;

  @IsInt()
  @Min(1)
  EXECUTION_TIMEOUT_MS = 30000;

  @IsInt()
  @Min(1)
  @Max(65535)
  MCP_PORT = 9991;

  @IsIn(ACK_MODES)
  SAFETY_ACK_MODE: AckMode = 'event';

  @IsInt()
  @Min(1)
  SAFETY_ACK_TIMEOUT_MS = 120000;

  @IsOptional()
  @IsString()
  SAFETY_RULES_PATH?: string;

  @EnvBoolean()
  @IsBoolean()
  RESILIENT_SEARCH = true;

  @IsIn(SEARCH_ENGINE_PREFERENCES)
  SEARCH_ENGINE: SearchEnginePreference = 'auto';

  @EnvList()
  @IsArray()
  @ArrayNotEmpty()
  @IsIn(SEARCH_ENGINE_IDS, { each: true })
  SEARCH_FALLBACK_ORDER: SearchEngineId[] = [...SEARCH_ENGINE_IDS];

  @EnvBoolean()
  @IsBoolean()
  HUMANLIKE_SEARCH = true;

  @IsOptional()
  @IsString()
  SEARCH_LANGUAGE?: string;

  @IsOptional()
  @IsString()
  SEARCH_REGION?: string;

  @EnvBoolean()
  @IsBoolean()
  SEARCH_SAFE = true;

  @IsIn(SEARCH_TIME_PERIODS)
  SEARCH_TIME_PERIOD: SearchTimePeriod = 'any';

  @IsIn(SEARCH_CONTENT_TYPES)
  SEARCH_CONTENT_TYPE: SearchContentType = 'web';

  @IsOptional()
  @IsString()
  SEARCH_SITE?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  SEARCH_RESULT_COUNT?: number;

  @IsIn(SEARCH_TRANSPORT_KINDS)
  SEARCH_TRANSPORT: SearchTransportKind = 'http';

  @IsInt()
  @Min(0)
  SEARCH_RETRIES_PER_ENGINE = 0;

  @IsIn(EMPTY_RESULT_POLICIES)
  SEARCH_EMPTY_RESULT_POLICY: EmptyResultPolicy = 'fallback';

  @EnvIntegerList()
  @IsArray()
  @IsInt({ each: true })
  @Min(400, { each: true })
  @Max(599, { each: true })
  SEARCH_BLOCKED_STATUSES: number[] = [...DEFAULT_BLOCKED_STATUSES];

  @EnvList()
  @IsArray()
  @IsString({ each: true })
  SEARCH_CAPTCHA_MARKERS: string[] = [...DEFAULT_CAPTCHA_MARKERS];

  @EnvList()
  @IsArray()
  @IsString({ each: true })
  SEARCH_BLOCK_MARKERS_GOOGLE: string[] = [
    ...DEFAULT_ENGINE_BLOCK_MARKERS.google,
  ];

  @EnvList()
  @IsArray()
  @IsString({ each: true })
  SEARCH_BLOCK_MARKERS_BING: string[] = [...DEFAULT_ENGINE_BLOCK_MARKERS.bing];

  @EnvList()
  @IsArray()
  @IsString({ each: true })
  SEARCH_BLOCK_MARKERS_DUCKDUCKGO: string[] = [
    ...DEFAULT_ENGINE_BLOCK_MARKERS.duckduckgo,
  ];

  @EnvList()
  @IsArray()
  @IsString({ each: true })
  SEARCH_BLOCK_MARKERS_YAHOO: string[] = [
    ...DEFAULT_ENGINE_BLOCK_MARKERS.yahoo,
  ];

  @IsInt()
  @Min(1)
  SEARCH_TIMEOUT_DEFAULT_MS = 30000;

  @IsInt()
  @Min(1)
  SEARCH_TIMEOUT_MIN_MS = 5000;

  @IsInt()
  @Min(1)
  SEARCH_TIMEOUT_MAX_MS = 60000;

  @IsInt()
  @Min(0)
  HUMANLIKE_DELAY_MIN_MS = 500;

  @IsInt()
  @Min(0)
  HUMANLIKE_DELAY_MAX_MS = 1500;
}

/**
 * Signals that a loaded results page is an anti-automation wall rather than
 * results.
 */
export interface BlockDetection {
  readonly blockedStatuses: readonly number[];
  readonly captchaMarkers: readonly string[];
  readonly engineMarkers: Readonly<Record<SearchEngineId, readonly string[]>>;
}

export interface SearchSettings {
  readonly resilient: boolean;
  readonly engine: SearchEnginePreference;
  readonly fallbackOrder: readonly SearchEngineId[];
  readonly humanlike: boolean;
  readonly language?: string;
  readonly region?: string;
  readonly safe: boolean;
  readonly timePeriod: SearchTimePeriod;
  readonly contentType: SearchContentType;
  readonly site?: string;
  readonly resultCount?: number;
  readonly transport: SearchTransportKind;
  readonly retriesPerEngine: number;
  readonly emptyResultPolicy: EmptyResultPolicy;
  readonly detection: BlockDetection;
  readonly timeout: Readonly<{
    defaultMs: number;
    minMs: number;
    maxMs: number;
  }>;
  readonly humanlikeDelayMs: Readonly<{ min: number; max: number }>;
}

/**
 * Immutable settings threaded into the processor, dispatcher and services.
 */
export interface AgentSettings {
  readonly model: string;
  readonly openaiApiKey?: string;
  readonly maxExchanges: number;
  readonly turnTimeoutMs?: number;
  readonly headless: boolean;
  readonly logLevel: LogLevel;
  readonly logDir: string;
  readonly screenshotMode: ScreenshotMode;
  readonly screenshots: Readonly<{
    save: boolean;
    directory: string;
    maxFiles: number;
  }>;
  readonly desktop: Readonly<{
    baseUrl: string;
    environment: Environment;
    display: Readonly<Dimensions>;
    browserDebugUrl?: string;
  }>;
  readonly executionTimeoutMs: number;
  readonly mcpPort: number;
  readonly safety: Readonly<{
    ackMode: AckMode;
    ackTimeoutMs: number;
    rulesPath?: string;
  }>;
  readonly search: SearchSettings;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Validates raw environment variables. Used as the ConfigModule `validate`
 * hook and by `loadAgentSettings`.
 */
export function validate(config: Record<string, unknown>): AgentEnvironment {
  const validated = plainToInstance(AgentEnvironment, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const problems = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new ConfigurationError(
      `Invalid agent configuration: ${problems.join('; ')}`,
      { problems },
    );
  }

  if (validated.SEARCH_TIMEOUT_MIN_MS > validated.SEARCH_TIMEOUT_MAX_MS) {
    throw new ConfigurationError(
      'Invalid agent configuration: SEARCH_TIMEOUT_MIN_MS exceeds SEARCH_TIMEOUT_MAX_MS',
    );
  }
  if (
    validated.SEARCH_TRANSPORT === 'target' &&
    blankToUndefined(validated.DESKTOP_BROWSER_DEBUG_URL) === undefined
  ) {
    throw new ConfigurationError(
      'Invalid agent configuration: SEARCH_TRANSPORT=target needs DESKTOP_BROWSER_DEBUG_URL to read result pages',
    );
  }
  if (validated.HUMANLIKE_DELAY_MIN_MS > validated.HUMANLIKE_DELAY_MAX_MS) {
    throw new ConfigurationError(
      'Invalid agent configuration: HUMANLIKE_DELAY_MIN_MS exceeds HUMANLIKE_DELAY_MAX_MS',
    );
  }

  return validated;
}

export function toAgentSettings(env: AgentEnvironment): AgentSettings {
  return deepFreeze<AgentSettings>({
    model: env.AGENT_MODEL,
    openaiApiKey: blankToUndefined(env.OPENAI_API_KEY),
    maxExchanges: env.AGENT_MAX_EXCHANGES,
    turnTimeoutMs: env.AGENT_TURN_TIMEOUT_MS,
    headless: env.HEADLESS,
    logLevel: env.LOG_LEVEL,
    logDir: env.LOG_DIR,
    screenshotMode: env.SCREENSHOT_MODE,
    screenshots: {
      save: env.SCREENSHOT_SAVE,
      directory: env.SCREENSHOT_DIR,
      maxFiles: env.SCREENSHOT_MAX_FILES,
    },
    desktop: {
      baseUrl: env.DESKTOP_BASE_URL.replace(/\/+$/, ''),
      environment: env.DESKTOP_ENVIRONMENT,
      display: { width: env.DISPLAY_WIDTH, height: env.DISPLAY_HEIGHT },
      browserDebugUrl: blankToUndefined(env.DESKTOP_BROWSER_DEBUG_URL)?.replace(
        /\/+$/,
        '',
      ),
    },
    executionTimeoutMs: env.EXECUTION_TIMEOUT_MS,
    mcpPort: env.MCP_PORT,
    safety: {
      ackMode: env.SAFETY_ACK_MODE,
      ackTimeoutMs: env.SAFETY_ACK_TIMEOUT_MS,
      rulesPath: blankToUndefined(env.SAFETY_RULES_PATH),
    },
    search: {
      resilient: env.RESILIENT_SEARCH,
      engine: env.SEARCH_ENGINE,
      fallbackOrder: env.SEARCH_FALLBACK_ORDER,
      humanlike: env.HUMANLIKE_SEARCH,
      language: blankToUndefined(env.SEARCH_LANGUAGE),
      region: blankToUndefined(env.SEARCH_REGION),
      safe: env.SEARCH_SAFE,
      timePeriod: env.SEARCH_TIME_PERIOD,
      contentType: env.SEARCH_CONTENT_TYPE,
      site: blankToUndefined(env.SEARCH_SITE),
      resultCount: env.SEARCH_RESULT_COUNT,
      transport: env.SEARCH_TRANSPORT,
      retriesPerEngine: env.SEARCH_RETRIES_PER_ENGINE,
      emptyResultPolicy: env.SEARCH_EMPTY_RESULT_POLICY,
      detection: {
        blockedStatuses: env.SEARCH_BLOCKED_STATUSES,
        captchaMarkers: env.SEARCH_CAPTCHA_MARKERS,
        engineMarkers: {
          google: env.SEARCH_BLOCK_MARKERS_GOOGLE,
          bing: env.SEARCH_BLOCK_MARKERS_BING,
          duckduckgo: env.SEARCH_BLOCK_MARKERS_DUCKDUCKGO,
          yahoo: env.SEARCH_BLOCK_MARKERS_YAHOO,
        },
      },
      timeout: {
        defaultMs: env.SEARCH_TIMEOUT_DEFAULT_MS,
        minMs: env.SEARCH_TIMEOUT_MIN_MS,
        maxMs: env.SEARCH_TIMEOUT_MAX_MS,
      },
      humanlikeDelayMs: {
        min: env.HUMANLIKE_DELAY_MIN_MS,
        max: env.HUMANLIKE_DELAY_MAX_MS,
      },
    },
  });
}

export function loadAgentSettings(
  config: Record<string, unknown>,
): AgentSettings {
  return toAgentSettings(validate(config));
}

export const agentConfig = registerAs('agent', () =>
  loadAgentSettings(process.env),
);

import { Inject, Injectable, Logger } from '@nestjs/common';
import { readFileSync } from 'fs';
import {
  isComputerCallContentBlock,
  isKeypressAction,
  ProposedAction,
} from '@steerloop/shared';
import { ConfigurationError, errorMessage } from '../common/errors';
import { agentConfig, AgentSettings } from '../config/agent.config';
import defaultRules from './safety-rules.json';

export type SafetyVerdictKind = 'allow' | 'require_ack' | 'block';

export interface SafetyReason {
  code: string;
  message: string;
}

export interface SafetyVerdict {
  verdict: SafetyVerdictKind;
  reasons: SafetyReason[];
}

export interface SafetyRules {
  blockedDomains: string[];
  blockedKeyCombinations: string[][];
  acknowledgeKeyCombinations: string[][];
}

const KEY_ALIASES: Record<string, string> = {
  control: 'ctrl',
  meta: 'cmd',
  command: 'cmd',
  super: 'cmd',
  win: 'cmd',
  option: 'alt',
  del: 'delete',
  esc: 'escape',
  return: 'enter',
};

export function normalizeKey(key: string): string {
  const lower = key.trim().toLowerCase();
  return KEY_ALIASES[lower] ?? lower;
}

function comboKey(keys: string[]): string {
  return [...new Set(keys.map(normalizeKey))].sort().join('+');
}

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === 'string')
  );
}

function isKeyComboList(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(isStringArray);
}

/**
 * Validates a rule document, throwing a ConfigurationError naming the first
 * malformed field.
 */
export function parseSafetyRules(raw: unknown): SafetyRules {
  if (typeof raw !== 'object' || raw === null) {
    throw new ConfigurationError('Safety rules must be a JSON object');
  }
  const { blockedDomains, blockedKeyCombinations, acknowledgeKeyCombinations } =
    raw as Record<string, unknown>;

  if (!isStringArray(blockedDomains)) {
    throw new ConfigurationError('blockedDomains must be a list of domains');
  }
  if (!isKeyComboList(blockedKeyCombinations)) {
    throw new ConfigurationError(
      'blockedKeyCombinations must be a list of key lists',
    );
  }
  if (!isKeyComboList(acknowledgeKeyCombinations)) {
    throw new ConfigurationError(
      'acknowledgeKeyCombinations must be a list of key lists',
    );
  }

  return {
    blockedDomains: blockedDomains.map((domain) => domain.toLowerCase()),
    blockedKeyCombinations,
    acknowledgeKeyCombinations,
  };
}

function hostnameOf(url: string): string | null {
  for (const candidate of [url, `http://${url}`]) {
    try {
      const hostname = new URL(candidate).hostname;
      if (hostname) {
        return hostname.toLowerCase();
      }
    } catch {
      continue;
    }
  }
  return null;
}

@Injectable()
export class SafetyGate {
  private readonly logger = new Logger(SafetyGate.name);
  private readonly rules: SafetyRules;
  private readonly blockedCombos: Set<string>;
  private readonly acknowledgeCombos: Set<string>;

  constructor(@Inject(agentConfig.KEY) settings: AgentSettings) {
    this.rules = SafetyGate.loadRules(settings.safety.rulesPath);
    this.blockedCombos = new Set(
      this.rules.blockedKeyCombinations.map(comboKey),
    );
    this.acknowledgeCombos = new Set(
      this.rules.acknowledgeKeyCombinations.map(comboKey),
    );
  }

  private static loadRules(rulesPath?: string): SafetyRules {
    if (!rulesPath) {
      return parseSafetyRules(defaultRules);
    }
    try {
      return parseSafetyRules(JSON.parse(readFileSync(rulesPath, 'utf8')));
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new ConfigurationError(
        `Failed to load safety rules from ${rulesPath}: ${errorMessage(error)}`,
      );
    }
  }

  /**
   * Blocked domains match the hostname itself and all of its subdomains.
   */
  isBlockedUrl(url: string): boolean {
    const hostname = hostnameOf(url);
    if (!hostname) {
      return false;
    }
    return this.rules.blockedDomains.some(
      (domain) => hostname === domain || hostname.endsWith(`.${domain}`),
    );
  }

  checkUrl(url: string): SafetyVerdict {
    if (this.isBlockedUrl(url)) {
      return {
        verdict: 'block',
        reasons: [{ code: 'blocked_domain', message: `Blocked URL: ${url}` }],
      };
    }
    return { verdict: 'allow', reasons: [] };
  }

  check(action: ProposedAction): SafetyVerdict {
    const blocking: SafetyReason[] = [];
    const acknowledging: SafetyReason[] = [];

    if (isComputerCallContentBlock(action)) {
      if (isKeypressAction(action.action)) {
        const combo = comboKey(action.action.keys);
        if (this.blockedCombos.has(combo)) {
          blocking.push({
            code: 'destructive_keys',
            message: `Key combination ${combo} is not allowed`,
          });
        } else if (this.acknowledgeCombos.has(combo)) {
          acknowledging.push({
            code: 'confirm_keys',
            message: `Key combination ${combo} needs confirmation`,
          });
        }
      }
      for (const check of action.pendingSafetyChecks) {
        acknowledging.push({ code: check.code, message: check.message });
      }
    } else {
      const url = action.arguments.url;
      if (typeof url === 'string') {
        blocking.push(...this.checkUrl(url).reasons);
      }
      const site = action.arguments.site;
      if (typeof site === 'string') {
        blocking.push(...this.checkUrl(site).reasons);
      }
    }

    if (blocking.length > 0) {
      this.logger.warn(
        `Blocked ${action.callId}: ${blocking.map((r) => r.message).join('; ')}`,
      );
      return { verdict: 'block', reasons: blocking };
    }
    if (acknowledging.length > 0) {
      return { verdict: 'require_ack', reasons: acknowledging };
    }
    return { verdict: 'allow', reasons: [] };
  }
}

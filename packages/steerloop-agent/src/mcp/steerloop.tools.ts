import { Inject, Injectable, Logger } from '@nestjs/common';
import { Tool } from '@rekog/mcp-nest';
import { z } from 'zod';
import { extractText } from '@steerloop/shared';
import { AgentProcessor } from '../agent/agent.processor';
import { agentTools } from '../agent/agent.tools';
import {
  LOCAL_FUNCTION_HANDLERS,
  LocalFunctionHandler,
} from '../agent/agent.types';
import { errorMessage } from '../common/errors';
import {
  EXECUTION_TARGET,
  ExecutionTarget,
  getTargetFunction,
} from '../execution/execution-target';

export interface ToolResult {
  content: { type: 'text'; text: string }[];
}

function textResult(...texts: string[]): ToolResult {
  return { content: texts.map((text) => ({ type: 'text' as const, text })) };
}

/**
 * The agent's search functions and turn loop offered to MCP clients.
 */
@Injectable()
export class SteerloopTools {
  private readonly logger = new Logger(SteerloopTools.name);
  private readonly handlers: ReadonlyMap<string, LocalFunctionHandler>;

  constructor(
    private readonly processor: AgentProcessor,
    @Inject(EXECUTION_TARGET) private readonly target: ExecutionTarget,
    @Inject(LOCAL_FUNCTION_HANDLERS) handlers: LocalFunctionHandler[],
  ) {
    this.handlers = new Map(handlers.map((handler) => [handler.name, handler]));
  }

  private async invoke(
    name: string,
    args: Record<string, unknown>,
  ): Promise<ToolResult> {
    const handler = this.handlers.get(name);
    if (!handler) {
      return textResult(`Error: ${name} is not available`);
    }
    try {
      const result = await handler.invoke(args, { target: this.target });
      return textResult(JSON.stringify(result));
    } catch (error) {
      this.logger.warn(`${name} failed: ${errorMessage(error)}`);
      return textResult(`Error running ${name}: ${errorMessage(error)}`);
    }
  }

  @Tool({
    name: 'resilient_search',
    description:
      'Searches the web, moving on to the next engine when one serves a CAPTCHA or block page. Returns organic results, the featured snippet and related searches.',
    parameters: z.object({
      query: z.string().min(1).describe('The search query'),
      engine: z
        .enum(['auto', 'google', 'bing', 'duckduckgo', 'yahoo'])
        .optional()
        .describe('Engine to try first'),
      language: z.string().optional().describe('Language code, e.g. en'),
      region: z.string().optional().describe('Region code, e.g. us'),
      safe_search: z.boolean().optional(),
      time_period: z.enum(['any', 'day', 'week', 'month', 'year']).optional(),
      content_type: z.enum(['web', 'images', 'news', 'videos']).optional(),
      site: z.string().optional().describe('Restrict results to this domain'),
      result_count: z.number().int().min(1).max(100).optional(),
      humanlike: z.boolean().optional(),
    }),
  })
  async resilientSearch(args: Record<string, unknown>): Promise<ToolResult> {
    return this.invoke('resilient_search', args);
  }

  @Tool({
    name: 'search_weather',
    description: 'Looks up the current weather for a location.',
    parameters: z.object({
      location: z.string().min(1).describe('City or place name'),
      language: z.string().optional(),
      region: z.string().optional(),
    }),
  })
  async searchWeather(args: Record<string, unknown>): Promise<ToolResult> {
    return this.invoke('search_weather', args);
  }

  @Tool({
    name: 'get_available_engines',
    description:
      'Lists the search engines in fallback order with their success and failure counts.',
    parameters: z.object({}),
  })
  async getAvailableEngines(): Promise<ToolResult> {
    return this.invoke('list_search_engines', {});
  }

  @Tool({
    name: 'navigate_browser',
    description: 'Opens a URL in the desktop browser.',
    parameters: z.object({
      url: z.string().url().describe('Absolute URL to open'),
    }),
  })
  async navigateBrowser({ url }: { url: string }): Promise<ToolResult> {
    const goto = getTargetFunction(this.target, 'goto');
    if (!goto) {
      return textResult('Error: the execution target cannot navigate');
    }
    try {
      return textResult(String(await goto({ url })));
    } catch (error) {
      return textResult(`Error navigating to ${url}: ${errorMessage(error)}`);
    }
  }

  @Tool({
    name: 'execute_task',
    description:
      'Runs a full agent turn for a natural language task on the desktop and returns the final answer.',
    parameters: z.object({
      task: z.string().min(1).describe('What the agent should do'),
    }),
  })
  async executeTask({ task }: { task: string }): Promise<ToolResult> {
    try {
      const result = await this.processor.runFullTurn(task, agentTools, [], {
        target: this.target,
      });
      const summary = {
        status: result.status,
        exchanges: result.exchanges.length,
        ...(result.status === 'cancelled' ? { reason: result.reason } : {}),
        ...(result.status === 'failed' ? { error: result.error } : {}),
      };
      const answer =
        result.status === 'completed'
          ? extractText(result.finalResponse.contentBlocks) ?? ''
          : `Turn ${result.status}`;
      return textResult(answer, JSON.stringify(summary));
    } catch (error) {
      this.logger.error(`execute_task failed: ${errorMessage(error)}`);
      return textResult(`Error executing task: ${errorMessage(error)}`);
    }
  }
}

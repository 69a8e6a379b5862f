import { Inject, Injectable, Logger } from '@nestjs/common';
import OpenAI, { APIError, APIUserAbortError } from 'openai';
import { Message } from '@steerloop/shared';
import {
  AgentModelService,
  AgentResponse,
  ToolDeclaration,
} from '../agent/agent.types';
import {
  ModelRequestError,
  TurnInterrupt,
  errorMessage,
} from '../common/errors';
import { agentConfig, AgentSettings } from '../config/agent.config';
import { MAX_OUTPUT_TOKENS, RESPONSE_INCLUDE } from './openai.constants';
import {
  formatMessagesForOpenAI,
  formatOpenAIResponse,
} from './openai.messages';
import { buildOpenAITools } from './openai.tools';

@Injectable()
export class OpenAIService implements AgentModelService {
  private openai: OpenAI | null = null;
  private readonly logger = new Logger(OpenAIService.name);

  constructor(
    @Inject(agentConfig.KEY) private readonly settings: AgentSettings,
  ) {
    if (!settings.openaiApiKey) {
      this.logger.warn(
        'OPENAI_API_KEY is not set. OpenAIService will not work properly.',
      );
    }
  }

  async generateMessage(
    systemPrompt: string,
    messages: Message[],
    tools: ToolDeclaration[],
    signal?: AbortSignal,
  ): Promise<AgentResponse> {
    const { model, desktop } = this.settings;
    try {
      const response = await this.getOpenAIClient().responses.create(
        {
          model,
          max_output_tokens: MAX_OUTPUT_TOKENS,
          input: formatMessagesForOpenAI(messages),
          instructions: systemPrompt,
          tools: buildOpenAITools(tools, desktop.environment, desktop.display),
          truncation: 'auto',
          store: false,
          include: [...RESPONSE_INCLUDE],
        },
        { signal },
      );

      return {
        contentBlocks: formatOpenAIResponse(response.output, (item) =>
          this.logger.warn(`Unsupported response output item: ${item.type}`),
        ),
        tokenUsage: {
          inputTokens: response.usage?.input_tokens ?? 0,
          outputTokens: response.usage?.output_tokens ?? 0,
          totalTokens: response.usage?.total_tokens ?? 0,
        },
      };
    } catch (error) {
      if (error instanceof APIUserAbortError || signal?.aborted) {
        this.logger.log('OpenAI API call aborted');
        throw new TurnInterrupt();
      }
      if (error instanceof ModelRequestError) {
        throw error;
      }
      this.logger.error(
        `Error sending message to OpenAI: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new ModelRequestError(
        `OpenAI request failed: ${errorMessage(error)}`,
        error instanceof APIError ? { status: error.status } : undefined,
      );
    }
  }

  private getOpenAIClient(): OpenAI {
    if (this.openai) {
      return this.openai;
    }
    const apiKey = this.settings.openaiApiKey;
    if (!apiKey) {
      throw new ModelRequestError('OPENAI_API_KEY is not set');
    }
    this.openai = new OpenAI({ apiKey });
    return this.openai;
  }
}

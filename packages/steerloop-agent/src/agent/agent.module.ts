import { Module } from '@nestjs/common';
import { agentConfig, AgentSettings } from '../config/agent.config';
import { DesktopExecutionTarget } from '../execution/desktop-target';
import { EXECUTION_TARGET } from '../execution/execution-target';
import { OpenAIModule } from '../openai/openai.module';
import { OpenAIService } from '../openai/openai.service';
import { SafetyModule } from '../safety/safety.module';
import { ResilientSearchService } from '../search/resilient-search.service';
import { createSearchFunctionHandlers } from '../search/search.functions';
import { SearchModule } from '../search/search.module';
import { AgentDispatcher } from './agent.dispatcher';
import { AgentProcessor } from './agent.processor';
import { AGENT_MODEL_SERVICE, LOCAL_FUNCTION_HANDLERS } from './agent.types';
import { ScreenshotStore } from './screenshot-store.service';

@Module({
  imports: [SafetyModule, SearchModule, OpenAIModule],
  providers: [
    AgentProcessor,
    AgentDispatcher,
    ScreenshotStore,
    {
      provide: AGENT_MODEL_SERVICE,
      useExisting: OpenAIService,
    },
    {
      provide: LOCAL_FUNCTION_HANDLERS,
      inject: [ResilientSearchService],
      useFactory: createSearchFunctionHandlers,
    },
    {
      provide: EXECUTION_TARGET,
      inject: [agentConfig.KEY],
      useFactory: (settings: AgentSettings) =>
        new DesktopExecutionTarget({
          ...settings.desktop,
          inspectTimeoutMs: settings.executionTimeoutMs,
        }),
    },
  ],
  exports: [AgentProcessor, EXECUTION_TARGET, LOCAL_FUNCTION_HANDLERS],
})
export class AgentModule {}

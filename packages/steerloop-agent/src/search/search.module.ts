import { Module } from '@nestjs/common';
import { agentConfig, AgentSettings } from '../config/agent.config';
import { ResilientSearchService } from './resilient-search.service';
import {
  HttpSearchTransport,
  SEARCH_TRANSPORT,
  SearchTransport,
  TargetSearchTransport,
} from './search-transport';

@Module({
  providers: [
    {
      provide: SEARCH_TRANSPORT,
      inject: [agentConfig.KEY],
      useFactory: (settings: AgentSettings): SearchTransport =>
        settings.search.transport === 'target'
          ? new TargetSearchTransport()
          : new HttpSearchTransport(),
    },
    ResilientSearchService,
  ],
  exports: [ResilientSearchService],
})
export class SearchModule {}

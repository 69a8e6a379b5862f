import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AgentModule } from './agent/agent.module';
import { agentConfig, validate } from './config/agent.config';
import { LoggerModule } from './logger/logger.module';
import { SteerloopMcpModule } from './mcp/steerloop-mcp.module';

@Module({
  imports: [
    EventEmitterModule.forRoot(),
    ConfigModule.forRoot({
      isGlobal: true,
      validate,
      load: [agentConfig],
    }),
    LoggerModule,
    AgentModule,
  ],
})
export class AppModule {}

/**
 * The agent served to MCP clients over HTTP.
 */
@Module({
  imports: [AppModule, SteerloopMcpModule],
})
export class ServerModule {}

import { Module } from '@nestjs/common';
import { McpModule } from '@rekog/mcp-nest';
import { AgentModule } from '../agent/agent.module';
import { SteerloopTools } from './steerloop.tools';

@Module({
  imports: [
    AgentModule,
    McpModule.forRoot({
      name: 'steerloop',
      version: '0.1.0',
      sseEndpoint: '/mcp',
    }),
  ],
  providers: [SteerloopTools],
})
export class SteerloopMcpModule {}

import { Module } from '@nestjs/common';
import { WinstonModule } from 'nest-winston';
import { agentConfig, AgentSettings } from '../config/agent.config';
import { createWinstonLogger } from './winston-logger.service';

@Module({
  imports: [
    WinstonModule.forRootAsync({
      inject: [agentConfig.KEY],
      useFactory: (settings: AgentSettings) => ({
        instance: createWinstonLogger({
          logLevel: settings.logLevel,
          logDir: settings.logDir,
        }),
      }),
    }),
  ],
  exports: [WinstonModule],
})
export class LoggerModule {}

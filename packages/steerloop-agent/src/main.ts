import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import * as readline from 'readline/promises';
import { extractText } from '@steerloop/shared';
import { AgentProcessor } from './agent/agent.processor';
import { agentTools } from './agent/agent.tools';
import { AppModule, ServerModule } from './app.module';
import { errorMessage } from './common/errors';
import { agentConfig, AgentSettings } from './config/agent.config';
import {
  EXECUTION_TARGET,
  ExecutionTarget,
} from './execution/execution-target';
import {
  ACK_REQUESTED_EVENT,
  ACK_RESPONDED_EVENT,
  AcknowledgementRequest,
  AcknowledgementResponse,
} from './safety/acknowledgement.service';

const logger = new Logger('Bootstrap');

// Exit code of a turn that ended before the model finished
const CANCELLED_EXIT_CODE = 2;

async function confirm(
  rl: readline.Interface,
  request: AcknowledgementRequest,
): Promise<boolean> {
  const reasons = request.reasons.map((reason) => reason.message).join('; ');
  const answer = await rl.question(
    `Action ${request.callId} needs confirmation (${reasons}). Allow? [y/N] `,
  );
  return /^y(es)?$/i.test(answer.trim());
}

/**
 * Serves the agent's tools to MCP clients over SSE at /mcp until the process
 * is stopped.
 */
async function serve() {
  const app = await NestFactory.create(ServerModule, { bufferLogs: true });
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));
  app.enableShutdownHooks();
  app.enableCors({ origin: '*', methods: ['GET', 'POST'] });

  const settings = app.get<AgentSettings>(agentConfig.KEY);
  await app.listen(settings.mcpPort, '0.0.0.0');
  logger.log(`MCP server listening on port ${settings.mcpPort} at /mcp`);
}

async function runTask() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

  const settings = app.get<AgentSettings>(agentConfig.KEY);
  const processor = app.get(AgentProcessor);
  const target = app.get<ExecutionTarget>(EXECUTION_TARGET);
  const eventEmitter = app.get(EventEmitter2);

  // Headless runs never prompt; unanswered acknowledgements time out
  const rl = settings.headless
    ? null
    : readline.createInterface({
        input: process.stdin,
        output: process.stdout,
      });

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupt received, cancelling the turn');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    if (rl && settings.safety.ackMode === 'event') {
      const onRequest = (request: AcknowledgementRequest) => {
        confirm(rl, request)
          .catch((error: unknown) => {
            logger.warn(`Confirmation prompt failed: ${errorMessage(error)}`);
            return false;
          })
          .then((approved) => {
            const response: AcknowledgementResponse = {
              callId: request.callId,
              approved,
            };
            eventEmitter.emit(ACK_RESPONDED_EVENT, response);
          })
          .catch((error: unknown) =>
            logger.error(`Acknowledgement failed: ${errorMessage(error)}`),
          );
      };
      eventEmitter.on(ACK_REQUESTED_EVENT, onRequest);
    }

    let input = process.argv.slice(2).join(' ').trim();
    if (!input && rl) {
      input = (await rl.question('Task: ')).trim();
    }
    if (!input) {
      logger.error('No task given. Pass it as arguments.');
      process.exitCode = 1;
      return;
    }

    const result = await processor.runFullTurn(input, agentTools, [], {
      target,
      signal: controller.signal,
    });

    if (result.status === 'completed') {
      const text = extractText(result.finalResponse.contentBlocks);
      process.stdout.write(`${text ?? ''}\n`);
      logger.log(
        `Turn completed after ${result.exchanges.length} exchange(s), ${result.history.length} message(s) in history`,
      );
    } else if (result.status === 'cancelled') {
      logger.warn(
        `Turn cancelled (${result.reason}) after ${result.exchanges.length} exchange(s)`,
      );
      process.exitCode = CANCELLED_EXIT_CODE;
    } else {
      logger.error(
        `Turn failed with ${result.error.code} after ${result.exchanges.length} exchange(s): ${result.error.message}`,
      );
      process.exitCode = 1;
    }
  } finally {
    process.off('SIGINT', onSigint);
    rl?.close();
    await app.close();
  }
}

const bootstrap = process.argv[2] === 'serve' ? serve : runTask;

bootstrap().catch((error: unknown) => {
  logger.error(
    `Agent failed: ${errorMessage(error)}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exitCode = 1;
});

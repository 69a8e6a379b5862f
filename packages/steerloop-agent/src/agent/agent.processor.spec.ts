import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  Message,
  MessageContentType,
  Role,
  isComputerCallContentBlock,
  isToolResultContentBlock,
} from '@steerloop/shared';
import { TargetBusyError, TurnInterrupt } from '../common/errors';
import { AgentSettings } from '../config/agent.config';
import { AcknowledgementService } from '../safety/acknowledgement.service';
import { SafetyGate } from '../safety/safety-gate.service';
import { ResilientSearchService } from '../search/resilient-search.service';
import { createSearchFunctionHandlers } from '../search/search.functions';
import {
  FakeTarget,
  ScriptedModel,
  computerCall,
  createSettings,
  functionCall,
  response,
  text,
} from '../testing/fakes';
import { AgentDispatcher } from './agent.dispatcher';
import {
  AgentProcessor,
  TURN_CANCELLED_EVENT,
  TURN_COMPLETED_EVENT,
  TURN_EXCHANGE_EVENT,
  TURN_FAILED_EVENT,
} from './agent.processor';
import { agentTools } from './agent.tools';
import { AgentResponse, LocalFunctionHandler } from './agent.types';
import { ScreenshotStore } from './screenshot-store.service';

const click = (callId: string) =>
  computerCall(callId, {
    action: 'click',
    coordinates: { x: 1, y: 2 },
    button: 'left',
  });

describe('AgentProcessor', () => {
  let eventEmitter: EventEmitter2;
  let target: FakeTarget;

  const createProcessor = (
    model: ScriptedModel,
    env: Record<string, string> = {},
    handlers: (settings: AgentSettings) => LocalFunctionHandler[] = () => [],
  ) => {
    const settings = createSettings({ SCREENSHOT_MODE: 'none', ...env });
    const safetyGate = new SafetyGate(settings);
    return new AgentProcessor(
      settings,
      model,
      new AgentDispatcher(
        settings,
        safetyGate,
        new ScreenshotStore(settings),
        handlers(settings),
      ),
      safetyGate,
      new AcknowledgementService(eventEmitter, settings),
      eventEmitter,
    );
  };

  beforeEach(() => {
    eventEmitter = new EventEmitter2();
    target = new FakeTarget();
  });

  it('completes without touching the target when nothing is proposed', async () => {
    const model = new ScriptedModel([response(text('Nothing to do.'))]);
    const completed = jest.fn();
    eventEmitter.on(TURN_COMPLETED_EVENT, completed);

    const result = await createProcessor(model).runFullTurn(
      'Say hi',
      agentTools,
      [],
      { target, turnId: 'turn-1' },
    );

    expect(result.status).toBe('completed');
    if (result.status !== 'completed') return;
    expect(result.exchanges).toHaveLength(1);
    expect(result.exchanges[0].actions).toEqual([]);
    expect(result.history).toEqual([
      { role: Role.User, content: [text('Say hi')] },
      { role: Role.Assistant, content: [text('Nothing to do.')] },
    ]);
    expect(result.finalResponse.contentBlocks).toEqual([text('Nothing to do.')]);
    expect(target.calls).toEqual([]);
    expect(completed).toHaveBeenCalledWith({ turnId: 'turn-1' });
  });

  it('executes actions in order and feeds the outcomes back together', async () => {
    const model = new ScriptedModel([
      response(
        text('Working on it'),
        click('c1'),
        functionCall('c2', 'goto', { url: 'https://example.com' }),
        computerCall('c3', { action: 'type', text: 'hello' }),
      ),
      response(text('Done')),
    ]);

    const result = await createProcessor(model).runFullTurn(
      'Fill the form',
      agentTools,
      [],
      { target },
    );

    expect(target.calls).toEqual(['click:1,2:left', 'type:hello']);
    expect(result.exchanges).toHaveLength(2);
    expect(result.exchanges[0].outcomes.map((outcome) => outcome.callId)).toEqual(
      ['c1', 'c2', 'c3'],
    );
    expect(result.history).toHaveLength(4);
    const results = result.history[2];
    expect(results.role).toBe(Role.User);
    expect(
      results.content
        .filter(isToolResultContentBlock)
        .map((block) => block.tool_use_id),
    ).toEqual(['c1', 'c2', 'c3']);
    expect(model.requests.map((request) => request.messageCount)).toEqual([
      1, 3,
    ]);
    expect(model.requests[0].toolNames).toEqual(
      agentTools.map((tool) => tool.name),
    );
  });

  it('blocks destructive actions before they reach the target', async () => {
    const model = new ScriptedModel([
      response(
        computerCall('c1', { action: 'keypress', keys: ['ctrl', 'alt', 'delete'] }),
      ),
      response(text('Understood')),
    ]);

    const result = await createProcessor(model).runFullTurn(
      'Restart',
      agentTools,
      [],
      { target },
    );

    expect(target.calls).toEqual([]);
    expect(result.exchanges[0].outcomes).toEqual([
      {
        kind: 'failure',
        callId: 'c1',
        toolKind: 'computer',
        error: {
          code: 'SafetyBlocked',
          message: 'Key combination alt+ctrl+delete is not allowed',
          details: {
            reasons: [
              {
                code: 'destructive_keys',
                message: 'Key combination alt+ctrl+delete is not allowed',
              },
            ],
          },
        },
      },
    ]);
  });

  it('fails actions whose acknowledgement is denied', async () => {
    const model = new ScriptedModel([
      response(computerCall('c1', { action: 'keypress', keys: ['alt', 'f4'] })),
      response(text('Ok')),
    ]);

    const result = await createProcessor(model, {
      SAFETY_ACK_MODE: 'deny',
    }).runFullTurn('Close it', agentTools, [], { target });

    expect(target.calls).toEqual([]);
    expect(result.exchanges[0].outcomes[0]).toMatchObject({
      kind: 'failure',
      error: {
        code: 'SafetyBlocked',
        message: 'The action was not acknowledged',
      },
    });
  });

  it('runs acknowledged actions with their safety checks', async () => {
    const checks = [
      { id: 'sc_1', code: 'malicious_instructions', message: 'Careful' },
    ];
    const model = new ScriptedModel([
      response(computerCall('c1', { action: 'screenshot' }, checks)),
      response(text('Ok')),
    ]);

    const result = await createProcessor(model, {
      SAFETY_ACK_MODE: 'auto',
    }).runFullTurn('Look', agentTools, [], { target });

    expect(target.calls).toEqual(['screenshot']);
    expect(result.exchanges[0].outcomes[0]).toMatchObject({
      kind: 'computer_result',
      acknowledgedSafetyChecks: checks,
    });
  });

  it('stops between exchanges once cancelled', async () => {
    const controller = new AbortController();
    const model = new ScriptedModel([
      response(click('c1')),
      async () => {
        controller.abort();
        return response(click('c2'));
      },
    ]);
    const cancelled = jest.fn();
    eventEmitter.on(TURN_CANCELLED_EVENT, cancelled);

    const result = await createProcessor(model).runFullTurn(
      'Click twice',
      agentTools,
      [],
      { target, turnId: 'turn-2', signal: controller.signal },
    );

    expect(result).toMatchObject({ status: 'cancelled', reason: 'interrupted' });
    expect(result.exchanges).toHaveLength(1);
    expect(target.calls).toEqual(['click:1,2:left']);
    expect(result.history).toHaveLength(3);
    expect(cancelled).toHaveBeenCalledWith({
      turnId: 'turn-2',
      reason: 'interrupted',
      completedExchanges: 1,
    });
  });

  it('cancels when the exchange limit is reached', async () => {
    const model = new ScriptedModel([
      response(click('c1')),
      response(click('c2')),
      response(click('c3')),
    ]);

    const result = await createProcessor(model, {
      AGENT_MAX_EXCHANGES: '2',
    }).runFullTurn('Keep clicking', agentTools, [], { target });

    expect(result).toMatchObject({
      status: 'cancelled',
      reason: 'exchange_limit',
    });
    expect(result.exchanges).toHaveLength(2);
    expect(model.requests).toHaveLength(2);
  });

  it('cancels a turn that runs past its deadline', async () => {
    const model = new ScriptedModel([
      (signal) =>
        new Promise<AgentResponse>((_, reject) => {
          signal?.addEventListener('abort', () => reject(new TurnInterrupt()));
        }),
    ]);

    const result = await createProcessor(model).runFullTurn(
      'Think slowly',
      agentTools,
      [],
      { target, deadlineMs: 10 },
    );

    expect(result).toMatchObject({ status: 'cancelled', reason: 'deadline' });
  });

  it('cancels a turn through the turn.cancel event', async () => {
    let processor: AgentProcessor | undefined;
    const model = new ScriptedModel([
      async () => {
        expect(processor?.isActive('turn-3')).toBe(true);
        processor?.handleTurnCancel({ turnId: 'turn-3' });
        return response(click('c1'));
      },
    ]);
    processor = createProcessor(model);

    const result = await processor.runFullTurn('Go', agentTools, [], {
      target,
      turnId: 'turn-3',
    });

    expect(result).toMatchObject({ status: 'cancelled', reason: 'interrupted' });
    expect(target.calls).toEqual([]);
    expect(processor.isActive('turn-3')).toBe(false);
  });

  it('refuses a second turn on a busy target', async () => {
    let release: ((value: AgentResponse) => void) | undefined;
    const model = new ScriptedModel([
      () =>
        new Promise<AgentResponse>((resolve) => {
          release = resolve;
        }),
      response(text('Second')),
    ]);
    const processor = createProcessor(model);

    const first = processor.runFullTurn('One', agentTools, [], { target });
    await expect(
      processor.runFullTurn('Two', agentTools, [], { target }),
    ).rejects.toBeInstanceOf(TargetBusyError);

    release?.(response(text('First')));
    await expect(first).resolves.toMatchObject({ status: 'completed' });
    await expect(
      processor.runFullTurn('Three', agentTools, [], { target }),
    ).resolves.toMatchObject({ status: 'completed' });
  });

  it('returns the completed exchanges when the model fails mid-turn', async () => {
    const model = new ScriptedModel([response(click('c1')), response(click('c2'))]);
    const failed = jest.fn();
    eventEmitter.on(TURN_FAILED_EVENT, failed);
    const processor = createProcessor(model);

    const result = await processor.runFullTurn('Click twice', agentTools, [], {
      target,
      turnId: 'turn-4',
    });

    expect(result).toMatchObject({
      status: 'failed',
      error: {
        code: 'InternalError',
        message: 'ScriptedModel ran out of responses',
      },
    });
    expect(result.exchanges.map((exchange) => exchange.index)).toEqual([0, 1]);
    expect(result.history).toHaveLength(5);
    expect(target.calls).toEqual(['click:1,2:left', 'click:1,2:left']);
    expect(failed).toHaveBeenCalledWith({
      turnId: 'turn-4',
      error: {
        code: 'InternalError',
        message: 'ScriptedModel ran out of responses',
      },
      completedExchanges: 2,
    });
  });

  it('frees the target after a failed turn', async () => {
    const processor = createProcessor(new ScriptedModel([]));

    await expect(
      processor.runFullTurn('Hi', agentTools, [], { target }),
    ).resolves.toMatchObject({ status: 'failed', exchanges: [] });
    await expect(
      processor.runFullTurn('Hi', agentTools, [], { target }),
    ).resolves.toMatchObject({ status: 'failed', exchanges: [] });
  });

  it('skips the rest of an exchange once cancelled during an action', async () => {
    const controller = new AbortController();
    target.type.mockImplementationOnce(async (value: string) => {
      target.calls.push(`type:${value}`);
      controller.abort();
    });
    const model = new ScriptedModel([
      response(
        click('c1'),
        computerCall('c2', { action: 'type', text: 'hi' }),
        click('c3'),
        computerCall('c4', { action: 'type', text: 'never' }),
      ),
    ]);

    const result = await createProcessor(model).runFullTurn(
      'Type',
      agentTools,
      [],
      { target, signal: controller.signal },
    );

    expect(result).toMatchObject({ status: 'cancelled', reason: 'interrupted' });
    expect(target.calls).toEqual(['click:1,2:left', 'type:hi']);
    expect(result.exchanges).toEqual([]);
    expect(result.history).toEqual([
      { role: Role.User, content: [text('Type')] },
    ]);
    expect(model.requests).toHaveLength(1);
  });

  it('feeds an exhausted search back to the model and keeps going', async () => {
    const model = new ScriptedModel([
      response(functionCall('c1', 'resilient_search', { query: 'cats' })),
      response(text('Every engine is down')),
    ]);
    const offline = {
      kind: 'http' as const,
      load: async () => {
        throw new Error('offline');
      },
    };

    const result = await createProcessor(
      model,
      { SEARCH_FALLBACK_ORDER: 'google,bing' },
      (settings) =>
        createSearchFunctionHandlers(
          new ResilientSearchService(settings, offline),
        ),
    ).runFullTurn('Find cats', agentTools, [], { target });

    expect(result.status).toBe('completed');
    expect(result.exchanges).toHaveLength(2);
    expect(result.exchanges[0].outcomes[0]).toMatchObject({
      kind: 'failure',
      callId: 'c1',
      toolKind: 'function',
      error: {
        code: 'SearchExhausted',
        message: 'All search engines failed for "cats"',
      },
    });
    const toolResult = result.history[2].content[0];
    expect(isToolResultContentBlock(toolResult) && toolResult.is_error).toBe(
      true,
    );
    expect(model.requests.map((request) => request.messageCount)).toEqual([
      1, 3,
    ]);
  });

  it('keeps completed exchanges apart from the returned history', async () => {
    const model = new ScriptedModel([
      response(click('c1')),
      response(text('Done')),
    ]);

    const result = await createProcessor(model).runFullTurn(
      'Click',
      agentTools,
      [],
      { target },
    );

    result.history[1].content.push(text('added later'));
    const call = result.history[1].content[0];
    if (isComputerCallContentBlock(call)) {
      call.callId = 'changed';
    }

    const [first] = result.exchanges;
    expect(first.response.contentBlocks).toEqual([click('c1')]);
    expect(first.actions.map((action) => action.callId)).toEqual(['c1']);
    expect(Object.isFrozen(first.response.contentBlocks)).toBe(true);
    expect(Object.isFrozen(first.response.contentBlocks[0])).toBe(true);
    expect(Object.isFrozen(first.outcomes[0])).toBe(true);
    expect(() => {
      first.response.contentBlocks.push(text('sneaked in'));
    }).toThrow(TypeError);
    if (result.status === 'completed') {
      expect(Object.isFrozen(result.finalResponse.contentBlocks)).toBe(true);
    }
  });

  it('extends the given history without modifying it', async () => {
    const history: Message[] = [
      { role: Role.User, content: [text('Earlier question')] },
      { role: Role.Assistant, content: [text('Earlier answer')] },
    ];
    const model = new ScriptedModel([response(text('Fine'))]);

    const result = await createProcessor(model).runFullTurn(
      '   ',
      agentTools,
      history,
      { target },
    );

    expect(history).toHaveLength(2);
    expect(result.history).toEqual([
      ...history,
      { role: Role.Assistant, content: [text('Fine')] },
    ]);
  });

  it('publishes every exchange as it completes', async () => {
    const model = new ScriptedModel([
      response(click('c1')),
      response(text('Done')),
    ]);
    const indexes: number[] = [];
    eventEmitter.on(TURN_EXCHANGE_EVENT, (event: { exchange: { index: number } }) =>
      indexes.push(event.exchange.index),
    );

    await createProcessor(model).runFullTurn('Click', agentTools, [], {
      target,
    });

    expect(indexes).toEqual([0, 1]);
  });

  it('keeps the user input as a text message', async () => {
    const model = new ScriptedModel([response(text('Ok'))]);

    const result = await createProcessor(model).runFullTurn(
      'Open mail',
      agentTools,
      [],
      { target },
    );

    expect(result.history[0]).toEqual({
      role: Role.User,
      content: [{ type: MessageContentType.Text, text: 'Open mail' }],
    });
  });
});

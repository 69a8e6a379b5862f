import { ProposedAction } from '@steerloop/shared';
import { TurnInterrupt } from '../common/errors';
import { SafetyGate } from '../safety/safety-gate.service';
import {
  FAKE_SCREENSHOT,
  FakeTarget,
  computerCall,
  createSettings,
  functionCall,
} from '../testing/fakes';
import { AgentDispatcher } from './agent.dispatcher';
import { agentTools } from './agent.tools';
import { LocalFunctionHandler, ToolDeclaration } from './agent.types';
import { ScreenshotStore } from './screenshot-store.service';

const click = computerCall('call_1', {
  action: 'click',
  coordinates: { x: 1, y: 2 },
  button: 'left',
});

const noteTool: ToolDeclaration = {
  name: 'note',
  description: 'Writes a note',
  parameters: { type: 'object', properties: {} },
};

const tools = [...agentTools, noteTool];

const capture = {
  data: FAKE_SCREENSHOT,
  mediaType: 'image/png',
  capturedAt: expect.any(String),
};

describe('AgentDispatcher', () => {
  const createDispatcher = (
    env: Record<string, string> = {},
    handlers: LocalFunctionHandler[] = [],
  ) => {
    const settings = createSettings(env);
    return new AgentDispatcher(
      settings,
      new SafetyGate(settings),
      new ScreenshotStore(settings),
      handlers,
    );
  };

  describe('computer calls', () => {
    it('executes the action and captures the result', async () => {
      const target = new FakeTarget();

      const outcome = await createDispatcher().dispatch(click, target, tools);

      expect(outcome).toEqual({
        kind: 'computer_result',
        callId: 'call_1',
        action: 'click',
        screenshot: capture,
        acknowledgedSafetyChecks: [],
      });
      expect(target.calls).toEqual(['click:1,2:left', 'screenshot']);
    });

    it('skips the capture when the policy says so', async () => {
      const target = new FakeTarget();

      const outcome = await createDispatcher({ SCREENSHOT_MODE: 'none' }).dispatch(
        click,
        target,
        tools,
      );

      expect(outcome).not.toHaveProperty('screenshot');
      expect(target.calls).toEqual(['click:1,2:left']);
    });

    it('does not capture after a wait', async () => {
      const target = new FakeTarget();

      await createDispatcher().dispatch(
        computerCall('call_1', { action: 'wait', durationMs: 10 }),
        target,
        tools,
      );

      expect(target.calls).toEqual(['wait:10']);
    });

    it('always answers an explicit screenshot action', async () => {
      const target = new FakeTarget();

      const outcome = await createDispatcher({ SCREENSHOT_MODE: 'none' }).dispatch(
        computerCall('call_1', { action: 'screenshot' }),
        target,
        tools,
      );

      expect(outcome).toMatchObject({ screenshot: capture });
      expect(target.calls).toEqual(['screenshot']);
    });

    it('reports the page the target is on', async () => {
      const target = new FakeTarget({ url: 'https://example.com/' });

      const outcome = await createDispatcher().dispatch(click, target, tools);

      expect(outcome).toMatchObject({
        kind: 'computer_result',
        currentUrl: 'https://example.com/',
      });
      expect(target.calls).toEqual([
        'click:1,2:left',
        'screenshot',
        'currentUrl',
      ]);
    });

    it('fails the action when it lands on a blocked page', async () => {
      const target = new FakeTarget({ url: 'https://maliciousbook.com/' });

      const outcome = await createDispatcher().dispatch(click, target, tools);

      expect(outcome).toEqual({
        kind: 'failure',
        callId: 'call_1',
        toolKind: 'computer',
        error: {
          code: 'SafetyBlocked',
          message:
            'The target navigated to a blocked page: https://maliciousbook.com/',
          details: {
            url: 'https://maliciousbook.com/',
            reasons: [
              {
                code: 'blocked_domain',
                message: 'Blocked URL: https://maliciousbook.com/',
              },
            ],
          },
        },
      });
    });

    it('passes acknowledged safety checks on', async () => {
      const checks = [{ id: 'sc_1', code: 'irrelevant_domain', message: 'Odd' }];

      const outcome = await createDispatcher().dispatch(
        computerCall('call_1', { action: 'screenshot' }, checks),
        new FakeTarget(),
        tools,
        undefined,
        { acknowledgedSafetyChecks: checks },
      );

      expect(outcome).toMatchObject({ acknowledgedSafetyChecks: checks });
    });

    it('refuses unsupported actions without touching the target', async () => {
      const target = new FakeTarget();

      const outcome = await createDispatcher().dispatch(
        computerCall('call_1', { action: 'unsupported', requested: 'zoom' }),
        target,
        tools,
      );

      expect(outcome).toEqual({
        kind: 'failure',
        callId: 'call_1',
        toolKind: 'computer',
        error: {
          code: 'UnroutableAction',
          message: 'Unsupported computer action "zoom"',
        },
      });
      expect(target.calls).toEqual([]);
    });

    it('turns target failures into failure outcomes', async () => {
      const target = new FakeTarget();
      target.click.mockRejectedValueOnce(new Error('offline'));

      const outcome = await createDispatcher().dispatch(click, target, tools);

      expect(outcome).toEqual({
        kind: 'failure',
        callId: 'call_1',
        toolKind: 'computer',
        error: {
          code: 'ExecutionTargetError',
          message: 'click(1, 2, left) failed: offline',
        },
      });
    });

    it('keeps the result when the follow-up capture fails', async () => {
      const target = new FakeTarget();
      target.screenshot.mockRejectedValueOnce(new Error('no display'));

      const outcome = await createDispatcher().dispatch(click, target, tools);

      expect(outcome).toEqual({
        kind: 'computer_result',
        callId: 'call_1',
        action: 'click',
        acknowledgedSafetyChecks: [],
      });
    });

    it('lets cancellation escape', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        createDispatcher().dispatch(
          click,
          new FakeTarget(),
          tools,
          controller.signal,
        ),
      ).rejects.toBeInstanceOf(TurnInterrupt);
    });
  });

  describe('function calls', () => {
    const searchHandler = (): LocalFunctionHandler & { invoke: jest.Mock } => ({
      name: 'resilient_search',
      category: 'search_function',
      invoke: jest.fn(async () => ({ status: 'success', engine: 'bing' })),
    });

    it('refuses functions that were not declared', async () => {
      const outcome = await createDispatcher().dispatch(
        functionCall('call_2', 'teleport'),
        new FakeTarget(),
        tools,
      );

      expect(outcome).toEqual({
        kind: 'failure',
        callId: 'call_2',
        toolKind: 'function',
        error: {
          code: 'UnroutableAction',
          message: 'Function "teleport" is not declared',
        },
      });
    });

    it('prefers a target function of the same name', async () => {
      const back = jest.fn(async () => 'navigated back');
      const handler: LocalFunctionHandler = {
        name: 'back',
        category: 'function',
        invoke: jest.fn(async () => 'handled locally'),
      };
      const target = new FakeTarget({ functions: { back } });

      const outcome = await createDispatcher({}, [handler]).dispatch(
        functionCall('call_2', 'back'),
        target,
        tools,
      );

      expect(outcome).toEqual({
        kind: 'function_result',
        callId: 'call_2',
        name: 'back',
        route: 'environment_function',
        result: 'navigated back',
        screenshot: capture,
      });
      expect(handler.invoke).not.toHaveBeenCalled();
    });

    it('runs local handlers with the turn context', async () => {
      const handler = searchHandler();
      const target = new FakeTarget();

      const outcome = await createDispatcher({ SCREENSHOT_MODE: 'search' }, [
        handler,
      ]).dispatch(
        functionCall('call_3', 'resilient_search', { query: 'cats' }),
        target,
        tools,
      );

      expect(handler.invoke).toHaveBeenCalledWith(
        { query: 'cats' },
        { target, signal: undefined },
      );
      expect(outcome).toEqual({
        kind: 'function_result',
        callId: 'call_3',
        name: 'resilient_search',
        route: 'local_function',
        result: { status: 'success', engine: 'bing' },
        screenshot: capture,
      });
    });

    it('answers declared functions without an implementation with a placeholder', async () => {
      const target = new FakeTarget();

      const outcome = await createDispatcher().dispatch(
        functionCall('call_4', 'note', { text: 'remember' }),
        target,
        tools,
      );

      expect(outcome).toEqual({
        kind: 'function_result',
        callId: 'call_4',
        name: 'note',
        route: 'stub_function',
        result: 'success',
      });
      expect(target.calls).toEqual([]);
    });

    it('turns handler errors into failure outcomes', async () => {
      const handler = searchHandler();
      handler.invoke.mockRejectedValueOnce(new Error('parser crashed'));

      const outcome = await createDispatcher({}, [handler]).dispatch(
        functionCall('call_5', 'resilient_search', { query: 'cats' }),
        new FakeTarget(),
        tools,
      );

      expect(outcome).toEqual({
        kind: 'failure',
        callId: 'call_5',
        toolKind: 'function',
        error: { code: 'InternalError', message: 'parser crashed' },
      });
    });
  });

  describe('resolveRoute', () => {
    it('names the route each action takes', () => {
      const dispatcher = createDispatcher();
      const target = new FakeTarget({
        functions: { goto: async () => 'navigated' },
      });

      expect(dispatcher.resolveRoute(click, target, tools).kind).toBe('builtin');
      expect(
        dispatcher.resolveRoute(functionCall('c', 'goto'), target, tools).kind,
      ).toBe('environment_function');
      expect(
        dispatcher.resolveRoute(functionCall('c', 'back'), target, tools).kind,
      ).toBe('stub_function');
    });
  });

  describe('screenshot policy across action sequences', () => {
    // Deterministic generator so a failing sequence can be replayed
    const seededRandom = (seed: number) => {
      let state = seed >>> 0;
      return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
      };
    };

    type Step = { action: ProposedAction; visual: boolean; search: boolean };

    const makeStep = (random: () => number, callId: string): Step => {
      const x = Math.floor(random() * 1280);
      const y = Math.floor(random() * 960);
      const builders: (() => Step)[] = [
        () => ({
          action: computerCall(callId, {
            action: 'click',
            coordinates: { x, y },
            button: 'left',
          }),
          visual: true,
          search: false,
        }),
        () => ({
          action: computerCall(callId, {
            action: 'double_click',
            coordinates: { x, y },
          }),
          visual: true,
          search: false,
        }),
        () => ({
          action: computerCall(callId, { action: 'move', coordinates: { x, y } }),
          visual: true,
          search: false,
        }),
        () => ({
          action: computerCall(callId, {
            action: 'drag',
            path: [
              { x, y },
              { x: y, y: x },
            ],
          }),
          visual: true,
          search: false,
        }),
        () => ({
          action: computerCall(callId, {
            action: 'scroll',
            coordinates: { x, y },
            scrollX: 0,
            scrollY: 100,
          }),
          visual: true,
          search: false,
        }),
        () => ({
          action: computerCall(callId, { action: 'keypress', keys: ['Return'] }),
          visual: true,
          search: false,
        }),
        () => ({
          action: computerCall(callId, { action: 'type', text: `t${x}` }),
          visual: true,
          search: false,
        }),
        () => ({
          action: computerCall(callId, { action: 'wait', durationMs: 1 }),
          visual: false,
          search: false,
        }),
        () => ({
          action: functionCall(callId, 'goto', { url: 'https://example.com' }),
          visual: true,
          search: false,
        }),
        () => ({
          action: functionCall(callId, 'resilient_search', { query: 'cats' }),
          visual: true,
          search: true,
        }),
        () => ({
          action: functionCall(callId, 'note'),
          visual: false,
          search: false,
        }),
      ];
      return builders[Math.floor(random() * builders.length)]();
    };

    const searchHandler: LocalFunctionHandler = {
      name: 'resilient_search',
      category: 'search_function',
      invoke: async () => ({ engine: 'bing' }),
    };

    const runSequences = async (mode: string) => {
      const random = seededRandom(20241019);
      const dispatcher = createDispatcher({ SCREENSHOT_MODE: mode }, [
        searchHandler,
      ]);
      const totals = { captures: 0, visual: 0, search: 0 };

      for (let sequence = 0; sequence < 100; sequence++) {
        const target = new FakeTarget({
          functions: { goto: async () => 'navigated' },
        });
        const length = 1 + Math.floor(random() * 8);
        for (let index = 0; index < length; index++) {
          const step = makeStep(random, `s${sequence}_${index}`);
          await dispatcher.dispatch(step.action, target, tools);
          totals.visual += step.visual ? 1 : 0;
          totals.search += step.search ? 1 : 0;
        }
        totals.captures += target.screenshot.mock.calls.length;
      }
      return totals;
    };

    it('never captures in none mode', async () => {
      const totals = await runSequences('none');

      expect(totals.visual).toBeGreaterThan(0);
      expect(totals.captures).toBe(0);
    });

    it('captures once per visually significant action in all mode', async () => {
      const totals = await runSequences('all');

      expect(totals.captures).toBe(totals.visual);
    });

    it('captures only after searches in search mode', async () => {
      const totals = await runSequences('search');

      expect(totals.search).toBeGreaterThan(0);
      expect(totals.captures).toBe(totals.search);
    });
  });
});

import { Logger } from '@nestjs/common';
import { ExecutionTargetError, SafetyBlockedError } from '../common/errors';
import { FAKE_SCREENSHOT, FakeTarget } from '../testing/fakes';
import {
  callTarget,
  captureScreenshot,
  executeComputerAction,
} from './agent.computer-use';

describe('agent.computer-use', () => {
  const logger = new Logger('ComputerUseSpec');
  const options = { timeoutMs: 1000 };
  let target: FakeTarget;

  beforeEach(() => {
    target = new FakeTarget();
  });

  describe('executeComputerAction', () => {
    it('performs pointer and keyboard actions without capturing', async () => {
      await expect(
        executeComputerAction(
          target,
          { action: 'click', coordinates: { x: 1, y: 2 }, button: 'left' },
          options,
          logger,
        ),
      ).resolves.toBeUndefined();
      await executeComputerAction(
        target,
        { action: 'keypress', keys: ['ctrl', 'c'] },
        options,
        logger,
      );
      await executeComputerAction(
        target,
        {
          action: 'drag',
          path: [
            { x: 0, y: 0 },
            { x: 9, y: 9 },
          ],
        },
        options,
        logger,
      );

      expect(target.calls).toEqual(['click:1,2:left', 'keypress:ctrl+c', 'drag:2']);
    });

    it('returns the capture of a screenshot action', async () => {
      const capture = await executeComputerAction(
        target,
        { action: 'screenshot' },
        options,
        logger,
      );

      expect(capture).toEqual({
        data: FAKE_SCREENSHOT,
        mediaType: 'image/png',
        capturedAt: expect.any(String),
      });
      expect(target.calls).toEqual(['screenshot']);
    });

    it('waits for the requested or default duration', async () => {
      await executeComputerAction(target, { action: 'wait' }, options, logger);
      await executeComputerAction(
        target,
        { action: 'wait', durationMs: 5 },
        options,
        logger,
      );

      expect(target.calls).toEqual(['wait:1000', 'wait:5']);
    });

    it('reports target failures as execution errors', async () => {
      target.click.mockRejectedValueOnce(new Error('offline'));

      const clicking = executeComputerAction(
        target,
        { action: 'click', coordinates: { x: 1, y: 2 }, button: 'left' },
        options,
        logger,
      );

      await expect(clicking).rejects.toBeInstanceOf(ExecutionTargetError);
      await expect(clicking).rejects.toThrow(
        'click(1, 2, left) failed: offline',
      );
    });
  });

  describe('callTarget', () => {
    it('times out operations that do not finish', async () => {
      await expect(
        callTarget('screenshot', () => new Promise<string>(() => undefined), {
          timeoutMs: 10,
        }),
      ).rejects.toThrow('screenshot did not finish within 10ms');
    });

    it('passes agent errors through unchanged', async () => {
      const error = new SafetyBlockedError('nope');

      await expect(
        callTarget('goto', async () => Promise.reject(error), options),
      ).rejects.toBe(error);
    });
  });

  it('stamps captures with their time', async () => {
    const capture = await captureScreenshot(target, options);

    expect(Number.isNaN(Date.parse(capture.capturedAt))).toBe(false);
  });
});

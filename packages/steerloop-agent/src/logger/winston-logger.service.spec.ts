import { LogLevel } from '../config/agent.config';
import { createWinstonLogger, toWinstonLevel } from './winston-logger.service';

describe('toWinstonLevel', () => {
  it('maps agent levels onto winston levels', () => {
    expect(toWinstonLevel(LogLevel.ERROR)).toBe('error');
    expect(toWinstonLevel(LogLevel.INFO)).toBe('info');
    expect(toWinstonLevel(LogLevel.ACTION)).toBe('verbose');
    expect(toWinstonLevel(LogLevel.DEBUG)).toBe('debug');
    expect(toWinstonLevel(LogLevel.ALL)).toBe('silly');
  });
});

describe('createWinstonLogger', () => {
  it('silences output at level NONE without touching the log directory', () => {
    const logger = createWinstonLogger({
      logLevel: LogLevel.NONE,
      logDir: '/nonexistent/steerloop-logs',
    });

    expect(logger.silent).toBe(true);
    expect(logger.transports).toHaveLength(1);
    logger.close();
  });
});

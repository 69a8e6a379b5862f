import { Inject, Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ScreenshotCapture } from '@steerloop/shared';
import { errorMessage } from '../common/errors';
import { agentConfig, AgentSettings } from '../config/agent.config';

const FILE_PATTERN = /^screenshot_.*\.png$/;

function formatTimestamp(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    `_${pad(date.getMilliseconds(), 3)}`
  );
}

/**
 * Persists captured screenshots when SCREENSHOT_SAVE is on. Consecutive
 * identical captures for the same context are written once and the oldest
 * files are pruned beyond SCREENSHOT_MAX_FILES.
 */
@Injectable()
export class ScreenshotStore {
  private readonly logger = new Logger(ScreenshotStore.name);
  private readonly lastSaved = new Map<
    string,
    { hash: string; file: string }
  >();
  private sequence = 0;

  constructor(
    @Inject(agentConfig.KEY) private readonly settings: AgentSettings,
  ) {}

  get enabled(): boolean {
    return this.settings.screenshots.save;
  }

  /**
   * Returns the file holding the capture, or null when saving is disabled
   * or failed.
   */
  async save(
    capture: ScreenshotCapture,
    context: string,
  ): Promise<string | null> {
    if (!this.enabled) {
      return null;
    }

    const { directory, maxFiles } = this.settings.screenshots;
    const hash = createHash('md5').update(capture.data).digest('hex');
    const previous = this.lastSaved.get(context);
    if (previous && previous.hash === hash) {
      this.logger.debug(
        `Screenshot skipped - identical to previous image: ${previous.file}`,
      );
      return previous.file;
    }

    const contextSlug = context.replace(/[^a-z0-9-]+/gi, '-').toLowerCase();
    this.sequence += 1;
    const file = path.join(
      directory,
      `screenshot_${formatTimestamp(new Date(capture.capturedAt))}_${String(this.sequence).padStart(6, '0')}_${contextSlug}.png`,
    );

    try {
      await fs.mkdir(directory, { recursive: true });
      await fs.writeFile(file, Buffer.from(capture.data, 'base64'));
      this.lastSaved.set(context, { hash, file });
      this.logger.debug(`Screenshot saved to ${file}`);
    } catch (error) {
      this.logger.error(`Failed to save screenshot: ${errorMessage(error)}`);
      return null;
    }

    if (maxFiles > 0) {
      await this.prune(directory, maxFiles);
    }
    return file;
  }

  private async prune(directory: string, maxFiles: number): Promise<void> {
    try {
      const screenshots = (await fs.readdir(directory))
        .filter((name) => FILE_PATTERN.test(name))
        .sort();
      const excess = screenshots.slice(
        0,
        Math.max(0, screenshots.length - maxFiles),
      );
      for (const name of excess) {
        await fs.unlink(path.join(directory, name));
        this.logger.debug(`Deleted old screenshot: ${name}`);
      }
    } catch (error) {
      this.logger.error(
        `Error during screenshot cleanup: ${errorMessage(error)}`,
      );
    }
  }
}

import { ActionCategory } from '@steerloop/shared';
import { ScreenshotMode } from '../config/agent.config';

const VISUAL_CATEGORIES: ReadonlySet<ActionCategory> = new Set<ActionCategory>([
  'pointer',
  'drag',
  'scroll',
  'keyboard',
  'environment_function',
  'search_function',
]);

/**
 * Whether a screenshot is captured after an action of the given category.
 * An explicit `screenshot` action captures on its own and is never asked.
 */
export function shouldCapture(
  category: ActionCategory,
  mode: ScreenshotMode,
): boolean {
  switch (mode) {
    case 'none':
      return false;
    case 'search':
      return category === 'search_function';
    case 'all':
      return VISUAL_CATEGORIES.has(category);
  }
}

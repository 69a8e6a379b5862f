// Value returned by a declared function that nothing implements
export const PLACEHOLDER_FUNCTION_RESULT = 'success';

// Used when the model asks for a wait without a duration
export const DEFAULT_WAIT_MS = 1000;

export const buildAgentSystemPrompt = (
  currentDate: string,
  currentTime: string,
  timeZone: string,
): string => `
You are operating a computer on behalf of the user. Each response may propose
actions; their results, including fresh screenshots, are returned to you before
your next response.

Current date: ${currentDate}. Current time: ${currentTime}. Timezone: ${timeZone}.

Guidelines:
- Look at the latest screenshot before acting. Request one when you have none.
- Prefer keyboard shortcuts for navigation when they are reliable.
- Use resilient_search for web lookups instead of typing into a search engine.
  It falls back to other engines when one is blocked.
- Use goto and back to navigate when a browser is in focus.
- When an action fails you receive an error result; adjust and continue.
- When the task is complete, reply with a short summary and propose no
  further actions.
`;

export const defaultSystemPrompt = (now: Date = new Date()): string =>
  buildAgentSystemPrompt(
    now.toLocaleDateString('en-US', {
      weekday: 'long',
      year: 'numeric',
      month: 'long',
      day: 'numeric',
    }),
    now.toLocaleTimeString('en-US'),
    Intl.DateTimeFormat().resolvedOptions().timeZone,
  );

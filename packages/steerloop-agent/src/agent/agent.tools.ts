import { ToolDeclaration } from './agent.types';

/**
 * Navigation handled by the execution target when it implements `back`
 */
export const _backTool: ToolDeclaration = {
  name: 'back',
  description: 'Navigates the focused browser back to the previous page',
  parameters: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
};

export const _gotoTool: ToolDeclaration = {
  name: 'goto',
  description: 'Opens the given URL in the focused browser',
  parameters: {
    type: 'object',
    properties: {
      url: {
        type: 'string',
        description: 'Absolute URL to open, e.g. https://example.com',
      },
    },
    required: ['url'],
    additionalProperties: false,
  },
};

/**
 * Web search that moves on to the next engine when one is blocked or fails
 */
export const _resilientSearchTool: ToolDeclaration = {
  name: 'resilient_search',
  description:
    'Searches the web, falling back across engines when a CAPTCHA or block page is hit. Returns the engine used, up to ten organic results, the featured snippet, related searches and a text excerpt of the results page.',
  parameters: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'The search query',
      },
      engine: {
        type: 'string',
        enum: ['auto', 'google', 'bing', 'duckduckgo', 'yahoo'],
        description: 'Engine to try first; auto uses the configured order',
      },
      language: {
        type: 'string',
        description: 'Two letter language code, e.g. en',
      },
      region: {
        type: 'string',
        description: 'Two letter region code, e.g. us',
      },
      safe_search: {
        type: 'boolean',
      },
      time_period: {
        type: 'string',
        enum: ['any', 'day', 'week', 'month', 'year'],
      },
      content_type: {
        type: 'string',
        enum: ['web', 'images', 'news', 'videos'],
      },
      site: {
        type: 'string',
        description: 'Restrict results to this domain',
      },
      result_count: {
        type: 'integer',
        minimum: 1,
        maximum: 100,
      },
      humanlike: {
        type: 'boolean',
        description: 'Pace attempts and vary request headers',
      },
    },
    required: ['query'],
    additionalProperties: false,
  },
};

export const _searchWeatherTool: ToolDeclaration = {
  name: 'search_weather',
  description:
    'Looks up the current weather for a location. Returns the weather summary and the top five results.',
  parameters: {
    type: 'object',
    properties: {
      location: {
        type: 'string',
        description: 'City or place name',
      },
      language: {
        type: 'string',
      },
      region: {
        type: 'string',
      },
    },
    required: ['location'],
    additionalProperties: false,
  },
};

export const _listSearchEnginesTool: ToolDeclaration = {
  name: 'list_search_engines',
  description:
    'Lists the configured search engines in fallback order with their success and failure counts',
  parameters: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
};

/**
 * Export all tools as an array
 */
export const agentTools: ToolDeclaration[] = [
  _backTool,
  _gotoTool,
  _resilientSearchTool,
  _searchWeatherTool,
  _listSearchEnginesTool,
];

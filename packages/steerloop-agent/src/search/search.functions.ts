import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { SearchResolution, SearchSuccess } from '@steerloop/shared';
import { InvalidArgumentsError, SearchExhaustedError } from '../common/errors';
import { LocalFunctionHandler } from '../agent/agent.types';
import {
  ResilientSearchArgsDto,
  WeatherSearchArgsDto,
} from './dto/search-args.dto';
import { ResilientSearchService } from './resilient-search.service';

function parseArgs<T extends object>(
  dto: ClassConstructor<T>,
  name: string,
  args: Record<string, unknown>,
): T {
  const parsed = plainToInstance(dto, args, { excludeExtraneousValues: true });
  const errors = validateSync(parsed);
  if (errors.length > 0) {
    const problems = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new InvalidArgumentsError(
      `Invalid arguments for ${name}: ${problems.join('; ')}`,
      { problems },
    );
  }
  return parsed;
}

export const MAX_ORGANIC_RESULTS = 10;
export const MAX_WEATHER_RESULTS = 5;
export const MAX_RELATED_SEARCHES = 5;

const WEATHER_TITLE = /weather|forecast|temperature/i;

function trimmed(result: SearchSuccess, organicLimit: number): SearchSuccess {
  return {
    ...result,
    organicResults: result.organicResults.slice(0, organicLimit),
    relatedSearches: result.relatedSearches.slice(0, MAX_RELATED_SEARCHES),
  };
}

/**
 * The featured snippet when there is one, otherwise the snippet of the first
 * result that looks like a forecast.
 */
export function weatherInfoFrom(result: SearchSuccess): string | null {
  if (result.featuredSnippet) {
    return result.featuredSnippet.content;
  }
  const forecast = result.organicResults.find((organic) =>
    WEATHER_TITLE.test(organic.title),
  );
  return forecast ? forecast.snippet : null;
}

function unwrap(resolution: SearchResolution): SearchSuccess {
  if (resolution.status === 'success') {
    return resolution;
  }
  throw new SearchExhaustedError(
    `All search engines failed for "${resolution.query}"`,
    {
      query: resolution.query,
      engineOrder: resolution.engineOrder,
      attempts: resolution.attempts,
    },
  );
}

/**
 * Local function handlers backed by the resilient search service.
 */
export function createSearchFunctionHandlers(
  search: ResilientSearchService,
): LocalFunctionHandler[] {
  return [
    {
      name: 'resilient_search',
      category: 'search_function',
      async invoke(args, { signal, target }) {
        const { query, ...options } = parseArgs(
          ResilientSearchArgsDto,
          'resilient_search',
          args,
        );
        const request = search.buildRequest(query, options);
        const result = unwrap(await search.resolve(request, { signal, target }));
        return trimmed(result, MAX_ORGANIC_RESULTS);
      },
    },
    {
      name: 'search_weather',
      category: 'search_function',
      async invoke(args, { signal, target }) {
        const { location, language, region } = parseArgs(
          WeatherSearchArgsDto,
          'search_weather',
          args,
        );
        const request = search.buildRequest(`weather ${location}`, {
          language,
          region,
        });
        const result = unwrap(await search.resolve(request, { signal, target }));
        return {
          ...trimmed(result, MAX_WEATHER_RESULTS),
          location,
          weatherInfo: weatherInfoFrom(result),
        };
      },
    },
    {
      name: 'list_search_engines',
      category: 'function',
      async invoke() {
        return { engines: search.listEngines() };
      },
    },
  ];
}

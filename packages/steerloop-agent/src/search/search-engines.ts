import {
  SearchAttemptStatus,
  SearchContentType,
  SearchEngineId,
  SearchRequest,
  SearchTimePeriod,
} from '@steerloop/shared';
import { BlockDetection, EmptyResultPolicy } from '../config/agent.config';

/**
 * A page as loaded by a search transport. `raw` is the markup when the
 * transport has it, otherwise the same as `text`.
 */
export interface LoadedPage {
  status?: number;
  url: string;
  title: string;
  text: string;
  raw: string;
}

export interface PageClassification {
  status: SearchAttemptStatus;
  reason?: string;
}

export interface SearchEngineStrategy {
  id: SearchEngineId;
  baseUrl: string;
  buildUrl(request: SearchRequest): string;
  noResultPhrases: readonly string[];
}

function withSite(query: string, site?: string): string {
  return site ? `${query} site:${site}` : query;
}

function setIfPresent(
  params: URLSearchParams,
  key: string,
  value: string | number | undefined,
): void {
  if (value !== undefined && value !== '') {
    params.set(key, String(value));
  }
}

const GOOGLE_TIME: Record<SearchTimePeriod, string | undefined> = {
  any: undefined,
  day: 'qdr:d',
  week: 'qdr:w',
  month: 'qdr:m',
  year: 'qdr:y',
};

const GOOGLE_CONTENT: Record<SearchContentType, string | undefined> = {
  web: undefined,
  images: 'isch',
  news: 'nws',
  videos: 'vid',
};

const google: SearchEngineStrategy = {
  id: 'google',
  baseUrl: 'https://www.google.com',
  buildUrl({ query, options }) {
    const params = new URLSearchParams();
    params.set('q', withSite(query, options.site));
    setIfPresent(params, 'hl', options.language);
    setIfPresent(params, 'gl', options.region);
    params.set('safe', options.safeSearch ? 'active' : 'off');
    setIfPresent(params, 'tbs', GOOGLE_TIME[options.timePeriod]);
    setIfPresent(params, 'num', options.resultCount);
    setIfPresent(params, 'tbm', GOOGLE_CONTENT[options.contentType]);
    return `${google.baseUrl}/search?${params.toString()}`;
  },
  noResultPhrases: ['did not match any documents'],
};

// Bing has no plain filter for the past year
const BING_TIME: Record<SearchTimePeriod, string | undefined> = {
  any: undefined,
  day: 'ex1:"ez1"',
  week: 'ex1:"ez2"',
  month: 'ex1:"ez3"',
  year: undefined,
};

const BING_PATH: Record<SearchContentType, string> = {
  web: '/search',
  images: '/images/search',
  news: '/news/search',
  videos: '/videos/search',
};

const bing: SearchEngineStrategy = {
  id: 'bing',
  baseUrl: 'https://www.bing.com',
  buildUrl({ query, options }) {
    const params = new URLSearchParams();
    params.set('q', withSite(query, options.site));
    setIfPresent(params, 'setlang', options.language);
    setIfPresent(params, 'cc', options.region);
    params.set('adlt', options.safeSearch ? 'strict' : 'off');
    setIfPresent(params, 'count', options.resultCount);
    setIfPresent(params, 'filters', BING_TIME[options.timePeriod]);
    const path = BING_PATH[options.contentType];
    return `${bing.baseUrl}${path}?${params.toString()}`;
  },
  noResultPhrases: ['there are no results for'],
};

const DUCKDUCKGO_TIME: Record<SearchTimePeriod, string | undefined> = {
  any: undefined,
  day: 'd',
  week: 'w',
  month: 'm',
  year: 'y',
};

const duckduckgo: SearchEngineStrategy = {
  id: 'duckduckgo',
  baseUrl: 'https://html.duckduckgo.com',
  buildUrl({ query, options }) {
    const params = new URLSearchParams();
    params.set('q', withSite(query, options.site));
    if (options.region) {
      params.set(
        'kl',
        `${options.region}-${options.language ?? 'en'}`.toLowerCase(),
      );
    }
    params.set('kp', options.safeSearch ? '1' : '-2');
    setIfPresent(params, 'df', DUCKDUCKGO_TIME[options.timePeriod]);
    if (options.contentType !== 'web') {
      params.set('ia', options.contentType);
    }
    return `${duckduckgo.baseUrl}/html/?${params.toString()}`;
  },
  noResultPhrases: ['no results.', 'no results found'],
};

// Yahoo only filters by day, week and month
const YAHOO_TIME: Record<SearchTimePeriod, string | undefined> = {
  any: undefined,
  day: 'd',
  week: 'w',
  month: 'm',
  year: undefined,
};

const YAHOO_ENDPOINT: Record<SearchContentType, string> = {
  web: 'https://search.yahoo.com/search',
  images: 'https://images.search.yahoo.com/search/images',
  news: 'https://news.search.yahoo.com/search',
  videos: 'https://video.search.yahoo.com/search/video',
};

const yahoo: SearchEngineStrategy = {
  id: 'yahoo',
  baseUrl: 'https://search.yahoo.com',
  buildUrl({ query, options }) {
    const params = new URLSearchParams();
    params.set('p', withSite(query, options.site));
    if (options.language) {
      params.set('vl', `lang_${options.language}`);
    }
    setIfPresent(params, 'vc', options.region);
    params.set('vm', options.safeSearch ? 'r' : 'p');
    setIfPresent(params, 'btf', YAHOO_TIME[options.timePeriod]);
    setIfPresent(params, 'n', options.resultCount);
    return `${YAHOO_ENDPOINT[options.contentType]}?${params.toString()}`;
  },
  noResultPhrases: ['we did not find results for'],
};

export const SEARCH_ENGINES: Readonly<
  Record<SearchEngineId, SearchEngineStrategy>
> = { google, bing, duckduckgo, yahoo };

export interface ClassifyOptions {
  query: string;
  // Organic results parsed from the page
  resultCount: number;
  detection: BlockDetection;
  emptyResultPolicy: EmptyResultPolicy;
}

// Attributes that carry widget and form identities on a block page
const MARKER_ATTRIBUTES =
  /\b(?:id|class|src|action|name|data-sitekey)\s*=\s*(?:"([^"]*)"|'([^']*)')/gi;

function attributeValues(markup: string): string {
  return Array.from(
    markup.matchAll(MARKER_ATTRIBUTES),
    (match) => match[1] ?? match[2],
  )
    .join('\n')
    .toLowerCase();
}

// Host and path only; the query string echoes what was searched for
function locationOf(url: string): string {
  if (!URL.canParse(url)) {
    return url.toLowerCase();
  }
  const parsed = new URL(url);
  return `${parsed.host}${parsed.pathname}`.toLowerCase();
}

function titleWithoutQuery(title: string, query: string): string {
  const lowered = title.toLowerCase();
  const needle = query.trim().toLowerCase();
  return needle ? lowered.split(needle).join(' ') : lowered;
}

/**
 * Classifies a loaded results page. Block signals win over everything else;
 * an empty result page falls back to the next engine unless the policy
 * accepts it.
 *
 * Block markers are looked up in the page location, the title and element
 * attributes only. Result titles and snippets are free text that may quote
 * a marker, so they are never searched.
 */
export function classifyPage(
  strategy: SearchEngineStrategy,
  page: LoadedPage,
  options: ClassifyOptions,
): PageClassification {
  const { detection } = options;
  if (
    page.status !== undefined &&
    detection.blockedStatuses.includes(page.status)
  ) {
    return { status: 'blocked', reason: `http_${page.status}` };
  }
  if (page.status !== undefined && page.status >= 400) {
    return { status: 'error', reason: `http_${page.status}` };
  }

  const signals = [
    locationOf(page.url),
    titleWithoutQuery(page.title, options.query),
    attributeValues(page.raw),
  ];
  const found = (markers: readonly string[]) =>
    markers.find((marker) =>
      signals.some((signal) => signal.includes(marker.toLowerCase())),
    );

  const captcha = found(detection.captchaMarkers);
  if (captcha) {
    return { status: 'blocked', reason: `captcha:${captcha}` };
  }
  const wall = found(detection.engineMarkers[strategy.id]);
  if (wall) {
    return { status: 'blocked', reason: `blocked:${wall}` };
  }

  const text = page.text.toLowerCase();
  const empty =
    options.resultCount === 0 &&
    (text.trim().length === 0 ||
      strategy.noResultPhrases.some((phrase) => text.includes(phrase)));
  if (empty && options.emptyResultPolicy === 'fallback') {
    return { status: 'error', reason: 'empty_results' };
  }
  return { status: 'success' };
}

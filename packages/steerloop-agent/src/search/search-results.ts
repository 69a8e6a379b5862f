import {
  FeaturedSnippet,
  OrganicResult,
  SearchEngineId,
} from '@steerloop/shared';
import { decodeEntities, htmlToText } from './html';

export interface ParsedResults {
  organicResults: OrganicResult[];
  featuredSnippet: FeaturedSnippet | null;
  relatedSearches: string[];
}

/**
 * Where each piece of a results page sits in an engine's markup. Link
 * patterns capture the href, then the title markup.
 */
interface ResultMarkup {
  // Global; every match starts one organic result
  result: RegExp;
  link: RegExp;
  snippet: RegExp;
  featured?: { block: RegExp; content: RegExp; link: RegExp };
  related?: { container?: RegExp; item: RegExp };
}

const ANCHOR = /<a[^>]*\bhref="([^"]+)"[^>]*>([\s\S]*?)<\/a>/;

const RESULT_MARKUP: Readonly<Record<SearchEngineId, ResultMarkup>> = {
  google: {
    result: /<div[^>]*\bclass="(?:[^"]*\s)?g(?:\s[^"]*)?"/g,
    link: /<a[^>]*\bhref="([^"]+)"[^>]*>(?:(?!<\/a>)[\s\S])*?<h3[^>]*>([\s\S]*?)<\/h3>/,
    snippet: /<div[^>]*\bclass="[^"]*\bVwiC3b\b[^"]*"[^>]*>([\s\S]*?)<\/div>/,
    featured: {
      block: /<div[^>]*\bclass="[^"]*\bxpdopen\b/,
      content: /<span[^>]*\bclass="[^"]*\bhgKElc\b[^"]*"[^>]*>([\s\S]*?)<\/span>/,
      link: /<a[^>]*\bhref="([^"]+)"[^>]*>(?:(?!<\/a>)[\s\S])*?<h3[^>]*>([\s\S]*?)<\/h3>/,
    },
    related: {
      item: /<div[^>]*\bclass="[^"]*\bs75CSd\b[^"]*"[^>]*>([\s\S]*?)<\/div>/g,
    },
  },
  bing: {
    result: /<li[^>]*\bclass="(?:[^"]*\s)?b_algo(?:\s[^"]*)?"/g,
    link: /<h2[^>]*>\s*<a[^>]*\bhref="([^"]+)"[^>]*>([\s\S]*?)<\/a>/,
    snippet: /<p[^>]*>([\s\S]*?)<\/p>/,
    featured: {
      block: /<div[^>]*\bclass="[^"]*\bb_ans\b/,
      content: /<div[^>]*\bclass="[^"]*\brwrl\b[^"]*"[^>]*>([\s\S]*?)<\/div>/,
      link: ANCHOR,
    },
    related: {
      container: /<div[^>]*\bclass="[^"]*\bb_rs\b[^"]*"[^>]*>([\s\S]*?)<\/ul>/,
      item: /<a[^>]*>([\s\S]*?)<\/a>/g,
    },
  },
  duckduckgo: {
    result: /<div[^>]*\bclass="(?:[^"]*\s)?result(?:\s[^"]*)?"/g,
    link: /<a(?=[^>]*\bclass="[^"]*\bresult__a\b)[^>]*\bhref="([^"]+)"[^>]*>([\s\S]*?)<\/a>/,
    snippet: /<a[^>]*\bclass="[^"]*\bresult__snippet\b[^"]*"[^>]*>([\s\S]*?)<\/a>/,
  },
  yahoo: {
    result: /<div[^>]*\bclass="(?:[^"]*\s)?algo(?:\s[^"]*)?"/g,
    link: /<h3[^>]*>[\s\S]*?<a[^>]*\bhref="([^"]+)"[^>]*>([\s\S]*?)<\/a>/,
    snippet: /<div[^>]*\bclass="[^"]*\bcompText\b[^"]*"[^>]*>([\s\S]*?)<\/div>/,
  },
};

function decodeComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    if (error instanceof URIError) {
      return value;
    }
    throw error;
  }
}

// Bing wraps targets as `u=a1<base64url>`
function decodeBingTarget(value: string): string | undefined {
  if (!value.startsWith('a1')) {
    return undefined;
  }
  return Buffer.from(value.slice(2), 'base64url').toString('utf8');
}

/**
 * Resolves a result link against the engine and strips the engine's click
 * tracking redirect. Anything that does not end up on http(s) is dropped.
 */
export function unwrapResultUrl(
  href: string,
  baseUrl: string,
): string | undefined {
  const decoded = decodeEntities(href);
  if (!URL.canParse(decoded, baseUrl)) {
    return undefined;
  }
  const url = new URL(decoded, baseUrl);

  let target: string | undefined = url.href;
  if (url.hostname.endsWith('google.com') && url.pathname === '/url') {
    target = url.searchParams.get('q') ?? url.searchParams.get('url') ?? undefined;
  } else if (url.hostname.endsWith('duckduckgo.com') && url.pathname === '/l/') {
    target = url.searchParams.get('uddg') ?? undefined;
  } else if (url.hostname.endsWith('bing.com') && url.pathname === '/ck/a') {
    const wrapped = url.searchParams.get('u');
    target = wrapped ? decodeBingTarget(wrapped) : undefined;
  } else if (url.hostname === 'r.search.yahoo.com') {
    const wrapped = /\/RU=([^/]+)/.exec(url.pathname);
    target = wrapped ? decodeComponent(wrapped[1]) : undefined;
  }

  if (!target || !URL.canParse(target)) {
    return undefined;
  }
  const resolved = new URL(target);
  return resolved.protocol === 'http:' || resolved.protocol === 'https:'
    ? resolved.href
    : undefined;
}

function parseFeatured(
  markup: string,
  pattern: NonNullable<ResultMarkup['featured']>,
  baseUrl: string,
): { snippet: FeaturedSnippet; start: number; end: number } | null {
  const start = markup.search(pattern.block);
  if (start < 0) {
    return null;
  }
  const content = pattern.content.exec(markup.slice(start));
  if (!content) {
    return null;
  }
  const afterContent = start + content.index + content[0].length;
  const link = pattern.link.exec(markup.slice(afterContent));
  return {
    snippet: {
      title: link ? htmlToText(link[2]) : '',
      content: htmlToText(content[1]),
      sourceUrl: (link && unwrapResultUrl(link[1], baseUrl)) ?? '',
    },
    start,
    end: link ? afterContent + link.index + link[0].length : afterContent,
  };
}

function parseOrganic(
  markup: string,
  pattern: ResultMarkup,
  baseUrl: string,
  // Markup taken by the featured snippet
  skip: { start: number; end: number } | null,
): OrganicResult[] {
  const engineHost = new URL(baseUrl).host;
  const starts = Array.from(
    markup.matchAll(pattern.result),
    (match) => match.index ?? 0,
  );
  const results: OrganicResult[] = [];

  starts.forEach((start, index) => {
    if (skip && start >= skip.start && start < skip.end) {
      return;
    }
    const block = markup.slice(start, starts[index + 1] ?? markup.length);
    const link = pattern.link.exec(block);
    if (!link) {
      return;
    }
    const url = unwrapResultUrl(link[1], baseUrl);
    const title = htmlToText(link[2]);
    // Links back into the engine are navigation, not results
    if (!url || !title || new URL(url).host === engineHost) {
      return;
    }
    const snippet = pattern.snippet.exec(block);
    results.push({
      position: results.length + 1,
      title,
      url,
      snippet: snippet ? htmlToText(snippet[1]) : '',
    });
  });

  return results;
}

function parseRelated(
  markup: string,
  pattern: NonNullable<ResultMarkup['related']>,
): string[] {
  let scope = markup;
  if (pattern.container) {
    const container = pattern.container.exec(markup);
    if (!container) {
      return [];
    }
    scope = container[1];
  }
  const searches = Array.from(scope.matchAll(pattern.item), (match) =>
    htmlToText(match[1]),
  ).filter((search) => search.length > 0);
  return [...new Set(searches)];
}

/**
 * Pulls organic results, the featured snippet and related searches out of an
 * engine's results page. Plain text pages yield nothing.
 */
export function parseResults(
  engine: SearchEngineId,
  markup: string,
  baseUrl: string,
): ParsedResults {
  const pattern = RESULT_MARKUP[engine];
  const featured = pattern.featured
    ? parseFeatured(markup, pattern.featured, baseUrl)
    : null;

  return {
    organicResults: parseOrganic(markup, pattern, baseUrl, featured),
    featuredSnippet: featured?.snippet ?? null,
    relatedSearches: pattern.related
      ? parseRelated(markup, pattern.related)
      : [],
  };
}

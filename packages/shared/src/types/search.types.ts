export type SearchEngineId = "google" | "bing" | "duckduckgo" | "yahoo";
export type SearchEnginePreference = SearchEngineId | "auto";

export type SearchTimePeriod = "any" | "day" | "week" | "month" | "year";
export type SearchContentType = "web" | "images" | "news" | "videos";

export type SearchOptions = {
  engine: SearchEnginePreference;
  language?: string;
  region?: string;
  safeSearch: boolean;
  timePeriod: SearchTimePeriod;
  contentType: SearchContentType;
  site?: string;
  resultCount?: number;
  humanlike: boolean;
};

export type SearchRequest = Readonly<{
  query: string;
  options: Readonly<SearchOptions>;
}>;

export type SearchAttemptStatus = "success" | "blocked" | "error";

export type SearchAttempt = {
  engine: SearchEngineId;
  // 1-based position in the engine order
  ordinal: number;
  // Retry index within the same engine, 0 for the first try
  retry: number;
  status: SearchAttemptStatus;
  url: string;
  elapsedMs: number;
  reason?: string;
};

export type OrganicResult = {
  // 1-based rank on the results page
  position: number;
  title: string;
  url: string;
  snippet: string;
};

export type FeaturedSnippet = {
  title: string;
  content: string;
  sourceUrl: string;
};

export type SearchSuccess = {
  status: "success";
  query: string;
  engine: SearchEngineId;
  url: string;
  pageTitle: string;
  excerpt: string;
  organicResults: OrganicResult[];
  featuredSnippet: FeaturedSnippet | null;
  relatedSearches: string[];
  attempts: SearchAttempt[];
};

export type SearchExhausted = {
  status: "exhausted";
  query: string;
  engineOrder: SearchEngineId[];
  attempts: SearchAttempt[];
};

export type SearchResolution = SearchSuccess | SearchExhausted;

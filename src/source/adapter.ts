/**
 * One tracked listings page. Identity is the URL.
 */
export interface TrackedSource {
  url: string;
  hashtag: string | null;
  title: string | null;
}

/**
 * Database row shape for the sources table.
 */
export interface SourceRow {
  url: string;
  hashtag: string | null;
  title: string | null;
  is_active: number;
  created_at: string;
  last_scanned_at: string | null;
  last_status: string | null;
}

/**
 * Listing card as read from a results page, before classification.
 */
export interface RawItem {
  id: string;
  url: string;
  title: string;
  postedText: string;
  price?: string;
  location?: string;
  image?: string;
  /** Filled from the listing's own page when detail pages are enabled. */
  description?: string;
  tags?: string[];
  category?: string;
}

/** What a listing's own page adds to its card. */
export interface ListingDetails {
  description?: string;
  tags: string[];
  category?: string;
  image?: string;
}

export interface FetchOptions {
  /** Stop paging once this many cards are collected. */
  maxItems: number;
  maxPages: number;
  signal?: AbortSignal;
}

/**
 * Turns a tracked page into its listing cards, newest first.
 * Throws FetchTimeoutError, FetchEmptyError or FetchError.
 */
export interface PageFetcher {
  fetch(source: TrackedSource, options: FetchOptions): Promise<RawItem[]>;
  /** Read one listing's page. Fetchers without detail support leave it out. */
  fetchDetails?(url: string, signal?: AbortSignal): Promise<ListingDetails>;
}

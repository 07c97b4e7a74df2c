import { AxiosInstance } from "axios";
import { withRetry, getErrorMessage, getErrorStatus } from "./core/utils";

export interface FetchedPage {
  url: string;
  html: string;
}

/** Record for a URL that failed to fetch */
export interface FetchError {
  url: string;
  status_code: number | null;
  error_message: string;
}

/** Result of fetching a single page: discriminated union */
export type FetchResult =
  | { success: true; page: FetchedPage }
  | { success: false; error: FetchError };

/** Anything that can turn a URL into HTML. Never throws; failures are values. */
export interface PageFetcher {
  fetch(url: string): Promise<FetchResult>;
}

/**
 * Fetch pages through a configured axios instance.
 * Retries once on failure before recording an error.
 */
export function createHttpFetcher(
  http: AxiosInstance,
  retryDelayMs = 1000
): PageFetcher {
  return {
    async fetch(url: string): Promise<FetchResult> {
      try {
        const response = await withRetry(
          () => http.get<string>(url, { responseType: "text" }),
          retryDelayMs
        );
        return { success: true, page: { url, html: response.data } };
      } catch (err) {
        return {
          success: false,
          error: {
            url,
            status_code: getErrorStatus(err),
            error_message: getErrorMessage(err),
          },
        };
      }
    },
  };
}

/**
 * Serve pages from memory. URLs missing from `pages` fail with a 404.
 * Every requested URL is appended to `requested`, in order.
 */
export function createStaticFetcher(
  pages: Record<string, string>
): PageFetcher & { requested: string[] } {
  const requested: string[] = [];
  return {
    requested,
    async fetch(url: string): Promise<FetchResult> {
      requested.push(url);
      const html = pages[url];
      if (html === undefined) {
        return {
          success: false,
          error: { url, status_code: 404, error_message: "HTTP 404: Not Found" },
        };
      }
      return { success: true, page: { url, html } };
    },
  };
}

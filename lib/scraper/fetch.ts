import { getConfig } from "@/lib/config";
import { FetchFailureError, errorMessage } from "@/lib/errors";

export type FetchOptions = {
  timeoutMs?: number;
  userAgent?: string;
};

/**
 * GET a job page and return its markup. Single attempt; any network error,
 * timeout or non-2xx status becomes a FetchFailureError.
 */
export async function fetchPage(url: string, opts: FetchOptions = {}): Promise<string> {
  const { scraper } = getConfig();
  const timeoutMs = opts.timeoutMs ?? scraper.timeoutMs;

  let res: Response;
  try {
    res = await fetch(url, {
      headers: {
        "User-Agent": opts.userAgent ?? scraper.userAgent,
        Accept: "text/html,application/xhtml+xml,*/*;q=0.8",
      },
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw new FetchFailureError(url, `Failed to fetch page: ${errorMessage(err)}`);
  }

  if (!res.ok) {
    throw new FetchFailureError(
      url,
      `Failed to fetch page: HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ""}`,
      res.status
    );
  }
  return res.text();
}

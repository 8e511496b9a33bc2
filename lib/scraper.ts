import type { AtsPlatform, JobScrapeRecord } from "@/lib/db/types";
import { createTrace } from "@/lib/debug";
import { errorMessage } from "@/lib/errors";
import { identifyMatchingOpportunities, isRemoteJob, parseJobRequirements } from "@/lib/requirements/parser";
import { extractJobContent, type ExtractedContent } from "@/lib/scraper/extract";
import { fetchPage, type FetchOptions } from "@/lib/scraper/fetch";
import { detectAtsPlatform, selectorProfileFor } from "@/lib/scraper/platform";

export const SCRAPER_VERSION = "1.0.0";

/** Columns of the job posting row, as opposed to the JSON record. */
export type ScrapedJobFields = {
  job_title: string;
  company_name: string;
  location: string;
  remote_allowed: boolean;
};

export type ScrapeDebug = {
  platform?: AtsPlatform;
  htmlLength?: number;
  blockedHint?: string | null;
  /** Trace of the run (also printed to the server console) */
  debugMessages: string[];
};

export type ScrapeOutcome =
  | { success: true; fields: ScrapedJobFields; record: JobScrapeRecord; debug: ScrapeDebug }
  | { success: false; error: string; record: JobScrapeRecord; debug: ScrapeDebug };

/** Caller-supplied text used instead of fetching the page. */
export type ManualJobInput = {
  description: string;
  job_title?: string;
  company_name?: string;
  location?: string;
};

export type ScrapeOptions = {
  manual?: ManualJobInput;
  fetch?: FetchOptions;
};

export function detectBlocked(content: string): string | null {
  const lower = content.toLowerCase();
  if (lower.includes("access denied") || lower.includes("request blocked")) return "access_denied";
  if (lower.includes("captcha") || lower.includes("are you human")) return "captcha";
  return null;
}

function buildRecord(url: string, platform: AtsPlatform, content: ExtractedContent): {
  fields: ScrapedJobFields;
  record: JobScrapeRecord;
} {
  const parsed = parseJobRequirements(content.description_text);
  const now = new Date().toISOString();
  return {
    fields: {
      job_title: content.job_title,
      company_name: content.company_name,
      location: content.location,
      remote_allowed: isRemoteJob(content.description_text),
    },
    record: {
      scraped_content: {
        full_description: content.description_text,
        description_html: content.description_html,
        company_info: content.company_description,
        benefits: content.benefits,
        original_url: url,
        ats_platform: platform,
      },
      parsed_requirements: parsed,
      matching_opportunities: identifyMatchingOpportunities(parsed),
      scraping_metadata: { success: true, scraped_at: now, scraper_version: SCRAPER_VERSION },
    },
  };
}

/** Manual-override path: parse caller-supplied description text, no network access. */
export function buildRecordFromDescription(url: string, manual: ManualJobInput) {
  return buildRecord(url, "generic", {
    job_title: manual.job_title?.trim() || "Unknown Position",
    company_name: manual.company_name?.trim() || "Unknown Company",
    location: manual.location?.trim() ?? "",
    description_text: manual.description.trim(),
    description_html: "",
    benefits: "",
    company_description: "",
  });
}

export function failedRecord(error: string): JobScrapeRecord {
  return {
    scraping_metadata: { success: false, scraped_at: new Date().toISOString(), error },
  };
}

/**
 * Fetch → detect platform → extract fields → parse requirements.
 * Only a fetch failure makes the outcome unsuccessful; every extraction step
 * degrades to empty values instead.
 */
export async function scrapeJobFromUrl(url: string, opts: ScrapeOptions = {}): Promise<ScrapeOutcome> {
  const { messages, log } = createTrace("scraper");
  const debug: ScrapeDebug = { debugMessages: messages };

  if (opts.manual) {
    log(`Using manual description for ${url} (${opts.manual.description.length} chars)`);
    return { success: true, ...buildRecordFromDescription(url, opts.manual), debug };
  }

  log(`Starting scrape: ${url}`);
  let html: string;
  try {
    html = await fetchPage(url, opts.fetch);
  } catch (err) {
    const message = errorMessage(err);
    log(`Error: ${message}`);
    return { success: false, error: message, record: failedRecord(message), debug };
  }

  debug.htmlLength = html.length;
  debug.blockedHint = detectBlocked(html);
  if (debug.blockedHint) log(`Blocked hint: ${debug.blockedHint}`);

  const platform = detectAtsPlatform(url, html);
  debug.platform = platform;
  log(`Platform: ${platform}`);

  const content = extractJobContent(html, selectorProfileFor(platform));
  log(`Title: ${content.job_title} | Company: ${content.company_name} | Description: ${content.description_text.length} chars`);
  if (!content.description_text) log("No description found; requirements will be empty");

  const built = buildRecord(url, platform, content);
  const reqs = built.record.parsed_requirements;
  if (reqs) {
    log(`Skills: ${reqs.required_skills.length} required, ${reqs.preferred_skills.length} preferred`);
  }
  return { success: true, ...built, debug };
}

import { z } from "zod";
import { getConfig } from "@/lib/config";
import { logError, logInfo, logWarning } from "@/lib/debug";
import { getJobPostingById, getJobPostingByUrl, getOrCreateJobPosting, updateJobPosting } from "@/lib/db/job-postings";
import { getOrCreateSavedJob } from "@/lib/db/saved-jobs";
import type { AiJobAnalysis, JobPosting, NewJobPosting, SavedJob } from "@/lib/db/types";
import { errorMessage } from "@/lib/errors";
import {
  buildRecordFromDescription,
  scrapeJobFromUrl,
  type ManualJobInput,
  type ScrapeDebug,
  type ScrapeOutcome,
} from "@/lib/scraper";

const MAX_URL_LENGTH = 2048;
const MAX_DESCRIPTION_LENGTH = 100_000;

export const FAILED_COMPANY_NAME = "Scraping Failed";
export const FAILED_JOB_TITLE = "Could Not Parse";

function isValidHttpUrl(s: string): boolean {
  try {
    const u = new URL(s);
    return u.protocol === "http:" || u.protocol === "https:";
  } catch {
    return false;
  }
}

function checkUrl(raw: string): { url?: string; error?: string } {
  const url = raw.trim();
  if (!url) return { error: "Enter a job posting URL." };
  if (url.length > MAX_URL_LENGTH) return { error: "The URL is too long." };
  if (!isValidHttpUrl(url)) {
    return { error: `Invalid URL: ${url.slice(0, 50)}${url.length > 50 ? "…" : ""}` };
  }
  return { url };
}

function checkManual(manual: ManualJobInput | undefined): string | null {
  if (!manual) return null;
  if (!manual.description.trim()) return "The job description is empty.";
  if (manual.description.length > MAX_DESCRIPTION_LENGTH) return "The job description is too long.";
  return null;
}

/** Row for a scrape outcome; failed scrapes are stored too, clearly marked. */
export function postingFromOutcome(url: string, outcome: ScrapeOutcome, addedBy: string | null): NewJobPosting {
  if (!outcome.success) {
    return {
      url,
      company_name: FAILED_COMPANY_NAME,
      job_title: FAILED_JOB_TITLE,
      location: "",
      remote_allowed: false,
      scraping_success: false,
      scraping_error: outcome.error,
      raw_json: outcome.record,
      added_by: addedBy,
    };
  }
  return {
    url,
    ...outcome.fields,
    scraping_success: true,
    scraping_error: "",
    raw_json: outcome.record,
    added_by: addedBy,
  };
}

/** Scrape without storing anything. */
export async function scrapeJob(
  rawUrl: string,
  manual?: ManualJobInput
): Promise<{ error?: string; result?: ScrapeOutcome }> {
  const { url, error } = checkUrl(rawUrl);
  if (!url) return { error };
  const manualError = checkManual(manual);
  if (manualError) return { error: manualError };

  const { timeoutMs, userAgent } = getConfig().scraper;
  const result = await scrapeJobFromUrl(url, { manual, fetch: { timeoutMs, userAgent } });
  return { result };
}

export type SaveJobResult = {
  posting: JobPosting;
  savedJob: SavedJob;
  /** true when this call stored a new posting */
  created: boolean;
  debug?: ScrapeDebug;
};

/**
 * Save a posting to the user's list. Only new URLs are scraped. A URL that is
 * already stored is reused; when that stored posting is a failed scrape and a
 * description is supplied, the description is parsed into it.
 */
export async function saveJobFromUrl(
  userId: string,
  rawUrl: string,
  manual?: ManualJobInput
): Promise<{ error?: string; result?: SaveJobResult }> {
  const { url, error } = checkUrl(rawUrl);
  if (!url) return { error };
  const manualError = checkManual(manual);
  if (manualError) return { error: manualError };

  try {
    const existing = await getJobPostingByUrl(url);
    if (existing) {
      const posting = manual && !existing.scraping_success ? await reparsePosting(existing, manual) : existing;
      const { savedJob } = await getOrCreateSavedJob(userId, posting.id);
      return { result: { posting, savedJob, created: false } };
    }

    const { timeoutMs, userAgent } = getConfig().scraper;
    const outcome = await scrapeJobFromUrl(url, { manual, fetch: { timeoutMs, userAgent } });
    if (!outcome.success) logWarning(`Storing ${url} as a failed scrape: ${outcome.error}`);
    const { posting, created } = await getOrCreateJobPosting(postingFromOutcome(url, outcome, userId));
    const { savedJob } = await getOrCreateSavedJob(userId, posting.id);
    logInfo(`Saved job ${posting.id} for user ${userId} (${created ? "new" : "existing"} posting, success=${outcome.success})`);

    return { result: { posting, savedJob, created, debug: outcome.debug } };
  } catch (err) {
    logError("saveJobFromUrl failed:", err);
    return { error: errorMessage(err) };
  }
}

async function reparsePosting(posting: JobPosting, manual: ManualJobInput): Promise<JobPosting> {
  const known = posting.scraping_success;
  const { fields, record } = buildRecordFromDescription(posting.url, {
    description: manual.description,
    job_title: manual.job_title ?? (known ? posting.job_title : undefined),
    company_name: manual.company_name ?? (known ? posting.company_name : undefined),
    location: manual.location ?? (known ? posting.location : undefined),
  });
  if (posting.raw_json.ai_analysis) record.ai_analysis = posting.raw_json.ai_analysis;

  return updateJobPosting(posting.id, {
    ...fields,
    scraping_success: true,
    scraping_error: "",
    raw_json: record,
  });
}

/**
 * Replace a posting's parsed content with a description the user pasted in,
 * e.g. after the page could not be scraped. Caller-supplied AI analysis is kept.
 */
export async function reparseJob(
  jobPostingId: string,
  manual: ManualJobInput
): Promise<{ error?: string; result?: JobPosting }> {
  const manualError = checkManual(manual);
  if (manualError) return { error: manualError };

  try {
    const posting = await getJobPostingById(jobPostingId);
    if (!posting) return { error: "Job posting not found." };
    return { result: await reparsePosting(posting, manual) };
  } catch (err) {
    logError("reparseJob failed:", err);
    return { error: errorMessage(err) };
  }
}

const aiAnalysisSchema = z
  .object({
    required_skills: z.array(z.string()).optional(),
    preferred_skills: z.array(z.string()).optional(),
    technologies_mentioned: z.array(z.string()).optional(),
    resume_keywords: z.array(z.string()).optional(),
    experience_years: z.string().optional(),
  })
  .passthrough();

/** Attach an externally produced analysis; the matcher prefers it over parsed skills. */
export async function setJobAiAnalysis(
  jobPostingId: string,
  analysis: unknown
): Promise<{ error?: string; result?: JobPosting }> {
  const parsed = aiAnalysisSchema.safeParse(analysis);
  if (!parsed.success) {
    return { error: `Invalid analysis: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}` };
  }
  const aiAnalysis: AiJobAnalysis = parsed.data;

  try {
    const posting = await getJobPostingById(jobPostingId);
    if (!posting) return { error: "Job posting not found." };
    const result = await updateJobPosting(posting.id, {
      raw_json: { ...posting.raw_json, ai_analysis: aiAnalysis },
    });
    return { result };
  } catch (err) {
    logError("setJobAiAnalysis failed:", err);
    return { error: errorMessage(err) };
  }
}

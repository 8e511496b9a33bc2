import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { reparseJob, saveJobFromUrl, scrapeJob, setJobAiAnalysis } from "@/app/actions/jobs";
import { getJobPostingById, getJobPostingByUrl, getOrCreateJobPosting, updateJobPosting } from "@/lib/db/job-postings";
import { getOrCreateSavedJob } from "@/lib/db/saved-jobs";
import type { JobPosting, SavedJob } from "@/lib/db/types";

vi.mock("@/lib/db/job-postings", () => ({
  getJobPostingByUrl: vi.fn(),
  getJobPostingById: vi.fn(),
  getOrCreateJobPosting: vi.fn(),
  updateJobPosting: vi.fn(),
}));
vi.mock("@/lib/db/saved-jobs", () => ({
  getOrCreateSavedJob: vi.fn(),
}));

const JOB_URL = "https://acme.example/careers/42";
const SCRAPED_AT = "2026-02-01T00:00:00.000Z";

function posting(overrides: Partial<JobPosting> = {}): JobPosting {
  return {
    id: "jp-1",
    url: JOB_URL,
    company_name: "Acme",
    job_title: "Data Engineer",
    location: "Berlin",
    remote_allowed: false,
    scraping_success: true,
    scraping_error: "",
    raw_json: { scraping_metadata: { success: true, scraped_at: SCRAPED_AT } },
    added_by: "user-1",
    scraped_at: SCRAPED_AT,
    ...overrides,
  };
}

const savedJob: SavedJob = {
  id: "sj-1",
  user_id: "user-1",
  job_posting_id: "jp-1",
  status: "saved",
  notes: "",
  created_at: SCRAPED_AT,
};

beforeEach(() => {
  vi.mocked(getOrCreateSavedJob).mockResolvedValue({ savedJob, created: true });
  vi.mocked(getOrCreateJobPosting).mockImplementation(async (row) => ({
    posting: { ...row, id: "jp-1", scraped_at: SCRAPED_AT },
    created: true,
  }));
  vi.mocked(updateJobPosting).mockImplementation(async (id, patch) => ({ ...posting(), ...patch, id }));
});

afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllGlobals();
});

describe("scrapeJob", () => {
  it("rejects URLs that are not http(s)", async () => {
    expect(await scrapeJob("ftp://acme.example/job")).toEqual({ error: "Invalid URL: ftp://acme.example/job" });
    expect(await scrapeJob("   ")).toEqual({ error: "Enter a job posting URL." });
  });
});

describe("saveJobFromUrl", () => {
  it("reuses a stored posting without scraping again", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    vi.mocked(getJobPostingByUrl).mockResolvedValue(posting());

    const { error, result } = await saveJobFromUrl("user-1", ` ${JOB_URL} `);
    expect(error).toBeUndefined();
    expect(result?.created).toBe(false);
    expect(result?.posting.id).toBe("jp-1");
    expect(fetchMock).not.toHaveBeenCalled();
    expect(getOrCreateJobPosting).not.toHaveBeenCalled();
    expect(getOrCreateSavedJob).toHaveBeenCalledWith("user-1", "jp-1");
  });

  it("parses a supplied description into a stored failed scrape", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    vi.mocked(getJobPostingByUrl).mockResolvedValue(
      posting({ company_name: "Scraping Failed", job_title: "Could Not Parse", scraping_success: false })
    );

    const { result } = await saveJobFromUrl("user-1", JOB_URL, { description: "Must know Kafka.", job_title: "Data Engineer" });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(updateJobPosting).toHaveBeenCalledWith(
      "jp-1",
      expect.objectContaining({ job_title: "Data Engineer", company_name: "Unknown Company", scraping_success: true })
    );
    expect(result?.created).toBe(false);
    expect(result?.posting.raw_json.parsed_requirements?.required_skills).toEqual(["kafka"]);
    expect(getOrCreateSavedJob).toHaveBeenCalledWith("user-1", "jp-1");
  });

  it("leaves a successfully scraped posting alone", async () => {
    vi.mocked(getJobPostingByUrl).mockResolvedValue(posting());
    const { result } = await saveJobFromUrl("user-1", JOB_URL, { description: "Must know Kafka." });
    expect(updateJobPosting).not.toHaveBeenCalled();
    expect(result?.posting.job_title).toBe("Data Engineer");
  });

  it("stores a failure-marked posting when the page cannot be fetched", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("", { status: 503, statusText: "Service Unavailable" })));
    vi.mocked(getJobPostingByUrl).mockResolvedValue(null);

    const { result } = await saveJobFromUrl("user-1", JOB_URL);
    expect(getOrCreateJobPosting).toHaveBeenCalledWith(
      expect.objectContaining({
        url: JOB_URL,
        company_name: "Scraping Failed",
        job_title: "Could Not Parse",
        scraping_success: false,
        scraping_error: "Failed to fetch page: HTTP 503 Service Unavailable",
        added_by: "user-1",
      })
    );
    expect(result?.created).toBe(true);
    expect(result?.posting.raw_json.scraping_metadata.success).toBe(false);
  });

  it("stores the parsed posting on success", async () => {
    const html = '<h1>Platform Engineer</h1><div class="description"><p>Docker experience is required.</p></div>';
    vi.stubGlobal("fetch", vi.fn(async () => new Response(html, { status: 200 })));
    vi.mocked(getJobPostingByUrl).mockResolvedValue(null);

    const { result } = await saveJobFromUrl("user-1", JOB_URL);
    expect(result?.posting).toMatchObject({ job_title: "Platform Engineer", scraping_success: true, scraping_error: "" });
    expect(result?.posting.raw_json.parsed_requirements?.required_skills).toEqual(["docker"]);
  });

  it("turns storage errors into an error result", async () => {
    vi.mocked(getJobPostingByUrl).mockRejectedValue(new Error("connection refused"));
    expect(await saveJobFromUrl("user-1", JOB_URL)).toEqual({ error: "connection refused" });
  });
});

describe("reparseJob", () => {
  it("replaces a failed scrape with the pasted description", async () => {
    vi.mocked(getJobPostingById).mockResolvedValue(
      posting({ company_name: "Scraping Failed", job_title: "Could Not Parse", scraping_success: false })
    );

    const { result } = await reparseJob("jp-1", {
      description: "Must know Kafka. Remote friendly.",
      job_title: "Data Engineer",
    });
    expect(updateJobPosting).toHaveBeenCalledWith(
      "jp-1",
      expect.objectContaining({
        job_title: "Data Engineer",
        company_name: "Unknown Company",
        remote_allowed: true,
        scraping_success: true,
        scraping_error: "",
      })
    );
    expect(result?.raw_json.parsed_requirements?.required_skills).toEqual(["kafka"]);
  });

  it("keeps a supplied AI analysis", async () => {
    vi.mocked(getJobPostingById).mockResolvedValue(
      posting({
        raw_json: {
          scraping_metadata: { success: true, scraped_at: SCRAPED_AT },
          ai_analysis: { required_skills: ["Go"] },
        },
      })
    );

    const { result } = await reparseJob("jp-1", { description: "Go services." });
    expect(result?.raw_json.ai_analysis).toEqual({ required_skills: ["Go"] });
    expect(result?.job_title).toBe("Data Engineer");
  });

  it("rejects an empty description", async () => {
    expect(await reparseJob("jp-1", { description: "  " })).toEqual({ error: "The job description is empty." });
  });
});

describe("setJobAiAnalysis", () => {
  it("validates the analysis shape", async () => {
    expect(await setJobAiAnalysis("jp-1", { required_skills: "python" })).toEqual({
      error: "Invalid analysis: required_skills: Expected array, received string",
    });
  });

  it("stores the analysis on the record", async () => {
    vi.mocked(getJobPostingById).mockResolvedValue(posting());
    const { result } = await setJobAiAnalysis("jp-1", { required_skills: ["Python"], seniority: "senior" });
    expect(result?.raw_json.ai_analysis).toEqual({ required_skills: ["Python"], seniority: "senior" });
  });
});

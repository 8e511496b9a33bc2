import { afterEach, describe, expect, it, vi } from "vitest";
import { detectBlocked, scrapeJobFromUrl, SCRAPER_VERSION } from "@/lib/scraper";

const JOB_URL = "https://boards.greenhouse.io/acme/jobs/1";

const JOB_HTML = `
<html>
  <head><title>Data Engineer - Acme</title></head>
  <body>
    <h1 class="app-title">Data Engineer</h1>
    <div class="company-name">Acme</div>
    <div class="location">Remote - US</div>
    <div id="content">
      <h3>Requirements</h3>
      <ul>
        <li>5+ years of experience with Python and Django</li>
        <li>Hands-on work with AWS and Docker is required</li>
        <li>Familiarity with Kubernetes is a plus</li>
      </ul>
      <p>Bachelor's degree in Computer Science</p>
      <p>This role is fully remote.</p>
    </div>
  </body>
</html>`;

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("scrapeJobFromUrl", () => {
  it("turns a job page into a structured record", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(JOB_HTML, { status: 200 })));

    const outcome = await scrapeJobFromUrl(JOB_URL);
    expect(outcome.success).toBe(true);
    if (!outcome.success) return;

    expect(outcome.fields).toEqual({
      job_title: "Data Engineer",
      company_name: "Acme",
      location: "Remote - US",
      remote_allowed: true,
    });
    expect(outcome.debug.platform).toBe("greenhouse");

    const { scraped_content, parsed_requirements, matching_opportunities, scraping_metadata } = outcome.record;
    expect(scraped_content?.ats_platform).toBe("greenhouse");
    expect(scraped_content?.original_url).toBe(JOB_URL);
    expect(parsed_requirements?.required_skills).toEqual(["python", "django", "aws", "docker"]);
    expect(parsed_requirements?.preferred_skills).toEqual(["kubernetes"]);
    expect(parsed_requirements?.experience_years).toBe("5+ years");
    expect(parsed_requirements?.education.toLowerCase()).toBe("bachelor's degree");
    expect(parsed_requirements?.specific_requirements).toEqual([
      "5+ years of experience with Python and Django",
      "Hands-on work with AWS and Docker is required",
      "Familiarity with Kubernetes is a plus",
    ]);
    expect(matching_opportunities).toEqual({
      key_technologies: ["python", "django", "aws", "docker"],
      leadership_emphasis: false,
      scale_requirements: false,
    });
    expect(scraping_metadata.success).toBe(true);
    expect(scraping_metadata.scraper_version).toBe(SCRAPER_VERSION);
  });

  it("extracts an ordinary careers page that mentions ATS names in its prose", async () => {
    const html = `
      <html><body>
        <h1>Backend Engineer</h1>
        <div class="company">Acme</div>
        <div class="location">Berlin</div>
        <div class="description"><p>You will leverage Python and Docker across the workday.</p></div>
      </body></html>`;
    vi.stubGlobal("fetch", vi.fn(async () => new Response(html, { status: 200 })));

    const outcome = await scrapeJobFromUrl("https://acme.example/careers/1");
    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.debug.platform).toBe("generic");
    expect(outcome.fields).toMatchObject({ job_title: "Backend Engineer", company_name: "Acme", location: "Berlin" });
    expect(outcome.record.scraped_content?.full_description).toBe("You will leverage Python and Docker across the workday.");
    expect(outcome.record.parsed_requirements?.required_skills).toEqual(expect.arrayContaining(["python", "docker"]));
  });

  it("falls back to generic selectors when the platform's own are missing", async () => {
    const html = '<h1>Support Lead</h1><div class="description"><p>Zendesk and SQL every day.</p></div>';
    vi.stubGlobal("fetch", vi.fn(async () => new Response(html, { status: 200 })));

    const outcome = await scrapeJobFromUrl("https://jobs.lever.co/acme/42");
    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.debug.platform).toBe("lever");
    expect(outcome.record.scraped_content?.full_description).toBe("Zendesk and SQL every day.");
  });

  it("reports a fetch failure with a failure-marked record", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    const outcome = await scrapeJobFromUrl(JOB_URL);
    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error).toBe("Failed to fetch page: fetch failed");
    expect(outcome.record.scraping_metadata).toMatchObject({ success: false, error: "Failed to fetch page: fetch failed" });
    expect(outcome.record.parsed_requirements).toBeUndefined();
  });

  it("parses a manual description without fetching", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    const outcome = await scrapeJobFromUrl(JOB_URL, { manual: { description: "Must have SQL experience." } });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.fields.job_title).toBe("Unknown Position");
    expect(outcome.fields.company_name).toBe("Unknown Company");
    expect(outcome.record.scraped_content?.ats_platform).toBe("generic");
    expect(outcome.record.parsed_requirements?.required_skills).toEqual(["sql"]);
  });
});

describe("detectBlocked", () => {
  it("spots bot walls", () => {
    expect(detectBlocked("<h1>Access Denied</h1>")).toBe("access_denied");
    expect(detectBlocked("Please complete the CAPTCHA")).toBe("captcha");
    expect(detectBlocked("<h1>Engineer</h1>")).toBeNull();
  });
});

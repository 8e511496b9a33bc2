import { afterEach, describe, expect, it, vi } from "vitest";
import { addSkill, getSkillSuggestions, getStorySuggestions, matchJobForUser } from "@/app/actions/skills";
import { getJobPostingById } from "@/lib/db/job-postings";
import { createUserSkill, listUserSkills } from "@/lib/db/skills";
import type { JobPosting, UserSkill } from "@/lib/db/types";
import { DuplicateSkillError } from "@/lib/errors";

vi.mock("@/lib/db/job-postings", () => ({
  getJobPostingById: vi.fn(),
}));
vi.mock("@/lib/db/skills", () => ({
  createUserSkill: vi.fn(),
  listUserSkills: vi.fn(),
}));

const SCRAPED_AT = "2026-02-01T00:00:00.000Z";

const python: UserSkill = {
  id: "sk-1",
  user_id: "user-1",
  title: "Python",
  category: "Programming",
  skill_type: "Technical",
  skill_level: null,
  years_experience: null,
  details: {},
};

function posting(overrides: Partial<JobPosting> = {}): JobPosting {
  return {
    id: "jp-1",
    url: "https://acme.example/careers/42",
    company_name: "Acme",
    job_title: "Data Engineer",
    location: "",
    remote_allowed: false,
    scraping_success: true,
    scraping_error: "",
    raw_json: {
      parsed_requirements: {
        required_skills: ["python", "sql"],
        preferred_skills: ["docker"],
        experience_years: "",
        education: "",
        specific_requirements: [],
      },
      scraping_metadata: { success: true, scraped_at: SCRAPED_AT },
    },
    added_by: "user-1",
    scraped_at: SCRAPED_AT,
    ...overrides,
  };
}

afterEach(() => {
  vi.clearAllMocks();
});

describe("addSkill", () => {
  it("fills in category and type from the title", async () => {
    vi.mocked(createUserSkill).mockResolvedValue({ skill: python, created: true });

    const { error, result } = await addSkill("user-1", { title: " Python ", alternates: ["py"] });
    expect(error).toBeUndefined();
    expect(result?.created).toBe(true);
    expect(createUserSkill).toHaveBeenCalledWith(
      {
        user_id: "user-1",
        title: "Python",
        category: "Programming",
        skill_type: "Technical",
        skill_level: null,
        years_experience: null,
        details: { alternates: ["py"] },
      },
      "fail"
    );
  });

  it("rejects a blank title", async () => {
    expect(await addSkill("user-1", { title: "   " })).toEqual({ error: "Skill title is required" });
    expect(createUserSkill).not.toHaveBeenCalled();
  });

  it("reports a duplicate title", async () => {
    vi.mocked(createUserSkill).mockRejectedValue(new DuplicateSkillError("Python"));
    expect(await addSkill("user-1", { title: "python" })).toEqual({ error: 'Skill "Python" already exists' });
  });

  it("passes the merge mode through", async () => {
    vi.mocked(createUserSkill).mockResolvedValue({ skill: python, created: false });
    const { result } = await addSkill("user-1", { title: "python", category: "Languages" }, "merge");
    expect(result?.created).toBe(false);
    expect(createUserSkill).toHaveBeenCalledWith(expect.objectContaining({ category: "Languages" }), "merge");
  });
});

describe("matchJobForUser", () => {
  it("scores the job against the user's skills", async () => {
    vi.mocked(getJobPostingById).mockResolvedValue(posting());
    vi.mocked(listUserSkills).mockResolvedValue([python]);

    const { result } = await matchJobForUser("user-1", "jp-1");
    expect(result?.overall_match_score).toBe(30);
    expect(result?.match_level).toBe("poor");
    expect(result?.top_skill_gaps.map((g) => g.skill_name)).toEqual(["Sql", "Docker"]);
    expect(result?.recommendations[1]).toEqual({
      type: "skills",
      message: "Priority skills to add: Sql, Docker",
      action: "Create experiences showcasing these 2 skills",
    });
  });

  it("asks for a description when the scrape failed", async () => {
    vi.mocked(getJobPostingById).mockResolvedValue(posting({ scraping_success: false }));
    expect(await matchJobForUser("user-1", "jp-1")).toEqual({
      error: "This job could not be scraped. Paste its description to analyze it.",
    });
    expect(listUserSkills).not.toHaveBeenCalled();
  });

  it("reports a missing posting", async () => {
    vi.mocked(getJobPostingById).mockResolvedValue(null);
    expect(await matchJobForUser("user-1", "jp-404")).toEqual({ error: "Job posting not found." });
  });
});

describe("getSkillSuggestions", () => {
  it("returns writing prompts for the skill", async () => {
    const { result } = await getSkillSuggestions(" kubernetes ");
    expect(result?.skill_name).toBe("Kubernetes");
    expect(result?.prompts[0]).toBe("Describe a project where you used kubernetes to solve a problem");
  });

  it("requires a name", async () => {
    expect(await getSkillSuggestions("")).toEqual({ error: "Skill name is required." });
  });
});

describe("getStorySuggestions", () => {
  it("lists the job's missing skills", async () => {
    vi.mocked(getJobPostingById).mockResolvedValue(posting());
    vi.mocked(listUserSkills).mockResolvedValue([python]);

    const { result } = await getStorySuggestions("user-1", "jp-1", 1);
    expect(result?.map((s) => s.skill_name)).toEqual(["Sql"]);
  });
});

import { describe, expect, it } from "vitest";
import {
  classifySkill,
  cleanSkillText,
  extractEducation,
  extractExperienceYears,
  extractKeywordSkills,
  extractListSkills,
  extractParentheticalSkills,
  extractSkillCandidates,
  extractSpecificRequirements,
  identifyMatchingOpportunities,
  isRemoteJob,
  isValidSkill,
  parseJobRequirements,
  parseSkillList,
} from "@/lib/requirements/parser";

describe("extraction passes", () => {
  it("splits parenthetical examples", () => {
    const text = "Cloud warehouses (e.g., Snowflake, Azure, AWS) and tools (such as dbt)";
    expect([...extractParentheticalSkills(text)]).toEqual(["Snowflake", "Azure", "AWS", "dbt"]);
  });

  it("finds technologies, platforms and methodologies in list items", () => {
    const text = "• Build pipelines on GCP with Airflow\n• Jira and agile ceremonies daily\n• Go";
    expect([...extractListSkills(text)]).toEqual(["Google Cloud Platform", "airflow", "jira", "agile"]);
  });

  it("matches dictionary skills on word boundaries", () => {
    expect([...extractKeywordSkills("We use Go and Rust; Java is a bonus.")]).toEqual(["Java", "Go", "Rust"]);
  });

  it("splits experience-context tails on list delimiters", () => {
    expect([...parseSkillList("Python, SQL and Airflow")]).toEqual(["Python", "SQL", "Airflow"]);
    expect([...parseSkillList("React/Redux or Vue")]).toEqual(["React", "Redux", "Vue"]);
  });

  it("normalizes case variants to one key", () => {
    expect(extractSkillCandidates("Experience with PYTHON.\nKnowledge of python")).toEqual(["python"]);
  });
});

describe("token cleanup", () => {
  it("drops qualifiers and surrounding punctuation", () => {
    expect(cleanSkillText("strong Python experience")).toBe("Python");
    expect(cleanSkillText("and (Kafka).")).toBe("Kafka");
  });

  it("rejects stopwords, bad lengths and punctuation fragments", () => {
    expect(isValidSkill("a")).toBe(false);
    expect(isValidSkill("experience")).toBe(false);
    expect(isValidSkill("x".repeat(51))).toBe(false);
    expect(isValidSkill("!!!??")).toBe(false);
    expect(isValidSkill("Node.js")).toBe(true);
  });
});

describe("classifySkill", () => {
  const text = "Python is required.\nGo experience is a plus.";

  it("reads required and preferred wording near the mention", () => {
    expect(classifySkill(text, "python")).toBe("required");
    expect(classifySkill(text, "go")).toBe("preferred");
  });

  it("lets required wording win within one window", () => {
    expect(classifySkill("Java is required and Scala is nice to have", "scala")).toBe("required");
  });

  it("defaults to required", () => {
    expect(classifySkill("We like Elixir.", "elixir")).toBe("required");
    expect(classifySkill(text, "rust")).toBe("required");
  });
});

describe("experience and education", () => {
  it("formats the first years figure", () => {
    expect(extractExperienceYears("3-5 years of experience in backend work")).toBe("3+ years");
    expect(extractExperienceYears("Minimum of 7 years in the field")).toBe("7+ years");
    expect(extractExperienceYears("Plenty of time to learn")).toBe("");
  });

  it("returns the first degree level found", () => {
    expect(extractEducation("Master's degree or PhD preferred")).toBe("Master's degree");
    expect(extractEducation("High school diploma")).toBe("High school");
    expect(extractEducation("No formal requirements")).toBe("");
  });
});

describe("extractSpecificRequirements", () => {
  it("keeps unique list lines between 10 and 200 characters", () => {
    const text = ["- Short", "- Ship features weekly", "- Ship features weekly", "1. Own the data pipeline", "2) Mentor two engineers", "Not a list line at all"].join("\n");
    expect(extractSpecificRequirements(text)).toEqual(["Ship features weekly", "Own the data pipeline", "Mentor two engineers"]);
  });

  it("caps the list at ten items", () => {
    const text = Array.from({ length: 12 }, (_, i) => `- Requirement number ${i + 1}`).join("\n");
    const items = extractSpecificRequirements(text);
    expect(items).toHaveLength(10);
    expect(items[9]).toBe("Requirement number 10");
  });
});

describe("parseJobRequirements", () => {
  it("gives an empty record for empty text", () => {
    expect(parseJobRequirements("")).toEqual({
      required_skills: [],
      preferred_skills: [],
      experience_years: "",
      education: "",
      specific_requirements: [],
    });
  });

  it("reads skills, years and degree from a one-line posting", () => {
    const req = parseJobRequirements(
      "Looking for a Senior Engineer (e.g., Python, AWS, Docker) with 5+ years experience. Bachelor's degree required."
    );
    expect(req.required_skills).toEqual(expect.arrayContaining(["python", "aws", "docker"]));
    expect(req.experience_years).toBe("5+ years");
    expect(req.education).toBe("Bachelor's degree");
  });

  it("never puts a skill in both lists", () => {
    const req = parseJobRequirements("Python is required.\nPython would be a plus for the data team.");
    expect(req.required_skills).toEqual(["python"]);
    expect(req.preferred_skills).toEqual([]);
  });
});

describe("identifyMatchingOpportunities", () => {
  it("flags technologies, leadership and scale", () => {
    const opportunities = identifyMatchingOpportunities({
      required_skills: ["python", "excel"],
      preferred_skills: [],
      experience_years: "",
      education: "",
      specific_requirements: ["Lead a team of five", "Optimize for high traffic"],
    });
    expect(opportunities).toEqual({
      key_technologies: ["python"],
      leadership_emphasis: true,
      scale_requirements: true,
    });
  });
});

describe("isRemoteJob", () => {
  it("ignores template tokens", () => {
    expect(isRemoteJob("Location: %REMOTE_POLICY%")).toBe(false);
    expect(isRemoteJob("Work from home friendly")).toBe(true);
  });
});

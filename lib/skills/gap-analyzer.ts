import type { JobMatchScore, JobPosting, SkillGap, SkillType } from "@/lib/db/types";
import { buildUserSkillIndex, jobSkillsFor, type SkillLike } from "@/lib/skills/matcher";
import { normalizeSkillList, titleCase } from "@/lib/skills/normalize";
import { categorizeSkill, determineSkillType } from "@/lib/skills/taxonomy";

/** The job posting columns the portfolio analysis reads. */
export type PortfolioJob = Pick<JobPosting, "id" | "job_title" | "company_name" | "raw_json">;

export type SkillDemand = {
  /** normalized skill → number of jobs asking for it */
  frequency: Map<string, number>;
  jobSkills: { job: PortfolioJob; skills: string[] }[];
  totalJobs: number;
};

export type AnalysisSuggestion = {
  type: "skill_gaps" | "low_matches";
  message: string;
  action: string;
};

export type StorySuggestion = {
  skill_name: string;
  suggestion_prompt: string;
  skill_type: SkillType;
  priority: "high" | "medium";
};

export type InsufficientData = {
  status: "insufficient_data";
  missing: ("experiences" | "saved_jobs")[];
  message: string;
};

export type PortfolioAnalysis = {
  status: "ok";
  skill_gaps: SkillGap[];
  job_matches: JobMatchScore[];
  suggestions: AnalysisSuggestion[];
};

const LOW_MATCH_THRESHOLD = 60;
const TECHNICAL_BOOST = 1.2;

const round = (n: number, digits: number) => {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
};

/** Required + preferred skills of one job, normalized and de-duplicated. */
export function skillsDemandedBy(job: PortfolioJob): string[] {
  const { required, preferred } = jobSkillsFor(job.raw_json);
  return normalizeSkillList([...required, ...preferred]);
}

/** Counts each skill once per job, so percentages stay within 0–100. */
export function aggregateSkillDemand(jobs: PortfolioJob[]): SkillDemand {
  const frequency = new Map<string, number>();
  const jobSkills = jobs.map((job) => {
    const skills = skillsDemandedBy(job);
    for (const skill of skills) frequency.set(skill, (frequency.get(skill) ?? 0) + 1);
    return { job, skills };
  });
  return { frequency, jobSkills, totalJobs: jobs.length };
}

export function gapPriority(skill: string, frequency: number, totalJobs: number): number {
  let score = (frequency / totalJobs) * 100;
  if (determineSkillType(skill) === "Technical") score *= TECHNICAL_BOOST;
  return round(score, 2);
}

/** Skills the jobs ask for that the user lacks, highest priority first. */
export function calculateSkillGaps(userSkills: SkillLike[], jobs: PortfolioJob[]): SkillGap[] {
  const demand = aggregateSkillDemand(jobs);
  if (demand.totalJobs === 0) return [];
  const held = buildUserSkillIndex(userSkills);

  const gaps: SkillGap[] = [];
  for (const [skill, frequency] of demand.frequency) {
    if (held.has(skill)) continue;
    gaps.push({
      skill_name: titleCase(skill),
      frequency,
      percentage_of_jobs: (frequency / demand.totalJobs) * 100,
      priority_score: gapPriority(skill, frequency, demand.totalJobs),
      suggested_category: categorizeSkill(skill),
      skill_type: determineSkillType(skill),
    });
  }
  return gaps.sort((a, b) => b.priority_score - a.priority_score);
}

/** Exact-name overlap per job; jobs without any skills are left out. */
export function calculateJobMatchScores(userSkills: SkillLike[], jobs: PortfolioJob[]): JobMatchScore[] {
  const held = buildUserSkillIndex(userSkills);
  const scores: JobMatchScore[] = [];
  for (const job of jobs) {
    const skills = skillsDemandedBy(job);
    if (skills.length === 0) continue;
    const matched = skills.filter((s) => held.has(s));
    const missing = skills.filter((s) => !held.has(s));
    scores.push({
      job_posting_id: job.id,
      job_title: job.job_title,
      company_name: job.company_name,
      match_percentage: round((matched.length / skills.length) * 100, 1),
      matched_skills: matched,
      missing_skills: missing,
      total_job_skills: skills.length,
      total_matched: matched.length,
    });
  }
  return scores.sort((a, b) => b.match_percentage - a.match_percentage);
}

export function generateSuggestions(gaps: SkillGap[], matches: JobMatchScore[]): AnalysisSuggestion[] {
  const suggestions: AnalysisSuggestion[] = [];
  if (gaps.length > 0) {
    const top = gaps.slice(0, 3).map((g) => g.skill_name);
    suggestions.push({
      type: "skill_gaps",
      message: `You're missing ${gaps.length} skills that appear frequently in your saved jobs. The top ones are: ${top.join(", ")}`,
      action: "Add experiences that demonstrate these skills",
    });
  }
  const lowMatches = matches.filter((m) => m.match_percentage < LOW_MATCH_THRESHOLD);
  if (lowMatches.length > 0) {
    suggestions.push({
      type: "low_matches",
      message: `You have ${lowMatches.length} saved jobs where you match less than ${LOW_MATCH_THRESHOLD}% of requirements.`,
      action: "Consider adding more relevant experiences or skills",
    });
  }
  return suggestions;
}

export function storyPrompt(skill: string): string {
  return (
    `Think of a time when you demonstrated ${titleCase(skill)} skills. ` +
    "This could be from work, projects, volunteering, or education. " +
    `Focus on a specific situation where you used ${skill} to solve a problem or achieve a result.`
  );
}

/** The first `topN` skills of one job the user has no story for yet. */
export function storySuggestionsForJob(job: PortfolioJob, userSkills: SkillLike[], topN = 3): StorySuggestion[] {
  const held = buildUserSkillIndex(userSkills);
  const required = new Set(jobSkillsFor(job.raw_json).required);
  return skillsDemandedBy(job)
    .filter((s) => !held.has(s))
    .slice(0, topN)
    .map((skill) => ({
      skill_name: titleCase(skill),
      suggestion_prompt: storyPrompt(skill),
      skill_type: determineSkillType(skill),
      priority: required.has(skill) ? "high" : "medium",
    }));
}

export function checkAnalysisInputs(experienceCount: number, jobCount: number): InsufficientData | null {
  const missing: InsufficientData["missing"] = [];
  if (experienceCount === 0) missing.push("experiences");
  if (jobCount === 0) missing.push("saved_jobs");
  if (missing.length === 0) return null;

  const parts = missing.map((m) => (m === "experiences" ? "at least one experience" : "at least one saved job"));
  return {
    status: "insufficient_data",
    missing,
    message: `Skill analysis needs ${parts.join(" and ")}.`,
  };
}

/**
 * Gaps, per-job scores and suggestions across every saved job. Zero jobs or
 * zero skills give empty lists; the experience/job precondition is the
 * caller's (see checkAnalysisInputs).
 */
export function analyzePortfolio(userSkills: SkillLike[], jobs: PortfolioJob[]): PortfolioAnalysis {
  const skillGaps = calculateSkillGaps(userSkills, jobs);
  const jobMatches = calculateJobMatchScores(userSkills, jobs);
  return {
    status: "ok",
    skill_gaps: skillGaps,
    job_matches: jobMatches,
    suggestions: generateSuggestions(skillGaps, jobMatches),
  };
}

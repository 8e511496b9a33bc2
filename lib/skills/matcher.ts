import type { JobScrapeRecord, SkillDetails } from "@/lib/db/types";
import { normalizeSkill, normalizeSkillList, titleCase } from "@/lib/skills/normalize";
import { similarityRatio } from "@/lib/skills/similarity";
import { categorizeSkill } from "@/lib/skills/taxonomy";

/** Anything with a title (and optional alternate names) the user holds. */
export type SkillLike = {
  id?: string;
  title: string;
  details?: SkillDetails | null;
};

/** Normalized name (title or alternate) → the user's skill. */
export type UserSkillIndex = Map<string, SkillLike>;

export type JobSkills = {
  required: string[];
  preferred: string[];
  technologies: string[];
  keywords: string[];
};

export type MatchCategory = "required" | "preferred" | "technology";
export type GapCategory = MatchCategory | "keyword";
export type GapPriority = "critical" | "high" | "medium";

export type SkillMatch =
  | { type: "exact"; userSkill: SkillLike; similarity: 100 }
  | { type: "partial"; userSkill: SkillLike; similarity: number }
  | { type: "none" };

export type MatchedSkill = { job_skill: string; user_skill: string; match_type: "exact" };
export type PartialMatch = { job_skill: string; user_skill: string; match_type: "partial"; similarity: number };
export type MissingSkill = {
  skill_name: string;
  priority: GapPriority;
  category: GapCategory;
  suggested_category: string;
};

export type CategoryAnalysis = {
  total_count: number;
  matched_count: number;
  matched_skills: MatchedSkill[];
  missing_skills: MissingSkill[];
  partial_matches: PartialMatch[];
  match_percentage: number;
};

export type SkillGapEntry = {
  skill_name: string;
  priority: GapPriority;
  category: GapCategory;
  priority_score: number;
  suggested_category: string;
};

export type Recommendation = {
  type: "urgent" | "moderate" | "good" | "skills";
  message: string;
  action: string;
};

export type MatchLevel = "excellent" | "good" | "fair" | "poor";

export type MatchReport = {
  overall_match_score: number;
  required_skills: CategoryAnalysis;
  preferred_skills: CategoryAnalysis;
  technologies: CategoryAnalysis;
  top_skill_gaps: SkillGapEntry[];
  recommendations: Recommendation[];
  match_level: MatchLevel;
  total_job_skills: number;
  total_matched_skills: number;
};

export type MatcherOptions = {
  /** Similarity a fuzzy candidate must exceed */
  fuzzyThreshold: number;
  weights: { required: number; preferred: number; technology: number };
};

export const DEFAULT_MATCHER_OPTIONS: MatcherOptions = {
  fuzzyThreshold: 0.8,
  weights: { required: 0.6, preferred: 0.3, technology: 0.1 },
};

const GAP_SCORES: Record<GapCategory, { score: number; priority: GapPriority }> = {
  technology: { score: 100, priority: "critical" },
  required: { score: 90, priority: "critical" },
  keyword: { score: 70, priority: "high" },
  preferred: { score: 50, priority: "medium" },
};

const round1 = (n: number) => Math.round(n * 10) / 10;

export function buildUserSkillIndex(skills: Iterable<SkillLike>): UserSkillIndex {
  const index: UserSkillIndex = new Map();
  for (const skill of skills) {
    const key = normalizeSkill(skill.title);
    if (key) index.set(key, skill);
    for (const alt of skill.details?.alternates ?? []) {
      const altKey = normalizeSkill(alt);
      if (altKey) index.set(altKey, skill);
    }
  }
  return index;
}

/**
 * Parsed requirements by default; a caller-supplied ai_analysis block takes
 * over when present (and is the only source of technologies and keywords).
 */
export function jobSkillsFor(record: JobScrapeRecord): JobSkills {
  const ai = record.ai_analysis;
  if (ai && Object.keys(ai).length > 0) {
    return {
      required: normalizeSkillList(ai.required_skills ?? []),
      preferred: normalizeSkillList(ai.preferred_skills ?? []),
      technologies: normalizeSkillList(ai.technologies_mentioned ?? []),
      keywords: normalizeSkillList(ai.resume_keywords ?? []),
    };
  }
  return {
    required: normalizeSkillList(record.parsed_requirements?.required_skills ?? []),
    preferred: normalizeSkillList(record.parsed_requirements?.preferred_skills ?? []),
    technologies: [],
    keywords: [],
  };
}

export function findSkillMatch(
  jobSkill: string,
  index: UserSkillIndex,
  threshold = DEFAULT_MATCHER_OPTIONS.fuzzyThreshold
): SkillMatch {
  const key = normalizeSkill(jobSkill);
  const exact = index.get(key);
  if (exact) return { type: "exact", userSkill: exact, similarity: 100 };

  let best: { skill: SkillLike; ratio: number } | null = null;
  for (const [name, skill] of index) {
    const ratio = similarityRatio(key, name);
    if (ratio > threshold && (!best || ratio > best.ratio)) best = { skill, ratio };
  }
  if (best) return { type: "partial", userSkill: best.skill, similarity: round1(best.ratio * 100) };
  return { type: "none" };
}

export function analyzeSkillCategory(
  jobSkills: string[],
  category: MatchCategory,
  index: UserSkillIndex,
  threshold = DEFAULT_MATCHER_OPTIONS.fuzzyThreshold
): CategoryAnalysis {
  const skills = normalizeSkillList(jobSkills);
  const matched: MatchedSkill[] = [];
  const partial: PartialMatch[] = [];
  const missing: MissingSkill[] = [];

  for (const jobSkill of skills) {
    const m = findSkillMatch(jobSkill, index, threshold);
    if (m.type === "exact") {
      matched.push({ job_skill: jobSkill, user_skill: m.userSkill.title, match_type: "exact" });
    } else if (m.type === "partial") {
      partial.push({ job_skill: jobSkill, user_skill: m.userSkill.title, match_type: "partial", similarity: m.similarity });
    } else {
      missing.push({
        skill_name: titleCase(jobSkill),
        priority: GAP_SCORES[category].priority,
        category,
        suggested_category: categorizeSkill(jobSkill),
      });
    }
  }

  const matchedCount = matched.length + partial.length;
  return {
    total_count: skills.length,
    matched_count: matchedCount,
    matched_skills: matched,
    missing_skills: missing,
    partial_matches: partial,
    match_percentage: skills.length > 0 ? round1((matchedCount / skills.length) * 100) : 0,
  };
}

export function overallScore(
  required: CategoryAnalysis,
  preferred: CategoryAnalysis,
  technologies: CategoryAnalysis,
  weights = DEFAULT_MATCHER_OPTIONS.weights
): number {
  return round1(
    required.match_percentage * weights.required +
      preferred.match_percentage * weights.preferred +
      technologies.match_percentage * weights.technology
  );
}

/** Gaps from resume keywords the user lacks that are not already missing as required skills. */
export function keywordGaps(keywords: string[], required: CategoryAnalysis, index: UserSkillIndex): MissingSkill[] {
  const requiredNames = new Set(required.missing_skills.map((s) => s.skill_name.toLowerCase()));
  return normalizeSkillList(keywords)
    .filter((k) => !requiredNames.has(k) && !index.has(k))
    .map((k) => ({
      skill_name: titleCase(k),
      priority: GAP_SCORES.keyword.priority,
      category: "keyword",
      suggested_category: categorizeSkill(k),
    }));
}

/**
 * One entry per skill name (case-insensitive), keeping the highest-priority
 * category: technology > required > keyword > preferred.
 */
export function rankSkillGaps(groups: { category: GapCategory; missing: MissingSkill[] }[]): SkillGapEntry[] {
  const best = new Map<string, SkillGapEntry>();
  for (const { category, missing } of groups) {
    const { score, priority } = GAP_SCORES[category];
    for (const gap of missing) {
      const key = gap.skill_name.toLowerCase();
      const seen = best.get(key);
      if (!seen || score > seen.priority_score) {
        best.set(key, {
          skill_name: gap.skill_name,
          priority,
          category,
          priority_score: score,
          suggested_category: gap.suggested_category,
        });
      }
    }
  }
  return [...best.values()].sort((a, b) => {
    if (a.priority_score !== b.priority_score) return b.priority_score - a.priority_score;
    return a.skill_name < b.skill_name ? -1 : a.skill_name > b.skill_name ? 1 : 0;
  });
}

export function matchLevel(score: number): MatchLevel {
  if (score >= 80) return "excellent";
  if (score >= 70) return "good";
  if (score >= 50) return "fair";
  return "poor";
}

export function generateRecommendations(gaps: SkillGapEntry[], score: number): Recommendation[] {
  const recommendations: Recommendation[] = [];
  if (score < 40) {
    recommendations.push({
      type: "urgent",
      message: `Your skill match is quite low at ${score}%. Consider adding experiences that demonstrate the critical missing skills.`,
      action: "Focus on required skills first",
    });
  } else if (score < 70) {
    recommendations.push({
      type: "moderate",
      message: `You have a ${score}% match. Adding a few key experiences could significantly improve your candidacy.`,
      action: "Add experiences for top missing skills",
    });
  } else {
    recommendations.push({
      type: "good",
      message: `Strong ${score}% skill match! Consider adding experiences for preferred skills to stand out.`,
      action: "Optimize with preferred skills",
    });
  }

  const top = gaps.slice(0, 3).map((g) => g.skill_name);
  if (top.length > 0) {
    recommendations.push({
      type: "skills",
      message: `Priority skills to add: ${top.join(", ")}`,
      action: `Create experiences showcasing these ${top.length} skills`,
    });
  }
  return recommendations;
}

/** Score one job against one user's skills. */
export function matchJobSkills(
  userSkills: Iterable<SkillLike> | UserSkillIndex,
  job: JobSkills,
  options: MatcherOptions = DEFAULT_MATCHER_OPTIONS
): MatchReport {
  const index = userSkills instanceof Map ? userSkills : buildUserSkillIndex(userSkills);
  const threshold = options.fuzzyThreshold;

  const required = analyzeSkillCategory(job.required, "required", index, threshold);
  const preferred = analyzeSkillCategory(job.preferred, "preferred", index, threshold);
  const technologies = analyzeSkillCategory(job.technologies, "technology", index, threshold);
  const score = overallScore(required, preferred, technologies, options.weights);

  const gaps = rankSkillGaps([
    { category: "technology", missing: technologies.missing_skills },
    { category: "required", missing: required.missing_skills },
    { category: "keyword", missing: keywordGaps(job.keywords, required, index) },
    { category: "preferred", missing: preferred.missing_skills },
  ]);

  return {
    overall_match_score: score,
    required_skills: required,
    preferred_skills: preferred,
    technologies,
    top_skill_gaps: gaps,
    recommendations: generateRecommendations(gaps, score),
    match_level: matchLevel(score),
    total_job_skills: required.total_count + preferred.total_count + technologies.total_count,
    total_matched_skills: required.matched_count + preferred.matched_count + technologies.matched_count,
  };
}

export function getExperienceSuggestions(skillName: string) {
  return {
    skill_name: titleCase(skillName),
    prompts: [
      `Describe a project where you used ${skillName} to solve a problem`,
      `Think of a time when you learned ${skillName} quickly to meet a deadline`,
      `Explain a situation where your ${skillName} skills made a significant impact`,
      `Share an example of how you've applied ${skillName} in a team setting`,
    ],
    suggested_action: `Add an experience that highlights your ${skillName} capabilities`,
  };
}

import type {
  AnalysisStatus,
  JobMatchScore,
  NewSkillAnalysisSnapshot,
  SkillAnalysisSnapshot,
  SkillGap,
} from "@/lib/db/types";
import { InvalidStatusTransitionError } from "@/lib/errors";

export const ANALYZER_VERSION = "1.0";

const DAY_MS = 24 * 60 * 60 * 1000;

const TRANSITIONS: Record<AnalysisStatus, AnalysisStatus[]> = {
  fresh: ["in_progress", "completed", "archived"],
  in_progress: ["completed", "archived"],
  completed: ["archived"],
  archived: [],
};

export type SnapshotInput = {
  userId: string;
  experiencesAnalyzed: number;
  skillsFound: number;
  skillsExtracted: string[];
  newSkillsCreated: number;
  jobsAnalyzed: number;
  skillGaps: SkillGap[];
  jobMatches: JobMatchScore[];
  parameters?: Record<string, unknown>;
};

/** Current counts of the user's data, for deciding whether a snapshot is out of date. */
export type CurrentCounts = {
  experiences: number;
  jobs: number;
  skills: number;
};

export function buildSnapshot(input: SnapshotInput): NewSkillAnalysisSnapshot {
  const scores = input.jobMatches.map((m) => m.match_percentage);
  const average = scores.length > 0 ? scores.reduce((a, b) => a + b, 0) / scores.length : 0;
  return {
    user_id: input.userId,
    total_experiences_analyzed: input.experiencesAnalyzed,
    total_jobs_analyzed: input.jobsAnalyzed,
    total_skills_found: input.skillsFound,
    new_skills_created: input.newSkillsCreated,
    total_skill_gaps: input.skillGaps.length,
    average_job_match_score: Math.round(average * 10) / 10,
    highest_job_match_score: scores.length > 0 ? Math.max(...scores) : 0,
    lowest_job_match_score: scores.length > 0 ? Math.min(...scores) : 0,
    skill_gaps: input.skillGaps,
    job_matches: input.jobMatches,
    skills_extracted: input.skillsExtracted,
    analyzer_version: ANALYZER_VERSION,
    analysis_parameters: input.parameters ?? {},
    user_notes: "",
    status: "fresh",
  };
}

export function canTransition(from: AnalysisStatus, to: AnalysisStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** @throws InvalidStatusTransitionError */
export function transitionStatus(from: AnalysisStatus, to: AnalysisStatus): AnalysisStatus {
  if (!canTransition(from, to)) throw new InvalidStatusTransitionError(from, to);
  return to;
}

function daysOld(createdAt: string, now: Date): number {
  return Math.floor((now.getTime() - new Date(createdAt).getTime()) / DAY_MS);
}

export function isRecent(snapshot: Pick<SkillAnalysisSnapshot, "created_at">, now: Date = new Date()): boolean {
  return daysOld(snapshot.created_at, now) < 7;
}

export function stalenessLabel(snapshot: Pick<SkillAnalysisSnapshot, "created_at">, now: Date = new Date()): string {
  const days = daysOld(snapshot.created_at, now);
  if (days <= 0) return "Today";
  if (days === 1) return "Yesterday";
  if (days < 7) return `${days} days ago`;
  if (days < 30) {
    const weeks = Math.floor(days / 7);
    return `${weeks} week${weeks > 1 ? "s" : ""} ago`;
  }
  return `${days} days ago`;
}

export function needsRefresh(
  snapshot: Pick<SkillAnalysisSnapshot, "total_experiences_analyzed" | "total_jobs_analyzed" | "total_skills_found">,
  current: CurrentCounts
): boolean {
  return (
    current.experiences > snapshot.total_experiences_analyzed + 1 ||
    current.jobs > snapshot.total_jobs_analyzed + 2 ||
    current.skills > snapshot.total_skills_found + 3
  );
}

export function topSkillGaps(snapshot: Pick<SkillAnalysisSnapshot, "skill_gaps">, n = 5): SkillGap[] {
  return snapshot.skill_gaps.slice(0, n);
}

export function gapForSkill(snapshot: Pick<SkillAnalysisSnapshot, "skill_gaps">, skillName: string): SkillGap | null {
  const wanted = skillName.toLowerCase();
  return snapshot.skill_gaps.find((g) => g.skill_name.toLowerCase() === wanted) ?? null;
}

/** Analyzed jobs that list the skill as missing. */
export function jobsMissingSkill(snapshot: Pick<SkillAnalysisSnapshot, "job_matches">, skillName: string): JobMatchScore[] {
  const wanted = skillName.toLowerCase();
  return snapshot.job_matches.filter((m) => m.missing_skills.some((s) => s.toLowerCase() === wanted));
}

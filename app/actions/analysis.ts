import { logError, logInfo } from "@/lib/debug";
import { createAnalysis, getAnalysis, getLatestAnalysis, setAnalysisStatus } from "@/lib/db/analyses";
import { countExperiences, listExperiences } from "@/lib/db/experiences";
import { countSavedJobs, listSavedJobPostings } from "@/lib/db/saved-jobs";
import { countUserSkills, createUserSkill, listUserSkills } from "@/lib/db/skills";
import type { AnalysisStatus, SkillAnalysisSnapshot, SkillGap } from "@/lib/db/types";
import { errorMessage } from "@/lib/errors";
import { draftToNewSkill, extractSkillsFromExperiences } from "@/lib/skills/experience-skills";
import {
  analyzePortfolio,
  checkAnalysisInputs,
  type AnalysisSuggestion,
  type InsufficientData,
} from "@/lib/skills/gap-analyzer";
import { buildSnapshot, isRecent, needsRefresh, stalenessLabel, topSkillGaps, transitionStatus } from "@/lib/skills/snapshot";

export type SkillAnalysisResult =
  | InsufficientData
  | {
      status: "ok";
      analysis: SkillAnalysisSnapshot;
      new_skills_created: number;
      top_skill_gaps: SkillGap[];
      suggestions: AnalysisSuggestion[];
    };

/**
 * Extract skills from the user's experiences, then score every saved job and
 * store the result as a snapshot. Missing experiences or saved jobs give an
 * insufficient_data result and nothing is written.
 */
export async function runSkillAnalysis(
  userId: string,
  now: Date = new Date()
): Promise<{ error?: string; result?: SkillAnalysisResult }> {
  try {
    const [experiences, jobs] = await Promise.all([listExperiences(userId), listSavedJobPostings(userId)]);
    const insufficient = checkAnalysisInputs(experiences.length, jobs.length);
    if (insufficient) return { result: insufficient };

    const drafts = extractSkillsFromExperiences(experiences, now);
    let created = 0;
    for (const draft of drafts) {
      const res = await createUserSkill(draftToNewSkill(userId, draft), "merge");
      if (res.created) created++;
    }

    const skills = await listUserSkills(userId);
    const portfolio = analyzePortfolio(skills, jobs);
    const analysis = await createAnalysis(
      buildSnapshot({
        userId,
        experiencesAnalyzed: experiences.length,
        skillsFound: skills.length,
        skillsExtracted: drafts.map((d) => d.title),
        newSkillsCreated: created,
        jobsAnalyzed: jobs.length,
        skillGaps: portfolio.skill_gaps,
        jobMatches: portfolio.job_matches,
      })
    );
    logInfo(
      `Skill analysis ${analysis.id}: ${jobs.length} jobs, ${portfolio.skill_gaps.length} gaps, ${created} new skills`
    );

    return {
      result: {
        status: "ok",
        analysis,
        new_skills_created: created,
        top_skill_gaps: topSkillGaps(analysis),
        suggestions: portfolio.suggestions,
      },
    };
  } catch (err) {
    logError("runSkillAnalysis failed:", err);
    return { error: errorMessage(err) };
  }
}

export async function updateAnalysisStatus(
  userId: string,
  analysisId: string,
  status: AnalysisStatus,
  userNotes?: string
): Promise<{ error?: string; result?: SkillAnalysisSnapshot }> {
  try {
    const analysis = await getAnalysis(analysisId, userId);
    if (!analysis) return { error: "Analysis not found." };
    const next = transitionStatus(analysis.status, status);
    return { result: await setAnalysisStatus(analysis.id, next, userNotes?.trim()) };
  } catch (err) {
    return { error: errorMessage(err) };
  }
}

export type AnalysisFreshness = {
  analysis: SkillAnalysisSnapshot;
  is_recent: boolean;
  staleness: string;
  needs_refresh: boolean;
};

/** The latest snapshot and whether the user's data has moved on since. */
export async function getAnalysisFreshness(
  userId: string,
  now: Date = new Date()
): Promise<{ error?: string; result?: AnalysisFreshness | null }> {
  try {
    const analysis = await getLatestAnalysis(userId);
    if (!analysis) return { result: null };
    const [experiences, jobs, skills] = await Promise.all([
      countExperiences(userId),
      countSavedJobs(userId),
      countUserSkills(userId),
    ]);
    return {
      result: {
        analysis,
        is_recent: isRecent(analysis, now),
        staleness: stalenessLabel(analysis, now),
        needs_refresh: needsRefresh(analysis, { experiences, jobs, skills }),
      },
    };
  } catch (err) {
    logError("getAnalysisFreshness failed:", err);
    return { error: errorMessage(err) };
  }
}

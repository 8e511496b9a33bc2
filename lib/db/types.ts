export type AtsPlatform = "greenhouse" | "lever" | "workday" | "generic";

/** Requirements parsed from a job description. Skill names are lower-cased and trimmed. */
export type ExtractedRequirements = {
  required_skills: string[];
  preferred_skills: string[];
  /** e.g. "5+ years"; empty when not stated */
  experience_years: string;
  education: string;
  /** Raw bullet lines, at most 10, in source order */
  specific_requirements: string[];
};

export type MatchingOpportunities = {
  key_technologies: string[];
  leadership_emphasis: boolean;
  scale_requirements: boolean;
};

export type ScrapedContent = {
  full_description: string;
  description_html: string;
  company_info: string;
  benefits: string;
  original_url: string;
  ats_platform: AtsPlatform;
};

export type ScrapingMetadata = {
  success: boolean;
  scraped_at: string;
  scraper_version?: string;
  error?: string;
};

/** Analysis supplied by the caller (e.g. from an LLM); used in place of parsed skills when present. */
export type AiJobAnalysis = {
  required_skills?: string[];
  preferred_skills?: string[];
  technologies_mentioned?: string[];
  resume_keywords?: string[];
  experience_years?: string;
  [key: string]: unknown;
};

/** The JSON document stored on a job posting. Failed scrapes carry only scraping_metadata. */
export type JobScrapeRecord = {
  scraped_content?: ScrapedContent;
  parsed_requirements?: ExtractedRequirements;
  matching_opportunities?: MatchingOpportunities;
  scraping_metadata: ScrapingMetadata;
  ai_analysis?: AiJobAnalysis;
};

export type JobPosting = {
  id: string;
  url: string;
  company_name: string;
  job_title: string;
  location: string;
  remote_allowed: boolean;
  scraping_success: boolean;
  scraping_error: string;
  raw_json: JobScrapeRecord;
  added_by: string | null;
  scraped_at: string;
};

export type NewJobPosting = Omit<JobPosting, "id" | "scraped_at">;

export type SavedJobStatus =
  | "saved"
  | "applied"
  | "interviewing"
  | "offered"
  | "rejected"
  | "withdrawn";

export type SavedJob = {
  id: string;
  user_id: string;
  job_posting_id: string;
  status: SavedJobStatus;
  notes: string;
  created_at: string;
};

export type SkillType = "Soft" | "Hard" | "Technical" | "Transferable" | "Other";
export type SkillLevel = "Entry" | "Intermediate" | "Advanced" | "Expert" | "Mastery";

export type SkillDetails = {
  alternates?: string[];
  extracted_from_experiences?: string[];
  mention_count?: number;
  [key: string]: unknown;
};

export type UserSkill = {
  id: string;
  user_id: string;
  title: string;
  category: string;
  skill_type: SkillType | null;
  skill_level: SkillLevel | null;
  years_experience: number | null;
  details: SkillDetails;
};

export type NewUserSkill = Omit<UserSkill, "id">;

export type ExperienceVisibility = "public" | "private" | "draft";

export type Experience = {
  id: string;
  user_id: string;
  title: string;
  description: string;
  skills_used: string[];
  tags: string[];
  visibility: ExperienceVisibility;
  date_started: string | null;
  date_finished: string | null;
};

export type AnalysisStatus = "fresh" | "in_progress" | "completed" | "archived";

export type SkillGap = {
  skill_name: string;
  frequency: number;
  percentage_of_jobs: number;
  priority_score: number;
  suggested_category: string;
  skill_type: SkillType;
};

export type JobMatchScore = {
  job_posting_id: string;
  job_title: string;
  company_name: string;
  match_percentage: number;
  matched_skills: string[];
  missing_skills: string[];
  total_job_skills: number;
  total_matched: number;
};

export type SkillAnalysisSnapshot = {
  id: string;
  user_id: string;
  created_at: string;
  total_experiences_analyzed: number;
  total_jobs_analyzed: number;
  total_skills_found: number;
  new_skills_created: number;
  total_skill_gaps: number;
  average_job_match_score: number;
  highest_job_match_score: number;
  lowest_job_match_score: number;
  skill_gaps: SkillGap[];
  job_matches: JobMatchScore[];
  skills_extracted: string[];
  analyzer_version: string;
  analysis_parameters: Record<string, unknown>;
  user_notes: string;
  status: AnalysisStatus;
};

export type NewSkillAnalysisSnapshot = Omit<SkillAnalysisSnapshot, "id" | "created_at">;

import type { SkillType } from "@/lib/db/types";

const PROGRAMMING_KEYWORDS = ["python", "javascript", "java", "sql", "aws", "docker", "react", "django", "api", "framework", "database"];
const LEADERSHIP_KEYWORDS = ["leadership", "management", "team", "mentor", "lead"];
const COMMUNICATION_KEYWORDS = ["communication", "presentation", "writing", "documentation"];

const TECHNICAL_KEYWORDS = ["python", "javascript", "sql", "aws", "docker", "api", "framework"];
const SOFT_KEYWORDS = ["communication", "leadership", "teamwork", "problem solving"];

/** Skill category suggested for a new or missing skill. */
export function categorizeSkill(name: string): string {
  const lower = name.toLowerCase();
  if (PROGRAMMING_KEYWORDS.some((k) => lower.includes(k))) return "Programming";
  if (LEADERSHIP_KEYWORDS.some((k) => lower.includes(k))) return "Leadership";
  if (COMMUNICATION_KEYWORDS.some((k) => lower.includes(k))) return "Communication";
  return "Other";
}

export function determineSkillType(name: string): SkillType {
  const lower = name.toLowerCase();
  if (TECHNICAL_KEYWORDS.some((k) => lower.includes(k))) return "Technical";
  if (SOFT_KEYWORDS.some((k) => lower.includes(k))) return "Soft";
  return "Transferable";
}

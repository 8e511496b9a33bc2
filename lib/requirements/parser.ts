import type { ExtractedRequirements, MatchingOpportunities } from "@/lib/db/types";
import { getSkillDatabase, type SkillDatabase } from "@/lib/requirements/skill-database";
import { normalizeSkill } from "@/lib/skills/normalize";

export type SkillClassification = "required" | "preferred";

const REQUIRED_WORDS = ["required", "must", "essential", "mandatory"];
const PREFERRED_WORDS = ["preferred", "nice", "bonus", "plus"];

const PARENTHETICAL_PATTERNS = [
  /\(e\.g\.?,?\s*([^)]+)\)/gi,
  /\(such as\s*([^)]+)\)/gi,
  /\(including\s*([^)]+)\)/gi,
  /\(like\s*([^)]+)\)/gi,
  /\(i\.e\.?,?\s*([^)]+)\)/gi,
];

const EXPERIENCE_CONTEXT_PATTERNS = [
  /experience (?:with|in|using|developing)\s+([^.\n]+)/gi,
  /expertise (?:with|in|using)\s+([^.\n]+)/gi,
  /proficiency (?:with|in|using)\s+([^.\n]+)/gi,
  /knowledge of\s+([^.\n]+)/gi,
  /skilled in\s+([^.\n]+)/gi,
  /background in\s+([^.\n]+)/gi,
];

const LIST_DELIMITERS = [",", ";", "&", " and ", " or ", "/"];

const EXPERIENCE_YEARS_PATTERNS = [
  /(\d+)\+?\s*(?:(?:to|-|–)\s*\d+\s*)?years?\s*(?:of\s*)?experience/i,
  /(\d+)\+?\s*(?:(?:to|-|–)\s*\d+\s*)?yrs?\s*(?:of\s*)?experience/i,
  /minimum\s*(?:of\s*)?(\d+)\s*years?/i,
  /at\s*least\s*(\d+)\s*years?/i,
];

// Most to least common degree level; the first hit wins.
const EDUCATION_PATTERNS = [
  /bachelor['’]?s?\s*degree/i,
  /master['’]?s?\s*degree/i,
  /phd|doctorate/i,
  /associate['’]?s?\s*degree/i,
  /high\s*school|diploma/i,
];

const LIST_ITEM = /^\s*(?:[•·\-*]|\d+[.)])\s*(.+)$/;

const LEADERSHIP_KEYWORDS = ["lead", "manage", "mentor", "team", "direct", "supervise"];
const SCALE_KEYWORDS = ["scale", "performance", "million", "billion", "high traffic", "optimization"];
const REMOTE_KEYWORDS = ["remote", "work from home", "telecommute", "distributed", "anywhere"];

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function wordBoundary(term: string, flags = ""): RegExp {
  return new RegExp(`\\b${escapeRegExp(term)}\\b`, flags);
}

/** Lines that start with a bullet or "1." / "1)" marker, marker removed. */
export function listItems(text: string): string[] {
  const items: string[] = [];
  for (const line of text.split("\n")) {
    const item = line.match(LIST_ITEM)?.[1]?.trim();
    if (item) items.push(item);
  }
  return items;
}

export function cleanSkillText(raw: string): string {
  return raw
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^(?:and|or)\s+/i, "")
    .replace(/^(?:strong|solid|deep|extensive)\s+/i, "")
    .replace(/\s+(?:experience|knowledge|skills?|expertise|proficiency)\b/gi, "")
    .replace(/^[\s"'“”‘’`,;:!?()[\]{}]+/, "")
    .replace(/[\s"'“”‘’`.,;:!?()[\]{}]+$/, "");
}

/** Rejects stopwords, fragments under 2 or over 50 characters, and mostly-punctuation tokens. */
export function isValidSkill(skill: string, db: SkillDatabase = getSkillDatabase()): boolean {
  if (!skill || skill.length < 2) return false;
  if (db.stopwords.includes(skill.toLowerCase())) return false;
  if (skill.length > 50) return false;
  const wordChars = skill.replace(/[^\w\s]/g, "").length;
  return wordChars >= skill.length * 0.7;
}

function addValid(out: Set<string>, raw: string, db: SkillDatabase) {
  const cleaned = cleanSkillText(raw);
  if (isValidSkill(cleaned, db)) out.add(cleaned);
}

/** "(e.g., Snowflake, Azure, AWS)" and the such as / including / like / i.e. variants. */
export function extractParentheticalSkills(text: string, db: SkillDatabase = getSkillDatabase()): Set<string> {
  const skills = new Set<string>();
  for (const re of PARENTHETICAL_PATTERNS) {
    for (const m of text.matchAll(re)) {
      for (const part of m[1].split(",")) addValid(skills, part, db);
    }
  }
  return skills;
}

function technologyMentions(item: string, db: SkillDatabase): string[] {
  const lower = item.toLowerCase();
  return db.technologies
    .filter((tech) => wordBoundary(tech).test(lower))
    .map((tech) => db.aliases[tech] ?? tech);
}

function keywordMentions(item: string, keywords: string[], db: SkillDatabase): string[] {
  const lower = item.toLowerCase();
  return keywords.filter((k) => lower.includes(k)).map((k) => db.aliases[k] ?? k);
}

/** Technology, platform and methodology names inside list items of 10+ characters. */
export function extractListSkills(text: string, db: SkillDatabase = getSkillDatabase()): Set<string> {
  const skills = new Set<string>();
  for (const item of listItems(text)) {
    if (item.length < 10) continue;
    const found = [
      ...technologyMentions(item, db),
      ...keywordMentions(item, db.platforms, db),
      ...keywordMentions(item, db.methodologies, db),
    ];
    for (const skill of found) addValid(skills, skill, db);
  }
  return skills;
}

/** Whole-word hits of the categorized skill dictionary. */
export function extractKeywordSkills(text: string, db: SkillDatabase = getSkillDatabase()): Set<string> {
  const skills = new Set<string>();
  const lower = text.toLowerCase();
  for (const names of Object.values(db.categories)) {
    for (const name of names) {
      if (wordBoundary(name.toLowerCase()).test(lower)) addValid(skills, name, db);
    }
  }
  return skills;
}

/** Split "Python, SQL and Airflow" style tails into individual tokens. */
export function parseSkillList(tail: string, db: SkillDatabase = getSkillDatabase()): Set<string> {
  let parts = [tail];
  for (const delimiter of LIST_DELIMITERS) {
    parts = parts.flatMap((p) => p.split(delimiter).map((s) => s.trim()));
  }
  const skills = new Set<string>();
  for (const part of parts) addValid(skills, part, db);
  return skills;
}

/** "experience with X", "knowledge of X", "proficiency in X" … */
export function extractExperienceContextSkills(text: string, db: SkillDatabase = getSkillDatabase()): Set<string> {
  const skills = new Set<string>();
  for (const re of EXPERIENCE_CONTEXT_PATTERNS) {
    for (const m of text.matchAll(re)) {
      for (const skill of parseSkillList(m[1].trim(), db)) skills.add(skill);
    }
  }
  return skills;
}

/**
 * Looks at up to 100 characters either side of each mention (same line).
 * Required wording wins over preferred wording in the same window, and a
 * skill with no signal at all is treated as required.
 */
export function classifySkill(text: string, skill: string): SkillClassification {
  const re = new RegExp(`.{0,100}\\b${escapeRegExp(skill)}\\b.{0,100}`, "gi");
  for (const m of text.matchAll(re)) {
    const window = m[0].toLowerCase();
    if (REQUIRED_WORDS.some((w) => window.includes(w))) return "required";
    if (PREFERRED_WORDS.some((w) => window.includes(w))) return "preferred";
  }
  return "required";
}

export function extractExperienceYears(text: string): string {
  for (const re of EXPERIENCE_YEARS_PATTERNS) {
    const m = text.match(re);
    if (m) return `${m[1]}+ years`;
  }
  return "";
}

export function extractEducation(text: string): string {
  for (const re of EDUCATION_PATTERNS) {
    const m = text.match(re);
    if (m) return m[0];
  }
  return "";
}

/** List lines longer than 10 and shorter than 200 characters, first 10, de-duplicated. */
export function extractSpecificRequirements(text: string): string[] {
  const out: string[] = [];
  for (const item of listItems(text)) {
    if (item.length > 10 && item.length < 200 && !out.includes(item)) out.push(item);
    if (out.length === 10) break;
  }
  return out;
}

/** All four passes, unioned in order, as normalized skill keys. */
export function extractSkillCandidates(text: string, db: SkillDatabase = getSkillDatabase()): string[] {
  const passes = [
    extractParentheticalSkills(text, db),
    extractListSkills(text, db),
    extractKeywordSkills(text, db),
    extractExperienceContextSkills(text, db),
  ];
  const keys = new Set<string>();
  for (const pass of passes) {
    for (const skill of pass) keys.add(normalizeSkill(skill));
  }
  return [...keys];
}

/** Never throws; empty text gives an all-empty record. */
export function parseJobRequirements(text: string, db: SkillDatabase = getSkillDatabase()): ExtractedRequirements {
  const required: string[] = [];
  const preferred: string[] = [];
  for (const skill of extractSkillCandidates(text, db)) {
    if (classifySkill(text, skill) === "required") required.push(skill);
    else preferred.push(skill);
  }
  return {
    required_skills: required,
    preferred_skills: preferred,
    experience_years: extractExperienceYears(text),
    education: extractEducation(text),
    specific_requirements: extractSpecificRequirements(text),
  };
}

export function identifyMatchingOpportunities(
  requirements: ExtractedRequirements,
  db: SkillDatabase = getSkillDatabase()
): MatchingOpportunities {
  const technical = new Set(db.technical);
  const joined = requirements.specific_requirements.join(" ").toLowerCase();
  return {
    key_technologies: requirements.required_skills.filter((s) => technical.has(s.toLowerCase())).slice(0, 5),
    leadership_emphasis: LEADERSHIP_KEYWORDS.some((k) => joined.includes(k)),
    scale_requirements: SCALE_KEYWORDS.some((k) => joined.includes(k)),
  };
}

/** Remote wording, ignoring unrendered %REMOTE% style template tokens. */
export function isRemoteJob(text: string): boolean {
  const lower = text.replace(/%[A-Z_]+%/g, " ").toLowerCase();
  return REMOTE_KEYWORDS.some((k) => lower.includes(k));
}

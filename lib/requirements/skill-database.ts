import { z } from "zod";
import rawDatabase from "@/data/skill-database.json";

const skillDatabaseSchema = z.object({
  /** category → canonical skill names, matched on word boundaries against the whole description */
  categories: z.record(z.array(z.string().min(1))),
  /** technology names looked for inside list items */
  technologies: z.array(z.string().min(1)),
  /** platform / tool names looked for inside list items (substring match) */
  platforms: z.array(z.string().min(1)),
  methodologies: z.array(z.string().min(1)),
  /** lower-case surface form → canonical name */
  aliases: z.record(z.string()),
  /** skills that count as "key technologies" on a parsed job */
  technical: z.array(z.string().min(1)),
  /** keywords looked for in experience descriptions */
  experienceKeywords: z.array(z.string().min(1)),
  stopwords: z.array(z.string()),
});

export type SkillDatabase = z.infer<typeof skillDatabaseSchema>;

export function parseSkillDatabase(data: unknown): SkillDatabase {
  return skillDatabaseSchema.parse(data);
}

let loaded: SkillDatabase | undefined;

/** The bundled data/skill-database.json, validated once. */
export function getSkillDatabase(): SkillDatabase {
  loaded ??= parseSkillDatabase(rawDatabase);
  return loaded;
}

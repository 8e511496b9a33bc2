import type { AtsPlatform } from "@/lib/db/types";

/** Ordered CSS selector lists for each field; first non-empty, non-placeholder match wins. */
export type SelectorProfile = {
  title: string[];
  company: string[];
  location: string[];
  description: string[];
};

export const ATS_PROFILES: Record<AtsPlatform, SelectorProfile> = {
  greenhouse: {
    title: [".job-post-title", ".posting-headline h2", ".app-title", "h1"],
    company: [".company-name", ".posting-company h2"],
    location: [".location", ".posting-categories .location"],
    description: [".job-post-description", ".posting-description", "#content"],
  },
  lever: {
    title: [".posting-headline h2", "h1"],
    company: [".posting-company h2", ".company-name"],
    location: [".posting-categories .location", ".location"],
    description: [".posting-description", ".content"],
  },
  workday: {
    title: ['h1[data-automation-id="jobPostingHeader"]', "h1"],
    company: [".company-name", "h2"],
    location: [".jobdescription .location", ".location"],
    description: [".jobdescription .content", '[data-automation-id="jobPostingDescription"]', ".job-description"],
  },
  generic: {
    title: ["h1", "h2", ".job-title", ".title"],
    company: [".company", ".company-name", "h2"],
    location: [".location", ".job-location"],
    description: [".description", ".content", ".job-description"],
  },
};

const URL_FINGERPRINTS: [AtsPlatform, string][] = [
  ["greenhouse", "greenhouse.io"],
  ["lever", "jobs.lever.co"],
  ["workday", "myworkdayjobs.com"],
];

// Embed hosts and markup hooks only; bare names like "lever" show up in ordinary prose.
const HTML_FINGERPRINTS: [AtsPlatform, string][] = [
  ["greenhouse", "boards.greenhouse.io"],
  ["greenhouse", "grnhse"],
  ["lever", "jobs.lever.co"],
  ["workday", "myworkdayjobs.com"],
  ["workday", 'data-automation-id="jobposting'],
];

/** URL fragments are checked for every family before any markup fingerprint. */
export function detectAtsPlatform(url: string, html: string): AtsPlatform {
  const u = url.toLowerCase();
  for (const [platform, fragment] of URL_FINGERPRINTS) {
    if (u.includes(fragment)) return platform;
  }
  const h = html.toLowerCase();
  for (const [platform, fingerprint] of HTML_FINGERPRINTS) {
    if (h.includes(fingerprint)) return platform;
  }
  return "generic";
}

/** The platform's selectors followed by any generic ones it doesn't already list. */
export function selectorProfileFor(platform: AtsPlatform): SelectorProfile {
  const own = ATS_PROFILES[platform];
  const generic = ATS_PROFILES.generic;
  const withFallback = (field: keyof SelectorProfile) => [
    ...own[field],
    ...generic[field].filter((sel) => !own[field].includes(sel)),
  ];
  return {
    title: withFallback("title"),
    company: withFallback("company"),
    location: withFallback("location"),
    description: withFallback("description"),
  };
}

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { SelectorProfile } from "@/lib/scraper/platform";
import { titleCase } from "@/lib/skills/normalize";

export type ExtractedContent = {
  job_title: string;
  company_name: string;
  location: string;
  description_text: string;
  description_html: string;
  benefits: string;
  company_description: string;
};

/** One way of resolving a field; null when it has nothing to offer. */
export type Strategy = () => string | null;

const PLACEHOLDER_PATTERNS = [
  /%[A-Z_]+%/i, // %HEADER_COMPANY_WEBSITE%
  /\{\{.*?\}\}/, // {{company_name}}
  /\[.*?\]/, // [COMPANY]
  /COMPANY_NAME/i,
  /PLACEHOLDER/i,
  /TBD/i,
  /TO_BE_DETERMINED/i,
];

/** Unrendered template text; empty strings count as placeholders too. */
export function isPlaceholderText(text: string | null | undefined): boolean {
  if (!text || !text.trim()) return true;
  return PLACEHOLDER_PATTERNS.some((re) => re.test(text));
}

/** Run strategies in order and return the first usable (non-empty, non-placeholder) value. */
export function firstSuccess(strategies: Strategy[]): string | null {
  for (const strategy of strategies) {
    const value = strategy()?.replace(/\s+/g, " ").trim();
    if (value && !isPlaceholderText(value)) return value;
  }
  return null;
}

function textOf($: CheerioAPI, selector: string): string | null {
  const text = $(selector).first().text().replace(/\s+/g, " ").trim();
  return text || null;
}

function selectorStrategies($: CheerioAPI, selectors: string[]): Strategy[] {
  return selectors.map((sel) => () => textOf($, sel));
}

function metaContent($: CheerioAPI, selector: string): string | null {
  const content = $(selector).first().attr("content")?.trim();
  return content || null;
}

function metaTagStrategies($: CheerioAPI): Strategy[] {
  return [
    () => metaContent($, 'meta[property="og:site_name"]'),
    () => metaContent($, 'meta[name="twitter:site"]')?.replace(/^@+/, "") ?? null,
    () => metaContent($, 'meta[name="application-name"]'),
  ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function organizationName(node: unknown, depth = 0): string | null {
  if (depth > 5) return null;
  if (Array.isArray(node)) {
    for (const item of node) {
      const name = organizationName(item, depth + 1);
      if (name) return name;
    }
    return null;
  }
  if (!isRecord(node)) return null;
  const obj = node;
  const type = obj["@type"];
  if (type === "Organization" && typeof obj.name === "string" && obj.name.trim()) {
    return obj.name;
  }
  if (type === "JobPosting") {
    const org = obj.hiringOrganization;
    if (isRecord(org) && typeof org.name === "string" && org.name.trim()) return org.name;
  }
  if (Array.isArray(obj["@graph"])) return organizationName(obj["@graph"], depth + 1);
  return null;
}

/** Organization / JobPosting.hiringOrganization from JSON-LD blocks. Unparsable blocks are skipped. */
export function companyFromStructuredData($: CheerioAPI): string | null {
  const blocks = $('script[type="application/ld+json"]').toArray();
  for (const block of blocks) {
    const raw = $(block).text().trim();
    if (!raw) continue;
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      continue; // malformed JSON-LD is common on career pages
    }
    const name = organizationName(data);
    if (name) return name;
  }
  return null;
}

/** "careers.acme-robotics.com" → "Acme Robotics". */
export function companyFromDomain(pageUrl: string): string | null {
  let host: string;
  try {
    host = new URL(pageUrl).hostname.toLowerCase();
  } catch {
    return null;
  }
  host = host.replace(/^(www\.|jobs\.|careers\.|apply\.)/, "");
  const company = titleCase(host.split(".")[0].replace(/[-_]/g, " "));
  return company.length > 2 ? company : null;
}

function companyFromCanonicalUrl($: CheerioAPI): string | null {
  const href =
    $('link[rel="canonical"]').first().attr("href") ??
    $('meta[property="og:url"]').first().attr("content");
  return href ? companyFromDomain(href) : null;
}

const TITLE_PATTERNS = [
  /(.+?)\s*-\s*Careers?/i,
  /(.+?)\s*-\s*Jobs?/i,
  /(.+?)\s*\|\s*Careers?/i,
  /(.+?)\s*\|\s*Jobs?/i,
  /Jobs?\s*at\s*(.+?)(?:\s*-|\s*\||$)/i,
  /Careers?\s*at\s*(.+?)(?:\s*-|\s*\||$)/i,
];

/** "Acme - Careers", "Jobs at Acme | Board" and similar page titles. */
export function companyFromPageTitle(title: string): string | null {
  for (const re of TITLE_PATTERNS) {
    const m = title.match(re);
    const company = m?.[1]?.trim();
    if (company && company.length > 2 && !isPlaceholderText(company)) return company;
  }
  return null;
}

export function extractCompanyName($: CheerioAPI, profile: SelectorProfile): string {
  return (
    firstSuccess([
      ...selectorStrategies($, profile.company),
      ...metaTagStrategies($),
      () => companyFromStructuredData($),
      () => companyFromCanonicalUrl($),
      () => companyFromPageTitle($("title").first().text()),
    ]) ?? "Unknown Company"
  );
}

export function cleanLocation(location: string): string {
  return location
    .replace(/%[A-Z_]+%/g, "")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^[•\-–\s]+|[•\-–\s]+$/g, "");
}

/** Template tokens are stripped first, so "%LOCATION% Remote" still yields "Remote". */
export function extractLocation($: CheerioAPI, profile: SelectorProfile): string {
  const cleaned = profile.location.map((sel) => () => {
    const raw = textOf($, sel);
    return raw ? cleanLocation(raw) : null;
  });
  return firstSuccess(cleaned) ?? "";
}

const BLOCK_TAGS = "p,div,li,ul,ol,section,article,h1,h2,h3,h4,h5,h6,tr,table,blockquote,pre";

/** Text with one line per block element; list items become "• item" lines. */
export function blockText(html: string): string {
  const $ = cheerio.load(html);
  $("script,style,noscript").remove();
  $("li").each((_, li) => {
    $(li).prepend("• ");
  });
  $("br").replaceWith("\n");
  $(BLOCK_TAGS).each((_, el) => {
    $(el).prepend("\n").append("\n");
  });
  const lines = $.root()
    .text()
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter(Boolean);

  // A list item whose content sits in its own block leaves a lone bullet line.
  const merged: string[] = [];
  for (let i = 0; i < lines.length; i++) {
    if (lines[i] === "•" && i + 1 < lines.length) {
      merged.push(`• ${lines[++i]}`);
    } else {
      merged.push(lines[i]);
    }
  }
  return merged.join("\n");
}

function extractDescription($: CheerioAPI, selectors: string[]): { html: string; text: string } {
  for (const sel of selectors) {
    const el = $(sel).first();
    if (el.length === 0) continue;
    const html = $.html(el);
    return { html, text: blockText(html) };
  }
  return { html: "", text: "" };
}

/** Text of the siblings after the first heading matching a keyword, up to the next heading. */
export function extractSection($: CheerioAPI, keywords: string[]): string {
  const headings = $("h1,h2,h3,h4").toArray();
  for (const keyword of keywords) {
    const re = new RegExp(keyword, "i");
    const heading = headings.find((h) => re.test($(h).text()));
    if (!heading) continue;
    const content: string[] = [];
    $(heading)
      .nextAll()
      .each((_, sib) => {
        if ($(sib).is("h1,h2,h3,h4")) return false;
        const text = $(sib).text().replace(/\s+/g, " ").trim();
        if (text) content.push(text);
        return undefined;
      });
    return content.join("\n");
  }
  return "";
}

/**
 * Pull the structured fields out of a job page. Never throws: anything that
 * cannot be found resolves to an "Unknown …" label or an empty string.
 */
export function extractJobContent(html: string, profile: SelectorProfile): ExtractedContent {
  const $ = cheerio.load(html);
  const description = extractDescription($, profile.description);

  return {
    job_title: firstSuccess(selectorStrategies($, profile.title)) ?? "Unknown Position",
    company_name: extractCompanyName($, profile),
    location: extractLocation($, profile),
    description_text: description.text,
    description_html: description.html,
    benefits: extractSection($, ["benefits", "perks", "what we offer"]),
    company_description: extractSection($, ["about us", "about the company", "company"]),
  };
}

// lib/templateMatcher.ts

import { Template } from "./types";

export const MATCH_THRESHOLD = 30;

export const SCORE_WEIGHTS = {
  fullName: 100,
  nameWord: 30,
  descriptionWord: 10,
  alias: 50,
  intentMultiplier: 1.5,
} as const;

// Key term found in a template name -> phrases users say instead.
export const TEMPLATE_ALIASES: Record<string, string[]> = {
  nda: ["non-disclosure", "non disclosure", "confidentiality", "confidential agreement", "secrecy agreement"],
  contract: ["agreement", "deal", "terms"],
  invoice: ["bill", "billing", "payment"],
  letter: ["correspondence", "mail"],
  proposal: ["offer", "pitch", "quotation"],
  resume: ["cv", "curriculum vitae"],
  employment: ["job", "hiring", "work"],
};

export const CREATION_KEYWORDS = [
  "create",
  "make",
  "generate",
  "draft",
  "write",
  "prepare",
  "need",
  "want",
  "help me with",
  "can you",
  "let's",
  "lets",
];

export function hasCreationIntent(text: string): boolean {
  const lower = text.toLowerCase();
  return CREATION_KEYWORDS.some((keyword) => lower.includes(keyword));
}

export function scoreTemplate(template: Template, text: string): number {
  const input = text.toLowerCase();
  const name = template.name.toLowerCase();
  const description = (template.description ?? "").toLowerCase();

  let score = 0;

  if (input.includes(name)) {
    score += SCORE_WEIGHTS.fullName;
  }

  for (const word of name.split(/\s+/)) {
    if (word.length > 2 && input.includes(word)) {
      score += SCORE_WEIGHTS.nameWord;
    }
  }

  for (const word of description.split(/\s+/)) {
    if (word.length > 3 && input.includes(word)) {
      score += SCORE_WEIGHTS.descriptionWord;
    }
  }

  for (const [key, aliases] of Object.entries(TEMPLATE_ALIASES)) {
    if (!name.includes(key)) continue;
    for (const alias of aliases) {
      if (input.includes(alias)) {
        score += SCORE_WEIGHTS.alias;
      }
    }
  }

  if (score > 0 && hasCreationIntent(input)) {
    score = Math.floor(score * SCORE_WEIGHTS.intentMultiplier);
  }

  return score;
}

/**
 * Pick the active template that best fits a free-text request. Ties keep the
 * earlier template; anything under MATCH_THRESHOLD is no match.
 */
export function matchTemplate(text: string, templates: Template[]): Template | null {
  let best: Template | null = null;
  let bestScore = 0;

  for (const template of templates) {
    if (!template.isActive) continue;

    const score = scoreTemplate(template, text);
    if (score > bestScore) {
      bestScore = score;
      best = template;
    }
  }

  return bestScore >= MATCH_THRESHOLD ? best : null;
}

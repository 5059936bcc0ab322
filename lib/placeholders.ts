// lib/placeholders.ts

import { PlaceholderMap } from "./types";

/**
 * Turn a template body into plain text. Bodies saved by the rich-text editor
 * are a delta array (`[{ "insert": "..." }, ...]`); anything else, including
 * malformed JSON, is already plain text.
 */
export function flattenTemplateContent(content: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return content;
  }

  if (!Array.isArray(parsed)) {
    return content;
  }

  const ops: unknown[] = parsed;
  const parts: string[] = [];
  for (const op of ops) {
    if (op && typeof op === "object" && "insert" in op && typeof op.insert === "string") {
      parts.push(op.insert);
    }
  }
  return parts.join("");
}

// {field}, {{field}}, [Field Name], <field>. Applied in order; a later rule
// overwrites the description of a key an earlier rule already produced.
const SYNTAX_RULES: RegExp[] = [
  /\{+([a-zA-Z_][a-zA-Z0-9_ ]*)\}+/g,
  /\[([A-Za-z][A-Za-z0-9 _]+)\]/g,
  /<([a-zA-Z_][a-zA-Z0-9_]*)>/g,
];

interface CommonFieldRule {
  field: string;
  synonyms: string;
}

// Well-known legal/business fields, detected when a synonym sits right before
// a blank such as "Address: ______" or "Effective Date: [".
const COMMON_FIELDS: CommonFieldRule[] = [
  { field: "party_a", synonyms: String.raw`party\s*a|first\s*party|disclosing\s*party` },
  { field: "party_b", synonyms: String.raw`party\s*b|second\s*party|receiving\s*party` },
  { field: "effective_date", synonyms: String.raw`effective\s*date|date\s*of\s*agreement` },
  { field: "company_name", synonyms: String.raw`company\s*name` },
  { field: "your_name", synonyms: String.raw`your\s*name|client\s*name` },
  { field: "address", synonyms: String.raw`address` },
  { field: "amount", synonyms: String.raw`amount|sum|payment` },
];

const BLANK_MARKER = String.raw`[:\s]*[_\[{<]`;

export function normalizeFieldName(raw: string): string {
  return raw.trim().replace(/ /g, "_").toLowerCase();
}

export function extractPlaceholders(templateText: string): PlaceholderMap {
  // a Map keeps keys such as "constructor" or "__proto__" as plain fields
  const placeholders = new Map<string, string>();

  for (const pattern of SYNTAX_RULES) {
    for (const match of templateText.matchAll(pattern)) {
      const captured = match[1];
      placeholders.set(normalizeFieldName(captured), `Value for ${captured}`);
    }
  }

  const lower = templateText.toLowerCase();
  for (const { field, synonyms } of COMMON_FIELDS) {
    if (placeholders.has(field)) continue;
    if (new RegExp(`(?:${synonyms})${BLANK_MARKER}`).test(lower)) {
      placeholders.set(field, `Please provide the ${field.replace(/_/g, " ")}`);
    }
  }

  return Object.fromEntries(placeholders);
}

/** Flatten then extract, for callers holding a stored template body. */
export function extractTemplateFields(content: string): { text: string; fields: PlaceholderMap } {
  const text = flattenTemplateContent(content);
  return { text, fields: extractPlaceholders(text) };
}

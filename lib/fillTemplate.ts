// lib/fillTemplate.ts

import { FieldValues } from "./types";

/** "client_name" -> "Client_Name" */
export function capitalizeWords(fieldName: string): string {
  return fieldName
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

/** "client_name" -> "Client Name" */
export function toTitleCase(fieldName: string): string {
  return capitalizeWords(fieldName).replace(/_/g, " ");
}

/** Strings and numbers as written; objects and arrays as JSON. */
export function renderValue(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

/** Every spelling of a field's placeholder that the filler replaces. */
export function placeholderVariants(fieldName: string): string[] {
  const spaced = fieldName.replace(/_/g, " ");
  const title = toTitleCase(fieldName);
  const upper = fieldName.toUpperCase();

  return [
    `{${fieldName}}`,
    `{${spaced}}`,
    `{${upper}}`,
    `{${title}}`,
    `{${capitalizeWords(fieldName)}}`,
    `[${fieldName}]`,
    `[${title}]`,
    `[${upper}]`,
    `<${fieldName}>`,
  ];
}

export function fillTemplate(templateText: string, values: FieldValues): string {
  let result = templateText;

  for (const [fieldName, value] of Object.entries(values)) {
    const replacement = renderValue(value);
    for (const pattern of placeholderVariants(fieldName)) {
      // function replacer keeps "$&" and friends in values literal
      result = result.replaceAll(pattern, () => replacement);
    }
  }

  return result;
}

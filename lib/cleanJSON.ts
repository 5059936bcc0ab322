export const JSON_FENCE = "```json";
const FENCE_CLOSE = "```";

/** Text between the first ```json fence and the fence that closes it. */
export function extractJsonBlock(text: string): string | null {
  const start = text.indexOf(JSON_FENCE);
  if (start === -1) {
    return null;
  }

  const bodyStart = start + JSON_FENCE.length;
  const end = text.indexOf(FENCE_CLOSE, bodyStart);
  return (end === -1 ? text.slice(bodyStart) : text.slice(bodyStart, end)).trim();
}

/** Parse the first fenced JSON block of a model reply; null when absent or invalid. */
export function cleanJSON(text: string): unknown {
  const block = extractJsonBlock(text);
  if (block === null) {
    return null;
  }

  try {
    return JSON.parse(block);
  } catch (err) {
    console.error("Failed to parse JSON block from model output:", block, err);
    return null;
  }
}

/** Everything a reply says before its JSON block. */
export function stripJsonBlock(text: string): string {
  const start = text.indexOf(JSON_FENCE);
  return (start === -1 ? text : text.slice(0, start)).trim();
}

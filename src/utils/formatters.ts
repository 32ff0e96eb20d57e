import stringWidth from "string-width";

/**
 * Pure formatting utility functions
 */

/**
 * Truncate text to a terminal display width, ending with an ellipsis
 */
export function truncate(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (stringWidth(text) <= maxWidth) return text;

  let out = "";
  for (const ch of text) {
    if (stringWidth(`${out}${ch}…`) > maxWidth) break;
    out += ch;
  }
  return `${out}…`;
}

/**
 * Keep the first `maxLines` lines, noting how many were dropped
 */
export function clipLines(text: string, maxLines: number): string {
  const lines = text.replace(/\s+$/, "").split("\n");
  if (lines.length <= maxLines) return lines.join("\n");
  const keep = Math.max(0, maxLines - 1);
  const hidden = lines.length - keep;
  return [...lines.slice(0, keep), `… (${hidden} more lines)`].join("\n");
}

export function sessionHeader(
  context: string | null,
  namespace: string,
): string {
  return ` Context: ${context ?? "None"} | Namespace: ${namespace} `;
}

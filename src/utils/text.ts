/** Discord embed limits. */
export const EMBED_DESCRIPTION_LIMIT = 4096;
export const EMBED_FIELD_LIMIT = 1024;

export function truncate(value: string, max: number): string {
  if (!value) return "";
  if (value.length <= max) return value;
  return `${value.slice(0, max - 3)}...`;
}

/**
 * Joins lines with "\n", keeping whole lines only. When they do not all fit in
 * `max`, the kept lines are followed by "…and N more."
 */
export function joinWithinLimit(lines: readonly string[], max: number): string {
  const full = lines.join("\n");
  if (full.length <= max) return full;

  // Reserve room for the widest possible tail.
  const reserve = `\n…and ${lines.length} more.`.length;
  const kept: string[] = [];
  let length = 0;
  for (const line of lines) {
    const next = length + (kept.length > 0 ? 1 : 0) + line.length;
    if (next + reserve > max) break;
    kept.push(line);
    length = next;
  }

  const tail = `…and ${lines.length - kept.length} more.`;
  return kept.length > 0 ? `${kept.join("\n")}\n${tail}` : tail;
}

/**
 * Discord timestamp markup (`<t:unix:f>`), rendered by the client in the
 * reader's locale.
 */
export function discordTimestamp(date: Date, style: "f" | "d" | "R" = "f"): string {
  return `<t:${Math.floor(date.getTime() / 1000)}:${style}>`;
}

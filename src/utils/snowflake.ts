const SNOWFLAKE_PATTERN = /^\d{17,20}$/;
const MENTION_PATTERN = /^<@!?(\d{17,20})>$/;

export const normalizeSnowflake = (value: unknown): string | null => {
  if (value == null) return null;
  const str = String(value).trim();
  const mention = MENTION_PATTERN.exec(str);
  if (mention) return mention[1];
  if (!SNOWFLAKE_PATTERN.test(str)) return null;
  return str;
};

export interface ParsedSnowflakes {
  /** Unique ids in the order they were first given. */
  ids: string[];
  /** Tokens that are neither a raw id nor a user mention. */
  invalid: string[];
}

/**
 * Splits free text ("123 <@456>, 789") into snowflakes. Accepts raw ids and
 * user mentions separated by whitespace or commas.
 */
export function parseSnowflakeList(input: string): ParsedSnowflakes {
  const ids: string[] = [];
  const invalid: string[] = [];

  for (const token of input.split(/[\s,]+/)) {
    if (!token) continue;
    const id = normalizeSnowflake(token);
    if (!id) {
      invalid.push(token);
      continue;
    }
    if (!ids.includes(id)) ids.push(id);
  }

  return { ids, invalid };
}

const DISCORD_EPOCH = 1420070400000n;

/** Creation time (epoch ms) encoded in a snowflake. */
export const snowflakeTimestamp = (id: string): number =>
  Number((BigInt(id) >> 22n) + DISCORD_EPOCH);

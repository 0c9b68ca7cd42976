export const DEFAULT_MAX_TITLE_LENGTH = 40;

// A single character, so a truncated title never grows a separator
export const ELLIPSIS = "…";

const BOUNDARY = "[\\s._\\-()\\[\\]]";
const FILE_EXTENSION = /(?<=\S)\.(?:mkv|mp4|m4v|avi|mov|wmv|ts|nzb)$/i;
// Release names join words with dots or underscores ("Movie.Name.2020")
const WORD_JOINER = /(?<=\S)[._](?=\S)/g;
const LEADING_SEPARATORS = /^[\s._\-([]+/;
const TRAILING_SEPARATORS = /[\s._\-([]+$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function joinWords(value: string): string {
  return value.replace(WORD_JOINER, " ").replace(/\s+/g, " ");
}

function keywordPattern(keywords: readonly string[]): RegExp | null {
  const alternatives = keywords
    .map((keyword) => joinWords(keyword.trim()))
    .filter((keyword) => keyword.length > 0)
    .map(escapeRegExp);
  if (alternatives.length === 0) return null;
  return new RegExp(`(?:^|(?<=${BOUNDARY}))(?:${alternatives.join("|")})(?=$|${BOUNDARY})`, "i");
}

function trimSeparators(value: string): string {
  return value.replace(LEADING_SEPARATORS, "").replace(TRAILING_SEPARATORS, "");
}

/**
 * Cuts a download or media title at the first configured keyword
 * (matched case-insensitively as a whole token), turns dotted release
 * names into words and caps the result at `maxLen` characters plus
 * {@link ELLIPSIS}.
 *
 * @example
 * normalizeTitle("Movie.Name.German.1080p.mkv", ["German", "1080p"], 40) // "Movie Name"
 */
export function normalizeTitle(rawTitle: string, keywords: readonly string[], maxLen: number): string {
  // Keywords are searched in the joined form, so "German DL" matches "German.DL"
  let title = joinWords(rawTitle.trim().replace(FILE_EXTENSION, ""));

  const match = keywordPattern(keywords)?.exec(title);
  if (match) {
    title = title.slice(0, match.index);
  }

  title = trimSeparators(title);

  if (title.length > maxLen) {
    title = title.slice(0, maxLen).replace(TRAILING_SEPARATORS, "") + ELLIPSIS;
  }
  return title;
}

export type TitleNormalizer = (rawTitle: string) => string;

export function createTitleNormalizer(keywords: readonly string[], maxLen = DEFAULT_MAX_TITLE_LENGTH): TitleNormalizer {
  const rules = [...keywords];
  return (rawTitle) => normalizeTitle(rawTitle, rules, maxLen);
}

import { TEXT_SUBSTITUTIONS } from "../constants.js";

export type SanitizeOptions = {
  maxWordLen: number;
};

export type PrepareOptions = SanitizeOptions & {
  emptyTextPlaceholder: string;
};

export type SanitizeResult = {
  text: string;
  /** Labels of the fixes applied, in the order they ran */
  fixes: string[];
};

/**
 * Make text safe for the tagger's line-oriented input: line breaks, tabs and
 * odd whitespace are substituted, and space-separated words longer than
 * `maxWordLen` are cut.
 */
export function sanitizeText(text: string, options: SanitizeOptions): SanitizeResult {
  const fixes: string[] = [];
  let sanitized = text;

  for (const { pattern, replacement, label } of TEXT_SUBSTITUTIONS) {
    if (!sanitized.includes(pattern)) continue;
    sanitized = sanitized.split(pattern).join(replacement);
    fixes.push(label);
  }

  let truncated = 0;
  // Word length counts code points, so a cut never splits a surrogate pair
  const tokens = sanitized.split(" ").map((token) => {
    const chars = Array.from(token);
    if (chars.length <= options.maxWordLen) return token;
    truncated++;
    return chars.slice(0, options.maxWordLen).join("");
  });
  if (truncated > 0) {
    sanitized = tokens.join(" ");
    fixes.push("long_word");
  }

  return { text: sanitized, fixes };
}

export function prepareTaggerInput(text: string, options: PrepareOptions): SanitizeResult {
  const result = sanitizeText(text.trim(), options);
  if (result.text.length > 0) return result;
  return {
    text: options.emptyTextPlaceholder,
    fixes: [...result.fixes, "empty_text"],
  };
}

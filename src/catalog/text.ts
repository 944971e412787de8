/**
 * Item-name normalization and token similarity used by the resolver.
 */

/** Lowercase, punctuation to spaces, collapsed whitespace. */
export function normalizeName(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Trimmed display form of a raw name (inner whitespace collapsed). */
export function displayName(raw: string): string {
  return raw.replace(/\s+/g, ' ').trim();
}

// Plural and singular forms of a word count as the same token
function stem(token: string): string {
  return token.length > 3 && token.endsWith('s') ? token.slice(0, -1) : token;
}

export function tokenize(raw: string): string[] {
  const normalized = normalizeName(raw);
  return normalized ? normalized.split(' ').map(stem) : [];
}

/**
 * Longest common token subsequence over the longer token list, in [0, 1].
 */
export function tokenSimilarity(a: string, b: string): number {
  const ta = tokenize(a);
  const tb = tokenize(b);
  if (ta.length === 0 || tb.length === 0) return 0;

  const dp: number[][] = Array.from({ length: ta.length + 1 }, () =>
    new Array<number>(tb.length + 1).fill(0),
  );
  for (let i = 1; i <= ta.length; i++) {
    for (let j = 1; j <= tb.length; j++) {
      dp[i][j] =
        ta[i - 1] === tb[j - 1] ? dp[i - 1][j - 1] + 1 : Math.max(dp[i - 1][j], dp[i][j - 1]);
    }
  }
  return dp[ta.length][tb.length] / Math.max(ta.length, tb.length);
}

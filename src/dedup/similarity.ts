export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function sortTokens(value: string): string {
  const cleaned = normalizeWhitespace(value.toLowerCase());
  if (!cleaned) return "";
  return cleaned.split(" ").sort().join(" ");
}

function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  // Two rolling rows over the shorter string
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
  let previous = new Array<number>(inner.length + 1).fill(0);
  let current = new Array<number>(inner.length + 1).fill(0);

  for (let i = 1; i <= outer.length; i += 1) {
    for (let j = 1; j <= inner.length; j += 1) {
      current[j] =
        outer[i - 1] === inner[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[inner.length];
}

/** Indel-normalized similarity in [0, 100]. */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (200 * longestCommonSubsequence(a, b)) / total;
}

/**
 * Order-insensitive similarity: "Engineer Software" and "software engineer"
 * score 100.
 */
export function tokenSortRatio(a: string, b: string): number {
  return ratio(sortTokens(a), sortTokens(b));
}

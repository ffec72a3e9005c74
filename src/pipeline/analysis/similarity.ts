const CYRILLIC = /[А-Яа-яІіЇїЄєҐґЁё]/;

export function containsCyrillic(text: string): boolean {
  return CYRILLIC.test(text);
}

function words(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter(Boolean);
}

function lcsLength(a: readonly string[], b: readonly string[]): number {
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] = a[i - 1] === b[j - 1]
        ? (prev[j - 1] ?? 0) + 1
        : Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length] ?? 0;
}

/**
 * 2 * matched / total over lowercase words, where matched is the longest
 * common word subsequence. 1 for two empty texts.
 */
export function similarityRatio(a: string, b: string): number {
  const left = words(a);
  const right = words(b);
  const total = left.length + right.length;
  if (total === 0) return 1;
  return (2 * lcsLength(left, right)) / total;
}

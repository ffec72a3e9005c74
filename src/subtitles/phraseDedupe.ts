const MAX_PERIOD = 18;
const MIN_PERIOD = 3;
const MIN_TOKENS = 6;

/**
 * Comparison key for a token: lowercase, straight quotes, leading/trailing
 * punctuation removed. Inner apostrophes survive ("don't" stays "don't").
 */
export function normalizeToken(token: string): string {
  return token
    .toLowerCase()
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/^[.,!?;:()[\]{}"']+/, "")
    .replace(/[.,!?;:()[\]{}"']+$/, "");
}

function windowsEqual(norm: string[], a: number, b: number, period: number): boolean {
  for (let k = 0; k < period; k++) {
    if (norm[a + k] !== norm[b + k]) return false;
  }
  return true;
}

/**
 * Collapse runs of a repeated phrase down to one instance.
 *
 * Windows go from 18 tokens down to 3 so long repeated sentences are
 * collapsed before their own sub-phrases are looked at. After a deletion the
 * cursor stays put: the splice can expose another repeat at the same spot.
 * Non-consecutive repeats are left alone.
 */
export function collapseConsecutiveRepeatedPhrases(text: string): string {
  if (!text) return text;

  const spaced = text.replace(/[ \t]+/g, " ");
  const tokens = spaced.split(/\s+/).filter(Boolean);
  if (tokens.length < MIN_TOKENS) return spaced;

  const norm = tokens.map(normalizeToken);

  for (let period = MAX_PERIOD; period >= MIN_PERIOD; period--) {
    if (period > Math.floor(tokens.length / 2)) continue;

    let i = 0;
    while (i + 2 * period <= tokens.length) {
      if (!windowsEqual(norm, i, i + period, period)) {
        i += 1;
        continue;
      }

      let j = i + period;
      while (j + period <= tokens.length && windowsEqual(norm, j, i, period)) {
        j += period;
      }

      tokens.splice(i + period, j - (i + period));
      norm.splice(i + period, j - (i + period));
    }
  }

  return tokens.join(" ");
}

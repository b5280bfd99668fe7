/**
 * Heuristic rewrites of speech transcripts into the text a field expects.
 * Typed answers never go through here.
 */

type TranscriptRule = {
  marker: string;
  apply: (transcript: string) => string;
};

// Order matters: "the rate" must go before "at rate", which must go before " at ".
const EMAIL_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ["the rate", ""],
  ["at rate", "@"],
  [" at ", "@"],
  [" dot ", "."],
  ["dot", "."],
];

const LIST_SEPARATOR_WORDS = new Set(["and", "comma"]);

export function normalizeAge(transcript: string): string {
  return transcript.toLowerCase().replace(/\D/g, "");
}

export function normalizeEmail(transcript: string): string {
  let result = transcript.toLowerCase();
  for (const [spoken, symbol] of EMAIL_REPLACEMENTS) {
    result = result.replaceAll(spoken, symbol);
  }
  return result.replace(/\s+/g, "");
}

/**
 * Turns "python and go comma rust" into "python, go, rust".
 * "and"/"comma" only separate when they sit between two other words, which
 * keeps the output a fixed point of this function.
 */
export function normalizeSkills(transcript: string): string {
  const tokens = transcript
    .toLowerCase()
    .replaceAll(",", " , ")
    .split(/\s+/)
    .filter(Boolean);

  const items: string[] = [];
  let current: string[] = [];
  tokens.forEach((token, i) => {
    const inner = i > 0 && i < tokens.length - 1;
    if (token === "," || (inner && LIST_SEPARATOR_WORDS.has(token))) {
      items.push(current.join(" "));
      current = [];
    } else {
      current.push(token);
    }
  });
  items.push(current.join(" "));

  return items.join(", ");
}

const RULES: readonly TranscriptRule[] = [
  { marker: "age", apply: normalizeAge },
  { marker: "email", apply: normalizeEmail },
  { marker: "skills", apply: normalizeSkills },
];

/** Picks a rule by the first marker found in the prompt; no marker, no change. */
export function normalizeTranscript(prompt: string, transcript: string): string {
  const lowered = prompt.toLowerCase();
  const rule = RULES.find((r) => lowered.includes(r.marker));
  return rule ? rule.apply(transcript) : transcript;
}

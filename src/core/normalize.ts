const COMBINING_MARKS = /\p{Mn}/gu;

/**
 * Canonical form of a tag category or value: trimmed, case-folded and with
 * accents stripped, so "Sébastien" and "sebastien" compare equal.
 */
export function normalizeToken(value: string | null | undefined): string {
  const text = foldCase(value ?? "").trim();
  if (!text) return "";
  // compatibility decomposition can surface uppercase letters (e.g. U+210C), fold again
  return foldCase(text.normalize("NFKD").replace(COMBINING_MARKS, "")).trim();
}

// full case mapping through upper case, so "ß" and "SS" both end up as "ss"
function foldCase(text: string): string {
  return text.toUpperCase().toLowerCase();
}

export function splitCsv(value: string | null | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map(part => part.trim())
    .filter(Boolean);
}

/**
 * Removes accents and diacritics from a string
 * Examples: "á" -> "a", "é" -> "e", "ñ" -> "n", "ü" -> "u"
 */
export function removeAccents(str: string): string {
  return str
    .normalize("NFD") // Decompose characters into base + combining marks
    .replace(/[\u0300-\u036f]/g, ""); // Remove combining diacritical marks
}

/**
 * Canonical form used to compare filenames with feed titles
 * Examples: "Don't Panic!" -> "dont panic", "Rock & Roll" -> "rock and roll",
 * "Эпизод Москва 2020" -> "эпизод москва 2020"
 */
export function normalizeForMatch(text: string): string {
  let normalized = removeAccents(text).toLowerCase();

  normalized = normalized.replace(/&/g, " and ");

  // Apostrophes join words instead of splitting them: "don't" -> "dont"
  normalized = normalized.replace(/['\u2019\u2018`]/g, "");

  // Everything else that isn't a letter or digit (in any script) becomes a single space
  normalized = normalized.replace(/[^\p{L}\p{N}]+/gu, " ");

  return normalized.trim();
}

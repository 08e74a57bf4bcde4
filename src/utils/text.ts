export function stripDiacritics(input: string): string {
  return input.normalize("NFD").replace(/\p{M}+/gu, "");
}

export function normalizeText(input: string): string {
  return stripDiacritics(input).toLowerCase();
}

export function tokenize(input: string): string[] {
  return normalizeText(input)
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

export function naturalCompare(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true, sensitivity: "base" });
}

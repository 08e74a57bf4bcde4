import { InvalidInputError } from "../errors";
import { tokenize } from "./text";

const STOP_WORDS = new Set(["a", "an", "the", "with", "for", "to", "in", "on", "at", "of", "and", "or", "my", "our"]);

const MAX_SLUG_WORDS = 4;
const MAX_SLUG_LENGTH = 50;

export const SLUG_PATTERN = /^[a-z0-9]+(-[a-z0-9]+)*$/;

export function deriveSlug(request: string): string {
  const words = tokenize(request)
    .filter((word) => /^[a-z0-9]+$/.test(word))
    .filter((word) => !STOP_WORDS.has(word) && word.length > 2);
  const slug = words.slice(0, MAX_SLUG_WORDS).join("-").slice(0, MAX_SLUG_LENGTH).replace(/-+$/, "");
  return slug || "feature";
}

export function normalizeSlug(input: string): string {
  const slug = tokenize(input)
    .filter((word) => /^[a-z0-9]+$/.test(word))
    .join("-")
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, "");
  if (!SLUG_PATTERN.test(slug)) {
    throw new InvalidInputError(`Slug "${input}" has no usable characters; use letters, numbers and '-'.`);
  }
  return slug;
}

export function normalizeWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === "";
}

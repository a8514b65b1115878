export function normalizeText(input: string): string {
  return input
    .replace(/\u0000+/g, "")
    .replace(/\r\n|\r|\n|\t/g, " ")
    .replace(/ {2,}/g, " ")
    .trim();
}

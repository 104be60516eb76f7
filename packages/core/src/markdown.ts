const EMPHASIS = ["*", "_"];
const BACKSLASHED = ["\\", "[", "]", "^", "~~"];

const numericEntity = (char: string): string =>
  `&#${String(char.charCodeAt(0)).padStart(4, "0")};`;

/** Neutralises Markdown in text pulled from beatmap metadata. */
export function escapeMarkdown(text: string): string {
  let escaped = text;
  for (const char of EMPHASIS) {
    escaped = escaped.replaceAll(char, numericEntity(char));
  }
  // backslash goes first so the escapes added after it survive
  for (const token of BACKSLASHED) {
    escaped = escaped.replaceAll(token, `\\${token}`);
  }
  return escaped;
}

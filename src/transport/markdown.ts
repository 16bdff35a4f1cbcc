/**
 * Telegram MarkdownV2 escaping and caption formatting.
 */

/** Bot API limit for document captions, counted after entity parsing. */
export const CAPTION_LIMIT = 1024;

const SPECIAL = /[_*[\]()~`>#+\-=|{}.!\\]/g;

export function escapeMarkdownV2(text: string): string {
  return text.replace(SPECIAL, (ch) => `\\${ch}`);
}

/** Inside ``` blocks only backslash and backtick need escaping. */
export function codeBlock(text: string): string {
  return "```\n" + text.replace(/[`\\]/g, (ch) => `\\${ch}`) + "\n```";
}

export interface CaptionInput {
  filename: string;
  encrypted: boolean;
  part?: { index: number; total: number };
}

/** Lengths are UTF-16 code units, as the Bot API counts them; pairs are never split. */
function shorten(name: string, max: number): string {
  if (name.length <= max) return name;
  let out = "";
  for (const ch of name) {
    if (out.length + ch.length > max - 1) break;
    out += ch;
  }
  return `${out}…`;
}

export function formatCaption(input: CaptionInput): string {
  const status = input.encrypted ? "🔒 Encrypted" : "🔓 Not encrypted";
  const marker = input.part ? `\n(Part ${input.part.index}/${input.part.total})` : "";
  const fixed = `File: \n${status}${marker}`;
  const name = shorten(input.filename, CAPTION_LIMIT - fixed.length);
  return escapeMarkdownV2(`File: ${name}\n${status}${marker}`);
}

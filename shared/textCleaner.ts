import { GLYPH_MAP } from "./glyphs";

/**
 * Strip terminal escape sequences and flatten box-drawing glyphs to ASCII.
 * Works on one line at a time; nothing here touches I/O.
 */

const ESC = "\u001b";

export interface CleanResult {
  text: string;
  escapesRemoved: number;
  glyphsReplaced: number;
}

function isParameterChar(ch: string): boolean {
  return (ch >= "0" && ch <= "9") || ch === ";";
}

function isAsciiLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

/**
 * Remove every `ESC [ <digits and ;> <letter>` sequence, leftmost first.
 * A candidate without its final letter is kept as-is.
 */
function scanEscapes(line: string): { text: string; removed: number } {
  if (!line.includes(ESC)) return { text: line, removed: 0 };

  let out = "";
  let copyFrom = 0;
  let removed = 0;
  let i = 0;

  while (i < line.length) {
    if (line[i] !== ESC || line[i + 1] !== "[") {
      i++;
      continue;
    }

    let end = i + 2;
    while (end < line.length && isParameterChar(line[end])) end++;

    if (end < line.length && isAsciiLetter(line[end])) {
      out += line.slice(copyFrom, i);
      copyFrom = end + 1;
      removed++;
      i = end + 1;
    } else {
      i++;
    }
  }

  return { text: out + line.slice(copyFrom), removed };
}

function substituteGlyphs(text: string): { text: string; replaced: number } {
  let out = "";
  let replaced = 0;

  for (const ch of text) {
    const ascii = GLYPH_MAP.get(ch);
    if (ascii === undefined) {
      out += ch;
    } else {
      out += ascii;
      replaced++;
    }
  }

  return { text: out, replaced };
}

export function stripEscapeSequences(line: string): string {
  return scanEscapes(line).text;
}

export function remapGlyphs(line: string): string {
  return substituteGlyphs(line).text;
}

export function cleanTextWithStats(line: string): CleanResult {
  const stripped = scanEscapes(line);
  const remapped = substituteGlyphs(stripped.text);
  return {
    text: remapped.text,
    escapesRemoved: stripped.removed,
    glyphsReplaced: remapped.replaced,
  };
}

export function cleanText(line: string): string {
  return cleanTextWithStats(line).text;
}

/**
 * Clean lines in arrival order, one result per input line.
 */
export async function* cleanLines(lines: AsyncIterable<string>): AsyncGenerator<CleanResult> {
  for await (const line of lines) {
    yield cleanTextWithStats(line);
  }
}

/**
 * Unicode box-drawing glyphs and their ASCII stand-ins.
 * Source sets are disjoint, so each glyph maps to exactly one replacement.
 */

const GLYPH_GROUPS: ReadonlyArray<readonly [ascii: string, glyphs: string]> = [
  // Light corners, tees and crosses
  ["+", "├┤└┌┐┘┬┴┼╭╮╯╰"],
  // Double and mixed-weight corners and junctions
  ["+", "╒╓╔╕╖╗╘╙╚╛╜╝╞╟╠╡╢╣╤╥╦╧╨╩╪╫╬"],
  ["-", "─╴╶╸╺╼╾"],
  ["|", "│║╵╷╹╻╽╿"],
  ["=", "═"],
  ["/", "╱"],
  ["\\", "╲"],
  ["X", "╳"],
];

export const GLYPH_MAP: ReadonlyMap<string, string> = new Map(
  GLYPH_GROUPS.flatMap(([ascii, glyphs]) => Array.from(glyphs, (glyph): [string, string] => [glyph, ascii]))
);

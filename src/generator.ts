import type { TranslationUnit } from './transformer.js';

/**
 * Serialize a translation unit as sketch source.
 *
 * Layout: includes, blank line, macros, blank line, top-level statements,
 * blank line, then each function block followed by a blank line. The blank
 * separators are always written, even for empty sections, so output diffs
 * stay stable.
 *
 * @param unit - Output of `Transformer.transform`
 * @returns Sketch source ending in a single newline
 */
export function generateSketch(unit: TranslationUnit): string {
  const lines: string[] = [
    ...unit.includes.map(header => `#include "${header}"`),
    '',
    ...unit.macros,
    '',
    ...unit.statements,
    ''
  ];

  for (const fn of unit.functions) {
    lines.push(...fn.lines, '');
  }

  return lines.join('\n');
}

import { INDENT } from './statement-translator.js';

export const SETUP = 'setup';
export const LOOP = 'loop';

export interface FunctionBlock {
  name: string;
  lines: string[];
}

export interface EntryPointOptions {
  /** Give a synthesized `loop()` a call to every other procedure */
  autoLoop: boolean;
}

/**
 * Guarantee exactly one `setup()` and one `loop()`.
 *
 * @param functions - Translated procedures in declaration order
 * @returns `setup`, then the other procedures, then `loop`
 */
export function synthesizeEntryPoints(
  functions: Map<string, string[]>,
  options: EntryPointOptions
): FunctionBlock[] {
  const others: FunctionBlock[] = [];
  for (const [name, lines] of functions) {
    if (name !== SETUP && name !== LOOP) {
      others.push({ name, lines });
    }
  }

  const setup = functions.get(SETUP) ?? [`void ${SETUP}() {}`];
  const loop = functions.get(LOOP) ?? synthesizeLoop(others, options);

  return [
    { name: SETUP, lines: setup },
    ...others,
    { name: LOOP, lines: loop }
  ];
}

function synthesizeLoop(others: FunctionBlock[], options: EntryPointOptions): string[] {
  if (!options.autoLoop || others.length === 0) {
    return [`void ${LOOP}() {}`];
  }
  return [
    `void ${LOOP}() {`,
    ...others.map(fn => `${INDENT}${fn.name}();`),
    '}'
  ];
}

import { parse } from 'py-ast';
import { MalformedInputError } from './errors.js';

function numericField(error: object, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'number') {
      return value;
    }
  }
  return undefined;
}

/**
 * Parse Python source code into a py-ast tree.
 *
 * @param source - Python source (any valid Python; the translators decide what is supported)
 * @returns The raw py-ast Module; read it with `readModule` before translating
 * @throws MalformedInputError when the source is not valid Python
 */
export function parsePython(source: string): unknown {
  try {
    return parse(source);
  } catch (error: unknown) {
    if (error instanceof Error) {
      const line = numericField(error, 'lineno', 'line');
      const column = numericField(error, 'col_offset', 'column', 'col');
      throw new MalformedInputError(`Invalid Python: ${error.message}`, line, column);
    }
    throw new MalformedInputError(`Invalid Python: ${String(error)}`);
  }
}

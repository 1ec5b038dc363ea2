import * as fs from 'fs';
import * as path from 'path';
import { parsePython } from './parser.js';
import { readModule } from './tree-reader.js';
import { scanComments, CommentTable } from './comments.js';
import { TranslationContext, resolveOptions, type TranspileOptions } from './context.js';
import { Transformer, type TranslationUnit } from './transformer.js';
import { generateSketch } from './generator.js';
import type { UnsupportedConstructError } from './errors.js';
import type { ModuleNode } from './syntax.js';

export const SKETCH_EXTENSION = '.ino';

export interface TranspileResult {
  tree: ModuleNode;
  unit: TranslationUnit;
  code: string;
  diagnostics: UnsupportedConstructError[];
}

/**
 * Translate Python source into sketch source. Pure: nothing is read or written.
 *
 * @throws MalformedInputError when the source does not parse
 */
export function transpile(source: string, options: Partial<TranspileOptions> = {}): TranspileResult {
  const resolved = resolveOptions(options);
  const comments = resolved.comments ? scanComments(source) : new CommentTable();
  const context = new TranslationContext(resolved, comments);
  const tree = readModule(parsePython(source), source, (construct, line, message) =>
    context.reportUnsupported(construct, line, message));
  const unit = new Transformer(context).transform(tree);

  return {
    tree,
    unit,
    code: generateSketch(unit),
    diagnostics: context.diagnostics
  };
}

/** `dir/blink.py` → `dir/blink.ino` */
export function sketchPathFor(inputFile: string): string {
  const parsed = path.parse(inputFile);
  return path.join(parsed.dir, `${parsed.name}${SKETCH_EXTENSION}`);
}

export interface TranspileFileOptions extends Partial<TranspileOptions> {
  outFile?: string;
}

export interface TranspileFileResult extends TranspileResult {
  outFile: string;
}

/**
 * Translate a Python file and write the sketch beside it (or to `outFile`).
 * The sketch is written only after translation succeeds, so a malformed
 * input never clobbers an earlier sketch.
 */
export function transpileFile(inputFile: string, options: TranspileFileOptions = {}): TranspileFileResult {
  const { outFile = sketchPathFor(inputFile), ...transpileOptions } = options;
  const source = fs.readFileSync(inputFile, 'utf8');
  const result = transpile(source, transpileOptions);
  fs.writeFileSync(outFile, result.code, 'utf8');
  return { ...result, outFile };
}

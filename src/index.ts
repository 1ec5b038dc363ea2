export { transpile, transpileFile, sketchPathFor, SKETCH_EXTENSION } from './transpile.js';
export type { TranspileResult, TranspileFileOptions, TranspileFileResult } from './transpile.js';
export { parsePython } from './parser.js';
export { readModule, TreeReader } from './tree-reader.js';
export { renderExpr } from './expression-translator.js';
export { StatementTranslator } from './statement-translator.js';
export type { SketchLine } from './statement-translator.js';
export { classifyAssignment, renderDeclaration } from './declaration-classifier.js';
export type { Declaration, Scope } from './declaration-classifier.js';
export { synthesizeEntryPoints, SETUP, LOOP } from './entry-points.js';
export type { FunctionBlock } from './entry-points.js';
export { Transformer } from './transformer.js';
export type { TranslationUnit } from './transformer.js';
export { generateSketch } from './generator.js';
export { TranslationContext, resolveOptions, DEFAULT_OPTIONS } from './context.js';
export type { TranspileOptions } from './context.js';
export { scanComments, CommentTable } from './comments.js';
export { loadConfig, mergeOptions, CONFIG_FILE } from './config.js';
export {
  generatePythonStub,
  loadClassDescriptions,
  parseClassDescriptions,
  constructibleNames
} from './header-stubs.js';
export type { ClassDescription, MethodDescription } from './header-stubs.js';
export {
  MalformedInputError,
  UnsupportedConstructError,
  CollaboratorError,
  ConfigError
} from './errors.js';
export { Syntax } from './syntax-builders.js';
export type * from './syntax.js';

import { CommentTable } from './comments.js';
import { IncludeManager } from './include-manager.js';
import { UnsupportedConstructError } from './errors.js';

export interface TranspileOptions {
  /** Fill a synthesized `loop()` with calls to every other procedure */
  autoLoop: boolean;
  /** Treat any `x = Name(...)` as object construction, registered or not */
  inferConstruction: boolean;
  /** Class names known to be constructible, e.g. from header stubs */
  constructibleTypes: string[];
  /** Pseudo-module whose imports add no include */
  builtinModule: string;
  headerExtension: string;
  /** Carry `#` comments into the sketch */
  comments: boolean;
}

export const DEFAULT_OPTIONS: TranspileOptions = {
  autoLoop: false,
  inferConstruction: false,
  constructibleTypes: [],
  builtinModule: 'Arduino',
  headerExtension: '.h',
  comments: true
};

export function resolveOptions(options: Partial<TranspileOptions> = {}): TranspileOptions {
  return {
    autoLoop: options.autoLoop ?? DEFAULT_OPTIONS.autoLoop,
    inferConstruction: options.inferConstruction ?? DEFAULT_OPTIONS.inferConstruction,
    constructibleTypes: options.constructibleTypes ?? DEFAULT_OPTIONS.constructibleTypes,
    builtinModule: options.builtinModule ?? DEFAULT_OPTIONS.builtinModule,
    headerExtension: options.headerExtension ?? DEFAULT_OPTIONS.headerExtension,
    comments: options.comments ?? DEFAULT_OPTIONS.comments
  };
}

/**
 * State for one translation: options, detected includes, the
 * constructible-type registry, source comments and diagnostics.
 * A fresh context is made per invocation and never shared.
 */
export class TranslationContext {
  readonly options: TranspileOptions;
  readonly includes: IncludeManager;
  readonly comments: CommentTable;
  readonly diagnostics: UnsupportedConstructError[] = [];
  private readonly constructible: Set<string>;

  constructor(options: TranspileOptions = DEFAULT_OPTIONS, comments: CommentTable = new CommentTable()) {
    this.options = options;
    this.comments = comments;
    this.includes = new IncludeManager(options.builtinModule, options.headerExtension);
    this.constructible = new Set(options.constructibleTypes);
  }

  registerConstructible(name: string): void {
    this.constructible.add(name);
  }

  isConstructible(name: string): boolean {
    return this.options.inferConstruction || this.constructible.has(name);
  }

  reportUnsupported(construct: string, line: number | undefined, message: string): void {
    this.diagnostics.push(new UnsupportedConstructError(construct, line, message));
  }
}

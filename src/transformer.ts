import type { ModuleNode, Statement } from './syntax.js';
import type { TranslationContext } from './context.js';
import { StatementTranslator, type SketchLine } from './statement-translator.js';
import { classifyAssignment } from './declaration-classifier.js';
import { synthesizeEntryPoints, type FunctionBlock } from './entry-points.js';
import { sanitizeIdentifier } from './identifier-sanitizer.js';

export interface TranslationUnit {
  /** Header names, first-seen order */
  includes: string[];
  macros: string[];
  /** Top-level statements in source order */
  statements: string[];
  /** `setup`, user procedures, `loop` */
  functions: FunctionBlock[];
}

function texts(lines: SketchLine[]): string[] {
  return lines.map(l => l.text);
}

/**
 * Walks a module and sorts what it produces into the sections of a sketch.
 */
export class Transformer {
  private readonly context: TranslationContext;
  private readonly statements: StatementTranslator;

  constructor(context: TranslationContext) {
    this.context = context;
    this.statements = new StatementTranslator(context);
  }

  transform(module: ModuleNode): TranslationUnit {
    // Imports first: they fill the include set and the constructible registry
    // before any assignment is classified
    this.registerImports(module.body);

    const macros: string[] = [];
    const statements: string[] = [];
    const functions = new Map<string, string[]>();

    for (const node of module.body) {
      switch (node.kind) {
        case 'Import':
          if (node.line !== undefined) {
            this.context.comments.takeStandaloneBefore(node.line);
            this.context.comments.takeTrailing(node.line);
          }
          break;

        case 'FunctionDef':
          functions.set(sanitizeIdentifier(node.name), texts(this.statements.translate(node, 0, 'module')));
          break;

        case 'Assign':
          if (classifyAssignment(node, 'module', this.context).form === 'macro') {
            macros.push(...texts(this.statements.translate(node, 0, 'module')));
          } else {
            statements.push(...texts(this.statements.translate(node, 0, 'module')));
          }
          break;

        default:
          statements.push(...texts(this.statements.translate(node, 0, 'module')));
      }
    }

    return {
      includes: this.context.includes.headerNames(),
      macros,
      statements,
      functions: synthesizeEntryPoints(functions, { autoLoop: this.context.options.autoLoop })
    };
  }

  private registerImports(body: Statement[]): void {
    for (const node of body) {
      if (node.kind !== 'Import' || node.module === null) continue;
      this.context.includes.addFromImport(node.module);
      for (const name of node.names) {
        if (name !== '*') {
          this.context.registerConstructible(name);
        }
      }
    }
  }
}

import type {
  Expression,
  ForRangeNode,
  FunctionDefNode,
  IfNode,
  Statement
} from './syntax.js';
import type { TranslationContext } from './context.js';
import { ARITHMETIC_OPERATORS } from './operator-tables.js';
import { renderExpr } from './expression-translator.js';
import { classifyAssignment, renderDeclaration, type Scope } from './declaration-classifier.js';
import { sanitizeIdentifier } from './identifier-sanitizer.js';
import { pythonTypeToCpp } from './type-names.js';

export const INDENT = '    ';

/** One line of generated code, tagged with the source line it came from */
export interface SketchLine {
  text: string;
  line?: number;
}

/** Wrap a rendered condition in parentheses unless one pair already spans it */
export function asCondition(rendered: string): string {
  if (!rendered.startsWith('(')) return `(${rendered})`;
  let depth = 0;
  let inString = false;
  for (let i = 0; i < rendered.length; i++) {
    const ch = rendered[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '(') depth++;
    else if (ch === ')') depth--;
    if (depth === 0 && i < rendered.length - 1) return `(${rendered})`;
  }
  return rendered;
}

function isAssignable(target: Expression): boolean {
  return target.kind === 'Identifier' || target.kind === 'Attribute' || target.kind === 'Subscript';
}

export class StatementTranslator {
  private readonly context: TranslationContext;

  constructor(context: TranslationContext) {
    this.context = context;
  }

  /**
   * Translate one statement, with its source comments interleaved.
   *
   * Standalone comments above the statement come first. The trailing comment
   * of the statement's own line goes on the first generated line from that
   * line, or on a line of its own when the statement generated no code.
   */
  translate(node: Statement, indent = 0, scope: Scope = 'block'): SketchLine[] {
    const pad = INDENT.repeat(indent);
    const lines: SketchLine[] = [];

    if (node.line !== undefined) {
      for (const comment of this.context.comments.takeStandaloneBefore(node.line)) {
        lines.push({ text: `${pad}// ${comment}` });
      }
    }

    const code = this.render(node, indent, scope);

    if (node.line !== undefined) {
      const trailing = this.context.comments.takeTrailing(node.line);
      if (trailing !== undefined) {
        const target = code.find(l => l.line === node.line);
        if (target) {
          target.text = `${target.text} // ${trailing}`;
        } else {
          code.unshift({ text: `${pad}// ${trailing}`, line: node.line });
        }
      }
    }

    lines.push(...code);
    return lines;
  }

  /**
   * Translate a body. Standalone comments up to `end` that no statement
   * claimed close the block at its own indent.
   */
  translateBlock(body: Statement[], indent: number, end?: number): SketchLine[] {
    const lines = body.flatMap(node => this.translate(node, indent, 'block'));
    if (end !== undefined) {
      lines.push(...this.leadingComments(end + 1, indent));
    }
    return lines;
  }

  private render(node: Statement, indent: number, scope: Scope): SketchLine[] {
    const pad = INDENT.repeat(indent);
    const line = node.line;

    switch (node.kind) {
      case 'Assign':
        if (!isAssignable(node.targets[0])) {
          return this.unsupported('Assign', line, indent, 'Assignment target is not supported');
        }
        return [{ text: `${pad}${renderDeclaration(classifyAssignment(node, scope, this.context))}`, line }];

      case 'AnnotatedAssign': {
        if (!isAssignable(node.target)) {
          return this.unsupported('AnnotatedAssign', line, indent, 'Assignment target is not supported');
        }
        const type = pythonTypeToCpp(node.annotation);
        const target = renderExpr(node.target);
        const text = node.value
          ? `${type} ${target} = ${renderExpr(node.value)};`
          : `${type} ${target};`;
        return [{ text: `${pad}${text}`, line }];
      }

      case 'AugmentedAssign': {
        if (!isAssignable(node.target)) {
          return this.unsupported('AugmentedAssign', line, indent, 'Assignment target is not supported');
        }
        const target = renderExpr(node.target);
        const value = renderExpr(node.value);
        const spelling = ARITHMETIC_OPERATORS[node.op];
        const text = spelling.form === 'call'
          ? `${target} = ${spelling.token}(${target}, ${value});`
          : `${target} ${spelling.token}= ${value};`;
        return [{ text: `${pad}${text}`, line }];
      }

      case 'ExpressionStatement':
        // Docstrings
        if (node.value.kind === 'Literal' && typeof node.value.value === 'string') {
          return [];
        }
        return [{ text: `${pad}${renderExpr(node.value)};`, line }];

      case 'If':
        return this.renderIf(node, indent);

      case 'While':
        return [
          { text: `${pad}while ${this.condition(node.test)} {`, line },
          ...this.translateBlock(node.body, indent + 1, node.bodyEnd),
          { text: `${pad}}` }
        ];

      case 'ForRange':
        return this.renderForRange(node, indent);

      case 'FunctionDef':
        if (scope !== 'module') {
          return this.unsupported('FunctionDef', line, indent, 'Nested function definitions are not supported');
        }
        return this.renderFunction(node, indent);

      case 'Return':
        return [{ text: node.value ? `${pad}return ${renderExpr(node.value)};` : `${pad}return;`, line }];

      case 'Break':
        return [{ text: `${pad}break;`, line }];

      case 'Continue':
        return [{ text: `${pad}continue;`, line }];

      case 'Pass':
      case 'Import':
        return [];

      case 'Unsupported':
        return this.unsupported(node.nodeType, line, indent, `Unsupported statement: ${node.nodeType}`);

      default:
        return this.unsupported('statement', line, indent, 'Unsupported statement');
    }
  }

  private condition(test: Expression): string {
    return asCondition(renderExpr(test));
  }

  private renderIf(node: IfNode, indent: number): SketchLine[] {
    const pad = INDENT.repeat(indent);
    const lines: SketchLine[] = [
      { text: `${pad}if ${this.condition(node.test)} {`, line: node.line },
      ...this.translateBlock(node.body, indent + 1, node.bodyEnd)
    ];

    let orelse = node.orelse;
    let orelseEnd = node.orelseEnd;
    while (orelse.length > 0) {
      const [first] = orelse;
      // `elif` arrives as an else-block holding a single If
      if (orelse.length === 1 && first.kind === 'If') {
        lines.push(...this.leadingComments(first.line, indent + 1));
        const header: SketchLine = { text: `${pad}} else if ${this.condition(first.test)} {`, line: first.line };
        this.attachTrailing(header, first.line);
        lines.push(header, ...this.translateBlock(first.body, indent + 1, first.bodyEnd));
        orelse = first.orelse;
        orelseEnd = first.orelseEnd;
        continue;
      }
      lines.push({ text: `${pad}} else {` }, ...this.translateBlock(orelse, indent + 1, orelseEnd));
      break;
    }

    lines.push({ text: `${pad}}` });
    return lines;
  }

  private renderForRange(node: ForRangeNode, indent: number): SketchLine[] {
    const pad = INDENT.repeat(indent);
    let start: string;
    let end: string;

    if (node.args.length === 1) {
      start = '0';
      end = renderExpr(node.args[0]);
    } else if (node.args.length === 2) {
      start = renderExpr(node.args[0]);
      end = renderExpr(node.args[1]);
    } else {
      return this.unsupported(
        'For',
        node.line,
        indent,
        `range() with ${node.args.length} arguments is not supported`
      );
    }

    const variable = sanitizeIdentifier(node.target);
    return [
      { text: `${pad}for (int ${variable} = ${start}; ${variable} < ${end}; ${variable}++) {`, line: node.line },
      ...this.translateBlock(node.body, indent + 1, node.bodyEnd),
      { text: `${pad}}` }
    ];
  }

  private renderFunction(node: FunctionDefNode, indent: number): SketchLine[] {
    const pad = INDENT.repeat(indent);
    const params = node.params
      .map(param => `${pythonTypeToCpp(param.annotation)} ${sanitizeIdentifier(param.name)}`)
      .join(', ');
    const returns = node.returns === undefined ? 'void' : pythonTypeToCpp(node.returns);
    const signature = `${pad}${returns} ${sanitizeIdentifier(node.name)}(${params})`;

    const body = this.translateBlock(node.body, indent + 1, node.bodyEnd);
    if (body.length === 0) {
      return [{ text: `${signature} {}`, line: node.line }];
    }
    return [
      { text: `${signature} {`, line: node.line },
      ...body,
      { text: `${pad}}` }
    ];
  }

  private leadingComments(line: number | undefined, indent: number): SketchLine[] {
    if (line === undefined) return [];
    const pad = INDENT.repeat(indent);
    return this.context.comments.takeStandaloneBefore(line).map(comment => ({ text: `${pad}// ${comment}` }));
  }

  private attachTrailing(target: SketchLine, line: number | undefined): void {
    if (line === undefined) return;
    const trailing = this.context.comments.takeTrailing(line);
    if (trailing !== undefined) {
      target.text = `${target.text} // ${trailing}`;
    }
  }

  private unsupported(construct: string, line: number | undefined, indent: number, message: string): SketchLine[] {
    this.context.reportUnsupported(construct, line, message);
    return [{ text: `${INDENT.repeat(indent)}/* unsupported: ${construct} */`, line }];
  }
}

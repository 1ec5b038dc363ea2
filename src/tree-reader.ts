import { Syntax } from './syntax-builders.js';
import type {
  ArithmeticOperator,
  ComparisonOperator,
  Expression,
  ModuleNode,
  Parameter,
  Statement,
  UnaryOperator
} from './syntax.js';
import { MalformedInputError } from './errors.js';

// py-ast node shape: a `nodeType` tag plus CPython's field names
interface PyNode {
  nodeType: string;
  [key: string]: unknown;
}

function isPyNode(value: unknown): value is PyNode {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'nodeType') === 'string';
}

function child(node: PyNode, key: string): PyNode | undefined {
  const value = node[key];
  return isPyNode(value) ? value : undefined;
}

function children(node: PyNode, key: string): PyNode[] {
  const value = node[key];
  return Array.isArray(value) ? value.filter(isPyNode) : [];
}

function text(node: PyNode, key: string): string | undefined {
  const value = node[key];
  return typeof value === 'string' ? value : undefined;
}

function lineOf(node: PyNode): number | undefined {
  const value = node.lineno;
  return typeof value === 'number' ? value : undefined;
}

// Operators come back as `{ nodeType: 'Add' }`; accept a bare string as well
function operatorName(node: PyNode, key: string): string | undefined {
  const value = node[key];
  if (typeof value === 'string') return value;
  return isPyNode(value) ? value.nodeType : undefined;
}

const ARITHMETIC: Record<string, ArithmeticOperator> = {
  Add: 'Add',
  Sub: 'Sub',
  Mult: 'Mul',
  Div: 'Div',
  FloorDiv: 'FloorDiv',
  Mod: 'Mod',
  Pow: 'Pow',
  BitAnd: 'BitAnd',
  BitOr: 'BitOr',
  BitXor: 'BitXor',
  LShift: 'LShift',
  RShift: 'RShift'
};

const COMPARISON: Record<string, ComparisonOperator> = {
  Eq: 'Eq',
  NotEq: 'Ne',
  Lt: 'Lt',
  LtE: 'Le',
  Gt: 'Gt',
  GtE: 'Ge',
  Is: 'Eq',
  IsNot: 'Ne'
};

const UNARY: Record<string, UnaryOperator> = {
  Not: 'Not',
  USub: 'Neg',
  UAdd: 'Pos',
  Invert: 'Invert'
};

/** Receives constructs the reader had to drop or degrade */
export type UnsupportedReporter = (construct: string, line: number | undefined, message: string) => void;

// Numeric spellings C++ reads the same way Python does
const PORTABLE_NUMBER = /^(0[xX][0-9a-fA-F]+|\d+|\d+\.\d*([eE][+-]?\d+)?|\.\d+([eE][+-]?\d+)?|\d+[eE][+-]?\d+)$/;

/**
 * Reads a py-ast tree into the syntax tree the translators consume.
 *
 * Anything outside the supported subset is kept as an `Unsupported` or
 * `UnsupportedExpression` node so the translators can degrade in place.
 */
export class TreeReader {
  private readonly lines: string[];
  private readonly report: UnsupportedReporter;

  constructor(source: string, report: UnsupportedReporter = () => undefined) {
    this.lines = source.split(/\r?\n/);
    this.report = report;
  }

  readModule(tree: unknown): ModuleNode {
    if (!isPyNode(tree) || tree.nodeType !== 'Module') {
      throw new MalformedInputError('Parser did not return a Module');
    }
    return Syntax.Module(this.readBlock(children(tree, 'body')));
  }

  private readBlock(nodes: PyNode[]): Statement[] {
    return nodes.map(node => this.readStatement(node));
  }

  /**
   * Last line of a body: its last statement, extended over the comment
   * lines after it that are indented at least as deep as the body.
   */
  private blockEnd(nodes: PyNode[]): number | undefined {
    const first = nodes[0];
    const last = nodes[nodes.length - 1];
    if (!first || !last) return undefined;
    const column = first.col_offset;
    const lastLine = typeof last.end_lineno === 'number' ? last.end_lineno : lineOf(last);
    if (typeof column !== 'number' || lastLine === undefined) return lastLine;

    let end = lastLine;
    for (let lineNo = lastLine + 1; lineNo <= this.lines.length; lineNo++) {
      const sourceLine = this.lines[lineNo - 1];
      const trimmed = sourceLine.trim();
      if (trimmed === '') continue;
      const depth = sourceLine.length - sourceLine.trimStart().length;
      if (!trimmed.startsWith('#') || depth < column) break;
      end = lineNo;
    }
    return end;
  }

  readStatement(node: PyNode): Statement {
    const line = lineOf(node);

    switch (node.nodeType) {
      case 'Assign': {
        const value = child(node, 'value');
        const targets = children(node, 'targets');
        if (!value || targets.length === 0) break;
        return Syntax.Assign(targets.map(t => this.readExpression(t)), this.readExpression(value), line);
      }

      case 'AnnAssign': {
        const target = child(node, 'target');
        if (!target) break;
        const value = child(node, 'value');
        return Syntax.AnnAssign(
          this.readExpression(target),
          this.annotationName(child(node, 'annotation')),
          value ? this.readExpression(value) : undefined,
          line
        );
      }

      case 'AugAssign': {
        const target = child(node, 'target');
        const value = child(node, 'value');
        const op = ARITHMETIC[operatorName(node, 'op') ?? ''];
        if (!target || !value || !op) break;
        return Syntax.AugAssign(this.readExpression(target), op, this.readExpression(value), line);
      }

      case 'Expr': {
        const value = child(node, 'value');
        if (!value) break;
        return Syntax.Expr(this.readExpression(value), line);
      }

      case 'If': {
        const test = child(node, 'test');
        if (!test) break;
        const body = children(node, 'body');
        const orelse = children(node, 'orelse');
        return Syntax.If(
          this.readExpression(test),
          this.readBlock(body),
          this.readBlock(orelse),
          line,
          this.blockEnd(body),
          this.blockEnd(orelse)
        );
      }

      case 'While': {
        const test = child(node, 'test');
        if (!test) break;
        const body = children(node, 'body');
        return Syntax.While(this.readExpression(test), this.readBlock(body), line, this.blockEnd(body));
      }

      case 'For':
        return this.readFor(node, line);

      case 'FunctionDef': {
        const name = text(node, 'name');
        if (!name) break;
        const args = child(node, 'args');
        const params: Parameter[] = args
          ? children(args, 'args').flatMap(arg => {
            const paramName = text(arg, 'arg');
            return paramName ? [{ name: paramName, annotation: this.annotationName(child(arg, 'annotation')) }] : [];
          })
          : [];
        const body = children(node, 'body');
        return Syntax.FunctionDef(
          name,
          params,
          this.readBlock(body),
          line,
          this.annotationName(child(node, 'returns')),
          this.blockEnd(body)
        );
      }

      case 'Return': {
        const value = child(node, 'value');
        return Syntax.Return(value ? this.readExpression(value) : undefined, line);
      }

      case 'Break':
        return Syntax.Break(line);

      case 'Continue':
        return Syntax.Continue(line);

      case 'Pass':
      case 'Global':
      case 'Nonlocal':
        return Syntax.Pass(line);

      case 'Import':
        return Syntax.ImportFrom(null, this.aliasNames(node), line);

      case 'ImportFrom':
        return Syntax.ImportFrom(text(node, 'module') ?? null, this.aliasNames(node), line);
    }

    return Syntax.Unsupported(node.nodeType, line);
  }

  private readFor(node: PyNode, line: number | undefined): Statement {
    const target = child(node, 'target');
    const iter = child(node, 'iter');
    const callee = iter && iter.nodeType === 'Call' ? child(iter, 'func') : undefined;
    const variable = target && target.nodeType === 'Name' ? text(target, 'id') : undefined;

    if (!iter || !callee || callee.nodeType !== 'Name' || text(callee, 'id') !== 'range' || !variable) {
      return Syntax.Unsupported('For', line);
    }

    const body = children(node, 'body');
    return Syntax.ForRange(
      variable,
      children(iter, 'args').map(arg => this.readExpression(arg)),
      this.readBlock(body),
      line,
      this.blockEnd(body)
    );
  }

  private aliasNames(node: PyNode): string[] {
    return children(node, 'names').flatMap(alias => {
      const name = text(alias, 'name');
      return name ? [name] : [];
    });
  }

  private annotationName(node: PyNode | undefined): string | undefined {
    if (!node) return undefined;
    switch (node.nodeType) {
      case 'Name':
        return text(node, 'id');
      case 'Attribute':
        return text(node, 'attr');
      case 'Constant': {
        const value = node.value;
        if (value === null) return 'None';
        return typeof value === 'string' ? value : undefined;
      }
    }
    return undefined;
  }

  readExpression(node: PyNode): Expression {
    switch (node.nodeType) {
      case 'BinOp': {
        const left = child(node, 'left');
        const right = child(node, 'right');
        const op = ARITHMETIC[operatorName(node, 'op') ?? ''];
        if (!left || !right || !op) break;
        return Syntax.BinaryOp(this.readExpression(left), op, this.readExpression(right));
      }

      case 'UnaryOp': {
        const operand = child(node, 'operand');
        const op = UNARY[operatorName(node, 'op') ?? ''];
        if (!operand || !op) break;
        return Syntax.UnaryOp(op, this.readExpression(operand));
      }

      case 'BoolOp': {
        const op = operatorName(node, 'op');
        const values = children(node, 'values');
        if ((op !== 'And' && op !== 'Or') || values.length === 0) break;
        return Syntax.BooleanOp(op, values.map(v => this.readExpression(v)));
      }

      case 'Compare':
        return this.readComparison(node);

      case 'Call': {
        const callee = child(node, 'func');
        if (!callee) break;
        if (children(node, 'keywords').length > 0) {
          this.report('keyword', lineOf(node), 'Keyword arguments are not supported and were dropped');
        }
        return Syntax.Call(this.readExpression(callee), children(node, 'args').map(a => this.readExpression(a)));
      }

      case 'Name': {
        const id = text(node, 'id');
        if (!id) break;
        // Older grammars report these as names rather than constants
        if (id === 'True') return Syntax.Literal(true);
        if (id === 'False') return Syntax.Literal(false);
        if (id === 'None') return Syntax.Literal(null);
        return Syntax.Name(id);
      }

      case 'Attribute': {
        const receiver = child(node, 'value');
        const attr = text(node, 'attr');
        if (!receiver || !attr) break;
        return Syntax.Attribute(this.readExpression(receiver), attr);
      }

      case 'Subscript': {
        const receiver = child(node, 'value');
        let index = child(node, 'slice');
        if (index && index.nodeType === 'Index') {
          index = child(index, 'value');
        }
        if (!receiver || !index) break;
        return Syntax.Subscript(this.readExpression(receiver), this.readExpression(index));
      }

      case 'IfExp': {
        const test = child(node, 'test');
        const body = child(node, 'body');
        const orelse = child(node, 'orelse');
        if (!test || !body || !orelse) break;
        return Syntax.IfExp(this.readExpression(test), this.readExpression(body), this.readExpression(orelse));
      }

      case 'Constant':
        return this.readConstant(node);
    }

    return this.unsupportedExpression(node.nodeType, lineOf(node));
  }

  private unsupportedExpression(nodeType: string, line: number | undefined): Expression {
    this.report(nodeType, line, `Unsupported expression: ${nodeType}`);
    return Syntax.UnsupportedExpression(nodeType);
  }

  // `a < b < c` becomes `(a < b) and (b < c)`
  private readComparison(node: PyNode): Expression {
    const left = child(node, 'left');
    const comparators = children(node, 'comparators');
    const rawOps = node.ops;
    const ops = Array.isArray(rawOps)
      ? rawOps.map((op: unknown) => (typeof op === 'string' ? op : isPyNode(op) ? op.nodeType : ''))
      : [];

    if (!left || comparators.length === 0 || ops.length !== comparators.length) {
      return this.unsupportedExpression('Compare', lineOf(node));
    }

    const parts: Expression[] = [];
    let current = this.readExpression(left);
    for (let i = 0; i < ops.length; i++) {
      const op = COMPARISON[ops[i]];
      if (!op) {
        return this.unsupportedExpression(ops[i] || 'Compare', lineOf(node));
      }
      const next = this.readExpression(comparators[i]);
      parts.push(Syntax.Compare(current, op, next));
      current = next;
    }

    return parts.length === 1 ? parts[0] : Syntax.BooleanOp('And', parts);
  }

  private readConstant(node: PyNode): Expression {
    const value = node.value;

    if (typeof value === 'number') {
      const raw = this.sourceSpelling(node);
      return raw !== undefined && PORTABLE_NUMBER.test(raw) && Number(raw) === value
        ? Syntax.Literal(value, raw)
        : Syntax.Literal(value);
    }
    if (typeof value === 'bigint' || typeof value === 'string' || typeof value === 'boolean' || value === null) {
      return Syntax.Literal(value);
    }
    return this.unsupportedExpression('Constant', lineOf(node));
  }

  private sourceSpelling(node: PyNode): string | undefined {
    const line = lineOf(node);
    const start = node.col_offset;
    const end = node.end_col_offset;
    const endLine = node.end_lineno;
    if (line === undefined || typeof start !== 'number' || typeof end !== 'number') return undefined;
    if (typeof endLine === 'number' && endLine !== line) return undefined;
    const sourceLine = this.lines[line - 1];
    return sourceLine === undefined ? undefined : sourceLine.slice(start, end);
  }
}

/**
 * Read a parsed py-ast Module into the translator's syntax tree.
 *
 * @param tree - Result of `parsePython`
 * @param source - The same source text, used to recover numeric literal spellings
 */
export function readModule(tree: unknown, source: string, report?: UnsupportedReporter): ModuleNode {
  return new TreeReader(source, report).readModule(tree);
}

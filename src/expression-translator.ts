import type { CallNode, Expression, LiteralNode } from './syntax.js';
import {
  ARITHMETIC_OPERATORS,
  BOOLEAN_OPERATORS,
  COMPARISON_OPERATORS,
  UNARY_OPERATORS
} from './operator-tables.js';
import { sanitizeIdentifier } from './identifier-sanitizer.js';

/** Receiver spelled for method calls on anything other than a name or dotted name */
export const FALLBACK_RECEIVER = 'obj';

/** Module whose `sleep*` functions map onto the Arduino delay primitives */
const TIME_MODULE = 'time';

const NEUTRAL = '0';

/**
 * Render an expression as C++ source.
 *
 * Every composite expression is wrapped in parentheses, so the output never
 * depends on C++ operator precedence. Unknown nodes render as `0`.
 */
export function renderExpr(node: Expression): string {
  switch (node.kind) {
    case 'BinaryOp': {
      const spelling = ARITHMETIC_OPERATORS[node.op];
      const left = renderExpr(node.left);
      const right = renderExpr(node.right);
      return spelling.form === 'call'
        ? `${spelling.token}(${left}, ${right})`
        : `(${left} ${spelling.token} ${right})`;
    }

    case 'UnaryOp':
      return `(${UNARY_OPERATORS[node.op]}${renderExpr(node.operand)})`;

    case 'BooleanOp':
      return `(${node.values.map(renderExpr).join(` ${BOOLEAN_OPERATORS[node.op]} `)})`;

    case 'Comparison':
      return `(${renderExpr(node.left)} ${COMPARISON_OPERATORS[node.op]} ${renderExpr(node.right)})`;

    case 'Call':
      return renderCall(node);

    case 'Identifier':
      return sanitizeIdentifier(node.name);

    case 'Attribute':
      return `${renderExpr(node.receiver)}.${node.name}`;

    case 'Subscript':
      return `${renderExpr(node.receiver)}[${renderExpr(node.index)}]`;

    case 'Conditional':
      return `(${renderExpr(node.test)} ? ${renderExpr(node.then)} : ${renderExpr(node.otherwise)})`;

    case 'Literal':
      return renderLiteral(node);

    case 'UnsupportedExpression':
    default:
      return NEUTRAL;
  }
}

export function renderLiteral(node: LiteralNode): string {
  const value = node.value;
  if (typeof value === 'number') {
    return node.raw ?? String(value);
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return 'NULL';
}

/** Dotted spelling of a name or attribute chain (`a`, `a.b.c`), if it is one */
export function receiverPath(node: Expression): string | undefined {
  if (node.kind === 'Identifier') {
    return sanitizeIdentifier(node.name);
  }
  if (node.kind === 'Attribute') {
    const base = receiverPath(node.receiver);
    return base === undefined ? undefined : `${base}.${node.name}`;
  }
  return undefined;
}

/** True for an int or float literal, optionally signed */
export function isNumericLiteral(node: Expression): boolean {
  if (node.kind === 'Literal') {
    return typeof node.value === 'number' || typeof node.value === 'bigint';
  }
  if (node.kind === 'UnaryOp' && (node.op === 'Neg' || node.op === 'Pos')) {
    return node.operand.kind === 'Literal' &&
      (typeof node.operand.value === 'number' || typeof node.operand.value === 'bigint');
  }
  return false;
}

function renderArgs(args: Expression[]): string {
  return args.map(renderExpr).join(', ');
}

function renderCall(node: CallNode): string {
  const callee = node.callee;

  if (callee.kind === 'Identifier') {
    return `${sanitizeIdentifier(callee.name)}(${renderArgs(node.args)})`;
  }

  if (callee.kind === 'Attribute') {
    const receiver = receiverPath(callee.receiver);
    if (receiver === TIME_MODULE && node.args.length === 1) {
      const delay = renderTimeCall(callee.name, node.args[0]);
      if (delay !== undefined) return delay;
    }
    return `${receiver ?? FALLBACK_RECEIVER}.${callee.name}(${renderArgs(node.args)})`;
  }

  return `${renderExpr(callee)}(${renderArgs(node.args)})`;
}

// time.sleep takes seconds; delay() takes milliseconds
function renderTimeCall(method: string, arg: Expression): string | undefined {
  switch (method) {
    case 'sleep':
      if (arg.kind === 'Literal' && (typeof arg.value === 'number' || typeof arg.value === 'bigint')) {
        return `delay(${Math.round(Number(arg.value) * 1000)})`;
      }
      return `delay(${renderExpr(arg)} * 1000)`;
    case 'sleep_ms':
      return `delay(${renderExpr(arg)})`;
    case 'sleep_us':
      return `delayMicroseconds(${renderExpr(arg)})`;
  }
  return undefined;
}

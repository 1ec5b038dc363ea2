/**
 * Helper functions to build syntax tree nodes.
 *
 * The tree reader uses these when it lowers py-ast nodes; tests use them to
 * drive the translators without going through the parser.
 */

import type {
  ArithmeticOperator,
  BooleanOperator,
  ComparisonOperator,
  Expression,
  LiteralValue,
  ModuleNode,
  Parameter,
  Statement,
  UnaryOperator
} from './syntax.js';

export const Syntax = {
  Name(name: string): Expression {
    return { kind: 'Identifier', name };
  },

  Literal(value: LiteralValue, raw?: string): Expression {
    return raw === undefined ? { kind: 'Literal', value } : { kind: 'Literal', value, raw };
  },

  BinaryOp(left: Expression, op: ArithmeticOperator, right: Expression): Expression {
    return { kind: 'BinaryOp', op, left, right };
  },

  UnaryOp(op: UnaryOperator, operand: Expression): Expression {
    return { kind: 'UnaryOp', op, operand };
  },

  BooleanOp(op: BooleanOperator, values: Expression[]): Expression {
    return { kind: 'BooleanOp', op, values };
  },

  Compare(left: Expression, op: ComparisonOperator, right: Expression): Expression {
    return { kind: 'Comparison', op, left, right };
  },

  Call(callee: Expression, args: Expression[]): Expression {
    return { kind: 'Call', callee, args };
  },

  Attribute(receiver: Expression, name: string): Expression {
    return { kind: 'Attribute', receiver, name };
  },

  Subscript(receiver: Expression, index: Expression): Expression {
    return { kind: 'Subscript', receiver, index };
  },

  IfExp(test: Expression, then: Expression, otherwise: Expression): Expression {
    return { kind: 'Conditional', test, then, otherwise };
  },

  UnsupportedExpression(nodeType: string): Expression {
    return { kind: 'UnsupportedExpression', nodeType };
  },

  // Statements

  Assign(targets: Expression[], value: Expression, line?: number): Statement {
    return { kind: 'Assign', targets, value, line };
  },

  AnnAssign(target: Expression, annotation: string | undefined, value: Expression | undefined, line?: number): Statement {
    return { kind: 'AnnotatedAssign', target, annotation, value, line };
  },

  AugAssign(target: Expression, op: ArithmeticOperator, value: Expression, line?: number): Statement {
    return { kind: 'AugmentedAssign', target, op, value, line };
  },

  Expr(value: Expression, line?: number): Statement {
    return { kind: 'ExpressionStatement', value, line };
  },

  If(
    test: Expression,
    body: Statement[],
    orelse: Statement[],
    line?: number,
    bodyEnd?: number,
    orelseEnd?: number
  ): Statement {
    return { kind: 'If', test, body, orelse, line, bodyEnd, orelseEnd };
  },

  While(test: Expression, body: Statement[], line?: number, bodyEnd?: number): Statement {
    return { kind: 'While', test, body, line, bodyEnd };
  },

  ForRange(target: string, args: Expression[], body: Statement[], line?: number, bodyEnd?: number): Statement {
    return { kind: 'ForRange', target, args, body, line, bodyEnd };
  },

  FunctionDef(
    name: string,
    params: Parameter[],
    body: Statement[],
    line?: number,
    returns?: string,
    bodyEnd?: number
  ): Statement {
    return { kind: 'FunctionDef', name, params, returns, body, line, bodyEnd };
  },

  Return(value?: Expression, line?: number): Statement {
    return { kind: 'Return', value, line };
  },

  Break(line?: number): Statement {
    return { kind: 'Break', line };
  },

  Continue(line?: number): Statement {
    return { kind: 'Continue', line };
  },

  Pass(line?: number): Statement {
    return { kind: 'Pass', line };
  },

  ImportFrom(module: string | null, names: string[], line?: number): Statement {
    return { kind: 'Import', module, names, line };
  },

  Unsupported(nodeType: string, line?: number): Statement {
    return { kind: 'Unsupported', nodeType, line };
  },

  Module(body: Statement[]): ModuleNode {
    return { kind: 'Module', body };
  }
};

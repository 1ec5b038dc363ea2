import type { AssignNode, Expression } from './syntax.js';
import type { TranslationContext } from './context.js';
import { isNumericLiteral, renderExpr } from './expression-translator.js';
import { sanitizeIdentifier } from './identifier-sanitizer.js';

/** `module` is the top level of the file; `block` is any function or compound body */
export type Scope = 'module' | 'block';

export type Declaration =
  | { form: 'construction'; typeName: string; target: string; args: Expression[] }
  | { form: 'macro'; name: string; value: Expression }
  | { form: 'assignment'; target: Expression; value: Expression };

/**
 * Decide how an assignment is declared in C++.
 *
 * Only the first target of `a = b = value` is used.
 */
export function classifyAssignment(node: AssignNode, scope: Scope, context: TranslationContext): Declaration {
  const target = node.targets[0];
  const value = node.value;

  if (
    target.kind === 'Identifier' &&
    value.kind === 'Call' &&
    value.callee.kind === 'Identifier' &&
    context.isConstructible(value.callee.name)
  ) {
    return { form: 'construction', typeName: value.callee.name, target: target.name, args: value.args };
  }

  if (scope === 'module' && node.targets.length === 1 && target.kind === 'Identifier' && isNumericLiteral(value)) {
    return { form: 'macro', name: target.name, value };
  }

  return { form: 'assignment', target, value };
}

export function renderDeclaration(declaration: Declaration): string {
  switch (declaration.form) {
    case 'construction':
      return `${declaration.typeName} ${sanitizeIdentifier(declaration.target)}(${declaration.args.map(renderExpr).join(', ')});`;
    case 'macro':
      return `#define ${sanitizeIdentifier(declaration.name)} ${renderExpr(declaration.value)}`;
    case 'assignment':
      return `${renderExpr(declaration.target)} = ${renderExpr(declaration.value)};`;
  }
}

/**
 * Syntax tree for the supported Python subset.
 *
 * py-ast trees are read into this closed union once (see tree-reader.ts);
 * every translator downstream switches on `kind` and never sees raw py-ast nodes.
 */

export type ArithmeticOperator =
  | 'Add' | 'Sub' | 'Mul' | 'Div' | 'FloorDiv' | 'Mod' | 'Pow'
  | 'BitAnd' | 'BitOr' | 'BitXor' | 'LShift' | 'RShift';

export type ComparisonOperator = 'Eq' | 'Ne' | 'Lt' | 'Le' | 'Gt' | 'Ge';

export type BooleanOperator = 'And' | 'Or';

export type UnaryOperator = 'Not' | 'Neg' | 'Pos' | 'Invert';

export type LiteralValue = number | bigint | string | boolean | null;

export interface BinaryOpNode {
  kind: 'BinaryOp';
  op: ArithmeticOperator;
  left: Expression;
  right: Expression;
}

export interface UnaryOpNode {
  kind: 'UnaryOp';
  op: UnaryOperator;
  operand: Expression;
}

export interface BooleanOpNode {
  kind: 'BooleanOp';
  op: BooleanOperator;
  values: Expression[];
}

export interface ComparisonNode {
  kind: 'Comparison';
  op: ComparisonOperator;
  left: Expression;
  right: Expression;
}

export interface CallNode {
  kind: 'Call';
  callee: Expression;
  args: Expression[];
}

export interface IdentifierNode {
  kind: 'Identifier';
  name: string;
}

export interface AttributeNode {
  kind: 'Attribute';
  receiver: Expression;
  name: string;
}

export interface SubscriptNode {
  kind: 'Subscript';
  receiver: Expression;
  index: Expression;
}

export interface ConditionalNode {
  kind: 'Conditional';
  test: Expression;
  then: Expression;
  otherwise: Expression;
}

export interface LiteralNode {
  kind: 'Literal';
  value: LiteralValue;
  /** Source spelling of a numeric literal, kept when C++ accepts it as-is */
  raw?: string;
}

export interface UnsupportedExpressionNode {
  kind: 'UnsupportedExpression';
  nodeType: string;
}

export type Expression =
  | BinaryOpNode
  | UnaryOpNode
  | BooleanOpNode
  | ComparisonNode
  | CallNode
  | IdentifierNode
  | AttributeNode
  | SubscriptNode
  | ConditionalNode
  | LiteralNode
  | UnsupportedExpressionNode;

interface Located {
  /** 1-based source line */
  line?: number;
}

// Compound statements record where each body ends, counting the indented
// comments that follow its last statement
interface Block {
  bodyEnd?: number;
}

export interface AssignNode extends Located {
  kind: 'Assign';
  targets: Expression[];
  value: Expression;
}

export interface AnnotatedAssignNode extends Located {
  kind: 'AnnotatedAssign';
  target: Expression;
  annotation?: string;
  value?: Expression;
}

export interface AugmentedAssignNode extends Located {
  kind: 'AugmentedAssign';
  target: Expression;
  op: ArithmeticOperator;
  value: Expression;
}

export interface ExpressionStatementNode extends Located {
  kind: 'ExpressionStatement';
  value: Expression;
}

export interface IfNode extends Located, Block {
  kind: 'If';
  test: Expression;
  body: Statement[];
  orelse: Statement[];
  orelseEnd?: number;
}

export interface WhileNode extends Located, Block {
  kind: 'While';
  test: Expression;
  body: Statement[];
}

export interface ForRangeNode extends Located, Block {
  kind: 'ForRange';
  target: string;
  /** Raw `range(...)` arguments; only one or two of them translate */
  args: Expression[];
  body: Statement[];
}

export interface Parameter {
  name: string;
  annotation?: string;
}

export interface FunctionDefNode extends Located, Block {
  kind: 'FunctionDef';
  name: string;
  params: Parameter[];
  returns?: string;
  body: Statement[];
}

export interface ReturnNode extends Located {
  kind: 'Return';
  value?: Expression;
}

export interface BreakNode extends Located {
  kind: 'Break';
}

export interface ContinueNode extends Located {
  kind: 'Continue';
}

export interface PassNode extends Located {
  kind: 'Pass';
}

export interface ImportNode extends Located {
  kind: 'Import';
  /** `null` for `import a, b` and for relative imports without a module */
  module: string | null;
  names: string[];
}

export interface UnsupportedNode extends Located {
  kind: 'Unsupported';
  nodeType: string;
}

export type Statement =
  | AssignNode
  | AnnotatedAssignNode
  | AugmentedAssignNode
  | ExpressionStatementNode
  | IfNode
  | WhileNode
  | ForRangeNode
  | FunctionDefNode
  | ReturnNode
  | BreakNode
  | ContinueNode
  | PassNode
  | ImportNode
  | UnsupportedNode;

export interface ModuleNode {
  kind: 'Module';
  body: Statement[];
}

export type SyntaxNode = Expression | Statement | ModuleNode;

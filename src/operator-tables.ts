import type {
  ArithmeticOperator,
  BooleanOperator,
  ComparisonOperator,
  UnaryOperator
} from './syntax.js';

export interface OperatorSpelling {
  /** `infix` joins operands with the token; `call` renders `token(a, b)` */
  form: 'infix' | 'call';
  token: string;
}

// C++ has no integer-division operator: Div and FloorDiv share `/`
export const ARITHMETIC_OPERATORS: Record<ArithmeticOperator, OperatorSpelling> = {
  Add: { form: 'infix', token: '+' },
  Sub: { form: 'infix', token: '-' },
  Mul: { form: 'infix', token: '*' },
  Div: { form: 'infix', token: '/' },
  FloorDiv: { form: 'infix', token: '/' },
  Mod: { form: 'infix', token: '%' },
  Pow: { form: 'call', token: 'pow' },
  BitAnd: { form: 'infix', token: '&' },
  BitOr: { form: 'infix', token: '|' },
  BitXor: { form: 'infix', token: '^' },
  LShift: { form: 'infix', token: '<<' },
  RShift: { form: 'infix', token: '>>' }
};

export const COMPARISON_OPERATORS: Record<ComparisonOperator, string> = {
  Eq: '==',
  Ne: '!=',
  Lt: '<',
  Le: '<=',
  Gt: '>',
  Ge: '>='
};

export const BOOLEAN_OPERATORS: Record<BooleanOperator, string> = {
  And: '&&',
  Or: '||'
};

export const UNARY_OPERATORS: Record<UnaryOperator, string> = {
  Not: '!',
  Neg: '-',
  Pos: '+',
  Invert: '~'
};

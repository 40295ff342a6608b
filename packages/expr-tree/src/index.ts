// Constructors
export {
	abs,
	add,
	angleBrackets,
	brackets,
	cos,
	cosh,
	curlyBrackets,
	divide,
	divideInline,
	exp,
	expression,
	ln,
	log,
	log10,
	max,
	min,
	multiply,
	negate,
	positive,
	power,
	product,
	root,
	roundBrackets,
	sin,
	sinh,
	sqrt,
	square,
	squareBrackets,
	subtract,
	sum,
	tan,
	tanh,
	variable,
} from './constructors.ts'
export { constant, operation } from './nodes.ts'

// Constants
export { E, ONE, PI, TWO, ZERO } from './constants.ts'

// Errors
export {
	ArityError,
	DomainError,
	StoreCorruptError,
	TexCalcError,
	UndefinedValueError,
} from './errors.ts'

// Formatting
export { formatValue, parseNumberFormat } from './format.ts'
export { toLaTeXVariable } from './latex.ts'

export { Precedence } from './types.ts'

// Types (use constructor functions to create instances)
export type { Expression, ExpressionExport } from './expression.ts'
export type { LaTeXCommand } from './latex.ts'
export type { OperandInput, Operation, Variable, VariableExport } from './nodes.ts'
export type { OperatorName } from './operators.ts'
export type { DisplayOptions, NodeKind, NumberFormat, RenderMode, TexNode } from './types.ts'

import { Precedence } from './types.ts'

export interface Arity {
	readonly min: number
	readonly max: number
}

const UNARY: Arity = { min: 1, max: 1 }
const BINARY: Arity = { min: 2, max: 2 }
const VARIADIC: Arity = { min: 1, max: Number.POSITIVE_INFINITY }

export interface OperatorDefinition {
	readonly arity: Arity
	/**
	 * Precedence of the rendered operation, or `'transparent'` to take the
	 * precedence of its single operand.
	 */
	readonly precedence: Precedence | 'transparent'
	/**
	 * Minimum precedence an operand in the given slot needs to render without brackets.
	 */
	readonly requires: (slot: number) => Precedence
	readonly compute: (values: readonly number[]) => number
	readonly format: (operands: readonly string[]) => string
}

const grouped = () => Precedence.grouped

function first(values: readonly number[]): number {
	return values[0] ?? Number.NaN
}

function second(values: readonly number[]): number {
	return values[1] ?? Number.NaN
}

function unaryFunction(
	compute: (x: number) => number,
	format: (arg: string) => string,
): OperatorDefinition {
	return {
		arity: UNARY,
		precedence: Precedence.atom,
		requires: grouped,
		compute: (values) => compute(first(values)),
		format: ([arg = '']) => format(arg),
	}
}

function bracket(open: string, close: string): OperatorDefinition {
	return unaryFunction(
		(x) => x,
		(arg) => `\\left${open} ${arg} \\right${close}`,
	)
}

export const OPERATORS = {
	sum: {
		arity: VARIADIC,
		precedence: Precedence.sum,
		requires: () => Precedence.sum,
		compute: (values) => values.reduce((total, x) => total + x),
		format: (operands) => operands.join(' + '),
	},
	subtract: {
		arity: BINARY,
		precedence: Precedence.sum,
		requires: (slot) => (slot === 0 ? Precedence.sum : Precedence.product),
		compute: (values) => first(values) - second(values),
		format: ([left, right]) => `${left} - ${right}`,
	},
	product: {
		arity: VARIADIC,
		precedence: Precedence.product,
		requires: () => Precedence.product,
		compute: (values) => values.reduce((total, x) => total * x),
		format: (operands) => operands.join(' \\cdot '),
	},
	divide: {
		arity: BINARY,
		precedence: Precedence.atom,
		requires: grouped,
		compute: (values) => first(values) / second(values),
		format: ([numerator, denominator]) => `\\frac{ ${numerator} }{ ${denominator} }`,
	},
	divideInline: {
		arity: BINARY,
		precedence: Precedence.product,
		requires: (slot) => (slot === 0 ? Precedence.product : Precedence.power),
		compute: (values) => first(values) / second(values),
		format: ([left, right]) => `${left} / ${right}`,
	},
	power: {
		arity: BINARY,
		precedence: Precedence.power,
		requires: (slot) => (slot === 0 ? Precedence.atom : Precedence.grouped),
		compute: (values) => first(values) ** second(values),
		format: ([base, exponent]) => `{ ${base} }^{ ${exponent} }`,
	},
	root: {
		arity: BINARY,
		precedence: Precedence.atom,
		requires: grouped,
		compute: (values) => second(values) ** (1 / first(values)),
		format: ([degree, radicand]) => `\\sqrt[ ${degree} ]{ ${radicand} }`,
	},
	log: {
		arity: BINARY,
		precedence: Precedence.atom,
		requires: grouped,
		compute: (values) => Math.log(second(values)) / Math.log(first(values)),
		format: ([base, argument]) => `\\log_{ ${base} }{ ${argument} }`,
	},
	max: {
		arity: VARIADIC,
		precedence: Precedence.atom,
		requires: grouped,
		compute: (values) => Math.max(...values),
		format: (operands) => `\\max{\\left( ${operands.join(', ')} \\right)}`,
	},
	min: {
		arity: VARIADIC,
		precedence: Precedence.atom,
		requires: grouped,
		compute: (values) => Math.min(...values),
		format: (operands) => `\\min{\\left( ${operands.join(', ')} \\right)}`,
	},
	negate: {
		arity: UNARY,
		precedence: Precedence.atom,
		requires: () => Precedence.product,
		compute: (values) => -first(values),
		format: ([arg]) => `\\left( - ${arg} \\right)`,
	},
	positive: {
		arity: UNARY,
		precedence: 'transparent',
		requires: grouped,
		compute: first,
		format: ([arg = '']) => arg,
	},
	abs: unaryFunction(Math.abs, (arg) => `\\left| ${arg} \\right|`),
	square: {
		arity: UNARY,
		precedence: Precedence.power,
		requires: () => Precedence.atom,
		compute: (values) => first(values) ** 2,
		format: ([base]) => `${base}^2`,
	},
	sqrt: unaryFunction(Math.sqrt, (arg) => `\\sqrt{ ${arg} }`),
	sin: unaryFunction(Math.sin, (arg) => `\\sin{ ${arg} }`),
	cos: unaryFunction(Math.cos, (arg) => `\\cos{ ${arg} }`),
	tan: unaryFunction(Math.tan, (arg) => `\\tan{ ${arg} }`),
	sinh: unaryFunction(Math.sinh, (arg) => `\\sinh{ ${arg} }`),
	cosh: unaryFunction(Math.cosh, (arg) => `\\cosh{ ${arg} }`),
	tanh: unaryFunction(Math.tanh, (arg) => `\\tanh{ ${arg} }`),
	exp: {
		arity: UNARY,
		precedence: Precedence.power,
		requires: grouped,
		compute: (values) => Math.exp(first(values)),
		format: ([arg]) => `\\mathrm{e}^{ ${arg} }`,
	},
	ln: unaryFunction(Math.log, (arg) => `\\ln{ ${arg} }`),
	log10: unaryFunction(Math.log10, (arg) => `\\log_{10}{ ${arg} }`),
	roundBrackets: bracket('(', ')'),
	squareBrackets: bracket('[', ']'),
	curlyBrackets: bracket('\\{', '\\}'),
	angleBrackets: bracket('\\langle', '\\rangle'),
} satisfies Record<string, OperatorDefinition>

export type OperatorName = keyof typeof OPERATORS

export function describeArity(arity: Arity): string {
	if (arity.min === arity.max) {
		return arity.min === 1 ? 'exactly 1 operand' : `exactly ${arity.min} operands`
	}
	return `at least ${arity.min} operand${arity.min === 1 ? '' : 's'}`
}

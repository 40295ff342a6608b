import { Expression } from './expression.ts'
import { type OperandInput, type Operation, operation, toNode, Variable } from './nodes.ts'
import type { DisplayOptions } from './types.ts'

export function variable(
	name: string,
	value?: number,
	unit = '',
	options: DisplayOptions = {},
): Variable {
	if (typeof name !== 'string' || name.length === 0) {
		throw new TypeError('Variable name must be a non-empty string')
	}
	if (value !== undefined && Number.isNaN(value)) {
		throw new TypeError(`Variable '${name}' cannot hold NaN`)
	}
	return new Variable(name, value, unit, options)
}

export function expression(
	name: string,
	root: OperandInput,
	unit = '',
	options: DisplayOptions = {},
): Expression {
	if (typeof name !== 'string' || name.length === 0) {
		throw new TypeError('Expression name must be a non-empty string')
	}
	return new Expression(name, toNode(root), unit, options)
}

// N-ary

/**
 * `a + b + ...`
 */
export function sum(...operands: OperandInput[]): Operation {
	return operation('sum', ...operands)
}

export const add = sum

/**
 * `a \cdot b \cdot ...`
 */
export function product(...operands: OperandInput[]): Operation {
	return operation('product', ...operands)
}

export const multiply = product

export function max(...operands: OperandInput[]): Operation {
	return operation('max', ...operands)
}

export function min(...operands: OperandInput[]): Operation {
	return operation('min', ...operands)
}

// Binary

export function subtract(left: OperandInput, right: OperandInput): Operation {
	return operation('subtract', left, right)
}

/**
 * Division typeset as `\frac{ numerator }{ denominator }`.
 */
export function divide(numerator: OperandInput, denominator: OperandInput): Operation {
	return operation('divide', numerator, denominator)
}

/**
 * Division typeset inline as `left / right`.
 */
export function divideInline(left: OperandInput, right: OperandInput): Operation {
	return operation('divideInline', left, right)
}

export function power(base: OperandInput, exponent: OperandInput): Operation {
	return operation('power', base, exponent)
}

/**
 * The `degree`-th root of `radicand`.
 */
export function root(degree: OperandInput, radicand: OperandInput): Operation {
	return operation('root', degree, radicand)
}

/**
 * Logarithm of `argument` to the given `base`.
 */
export function log(base: OperandInput, argument: OperandInput): Operation {
	return operation('log', base, argument)
}

// Unary

export function negate(arg: OperandInput): Operation {
	return operation('negate', arg)
}

export function positive(arg: OperandInput): Operation {
	return operation('positive', arg)
}

export function abs(arg: OperandInput): Operation {
	return operation('abs', arg)
}

export function square(arg: OperandInput): Operation {
	return operation('square', arg)
}

export function sqrt(arg: OperandInput): Operation {
	return operation('sqrt', arg)
}

export function sin(arg: OperandInput): Operation {
	return operation('sin', arg)
}

export function cos(arg: OperandInput): Operation {
	return operation('cos', arg)
}

export function tan(arg: OperandInput): Operation {
	return operation('tan', arg)
}

export function sinh(arg: OperandInput): Operation {
	return operation('sinh', arg)
}

export function cosh(arg: OperandInput): Operation {
	return operation('cosh', arg)
}

export function tanh(arg: OperandInput): Operation {
	return operation('tanh', arg)
}

export function exp(arg: OperandInput): Operation {
	return operation('exp', arg)
}

export function ln(arg: OperandInput): Operation {
	return operation('ln', arg)
}

export function log10(arg: OperandInput): Operation {
	return operation('log10', arg)
}

// Brackets: evaluate to their operand

export function roundBrackets(arg: OperandInput): Operation {
	return operation('roundBrackets', arg)
}

export const brackets = roundBrackets

export function squareBrackets(arg: OperandInput): Operation {
	return operation('squareBrackets', arg)
}

export function curlyBrackets(arg: OperandInput): Operation {
	return operation('curlyBrackets', arg)
}

export function angleBrackets(arg: OperandInput): Operation {
	return operation('angleBrackets', arg)
}

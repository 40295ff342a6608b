/**
 * Base class for every failure raised while building, evaluating or persisting expressions.
 */
export class TexCalcError extends Error {
	override name = 'TexCalcError'
}

/**
 * Evaluation reached a variable that has no value assigned.
 */
export class UndefinedValueError extends TexCalcError {
	override name = 'UndefinedValueError'
	readonly variable: string

	constructor(variable: string) {
		super(`Variable '${variable}' has no value assigned`)
		this.variable = variable
	}
}

/**
 * An operation received a number of operands outside its allowed range.
 */
export class ArityError extends TexCalcError {
	override name = 'ArityError'
	readonly operator: string
	readonly received: number

	constructor(operator: string, expected: string, received: number) {
		super(`Operation '${operator}' expects ${expected}, received ${received}`)
		this.operator = operator
		this.received = received
	}
}

/**
 * An evaluation rule produced a non-finite result from finite operands.
 */
export class DomainError extends TexCalcError {
	override name = 'DomainError'
	readonly operator: string
	readonly operands: readonly number[]

	constructor(operator: string, operands: readonly number[]) {
		super(`Operation '${operator}' is undefined for operands (${operands.join(', ')})`)
		this.operator = operator
		this.operands = operands
	}
}

/**
 * The variable store file could not be parsed.
 */
export class StoreCorruptError extends TexCalcError {
	override name = 'StoreCorruptError'
	readonly file: string

	constructor(file: string, reason: string, options?: { cause?: unknown }) {
		super(`Variable store '${file}' is corrupt: ${reason}`, options)
		this.file = file
	}
}

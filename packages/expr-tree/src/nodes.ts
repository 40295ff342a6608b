import { ArityError, DomainError, UndefinedValueError } from './errors.ts'
import {
	DEFAULT_UNIT_FORMAT,
	formatValue,
	normalizeExponent,
	normalizeFormat,
	withUnit,
} from './format.ts'
import { type LaTeXCommand, toLaTeXVariable } from './latex.ts'
import { describeArity, OPERATORS, type OperatorDefinition, type OperatorName } from './operators.ts'
import {
	type DisplayOptions,
	type NodeKind,
	type NumberFormat,
	Precedence,
	type RenderMode,
	type TexNode,
} from './types.ts'

export type OperandInput = TexNode | number

export type VariableExport = 'float' | 'str' | 'valunit' | 'all'

function wrapIfNeeded(node: TexNode, mode: RenderMode, required: Precedence): string {
	const rendered = node.renderTerm(mode)
	return node.precedenceIn(mode) < required ? `\\left( ${rendered} \\right)` : rendered
}

/**
 * Shared behaviour of every node: display state for the result form and the
 * arithmetic builders. Builders return new operations and never evaluate.
 */
export abstract class QuantityNode implements TexNode {
	abstract readonly kind: NodeKind
	format: NumberFormat
	exponent: number

	constructor(options: DisplayOptions) {
		this.format = normalizeFormat(options.format)
		this.exponent = normalizeExponent(options.exponent)
	}

	abstract value(): number
	abstract precedenceIn(mode: RenderMode): Precedence
	abstract renderTerm(mode: RenderMode): string
	abstract strSymbolic(): string
	abstract strSubstituted(): string
	abstract toString(): string

	strResult(): string {
		return formatValue(this.value(), this.format, this.exponent)
	}

	/**
	 * Precedence of `strResult()`: scaled non-negative values read as a product,
	 * negative ones are already bracketed.
	 */
	protected resultPrecedence(): Precedence {
		return this.exponent !== 0 && !(this.value() < 0) ? Precedence.product : Precedence.atom
	}

	add(other: OperandInput): Operation {
		return operation('sum', this, other)
	}

	subtract(other: OperandInput): Operation {
		return operation('subtract', this, other)
	}

	multiply(other: OperandInput): Operation {
		return operation('product', this, other)
	}

	/**
	 * Division rendered as a stacked `\frac`.
	 */
	divide(other: OperandInput): Operation {
		return operation('divide', this, other)
	}

	/**
	 * Division rendered inline with a slash.
	 */
	divideInline(other: OperandInput): Operation {
		return operation('divideInline', this, other)
	}

	power(other: OperandInput): Operation {
		return operation('power', this, other)
	}

	negate(): Operation {
		return operation('negate', this)
	}

	positive(): Operation {
		return operation('positive', this)
	}

	abs(): Operation {
		return operation('abs', this)
	}
}

export class Variable extends QuantityNode {
	readonly kind = 'variable'
	readonly name: string
	unit: string
	unitFormat: string
	private assigned: number | undefined

	constructor(name: string, value?: number, unit = '', options: DisplayOptions = {}) {
		super(options)
		this.name = name
		this.assigned = value
		this.unit = unit
		this.unitFormat = options.unitFormat ?? DEFAULT_UNIT_FORMAT
	}

	/**
	 * Replace the stored value. Passing `undefined` returns the variable to the declared state.
	 */
	assign(value: number | undefined): this {
		this.assigned = value
		return this
	}

	isAssigned(): boolean {
		return this.assigned !== undefined
	}

	value(): number {
		if (this.assigned === undefined) {
			throw new UndefinedValueError(this.name)
		}
		return this.assigned
	}

	precedenceIn(mode: RenderMode): Precedence {
		return mode === 'symbolic' ? Precedence.atom : this.resultPrecedence()
	}

	renderTerm(mode: RenderMode): string {
		return mode === 'symbolic' ? this.strSymbolic() : this.strResult()
	}

	strSymbolic(): string {
		return `{${this.name}}`
	}

	strSubstituted(): string {
		return this.strResult()
	}

	strResultWithUnit(): string {
		return withUnit(this.strResult(), this.unit, this.unitFormat)
	}

	override toString(): string {
		return `${this.name} = ${this.strResultWithUnit()}`
	}

	toLaTeXVariable(macro: string, what: VariableExport = 'float', command?: LaTeXCommand): string {
		return toLaTeXVariable(macro, this.exportAs(what), command)
	}

	private exportAs(what: VariableExport): string {
		switch (what) {
			case 'float':
				return String(this.value())
			case 'str':
				return this.strResult()
			case 'valunit':
				return this.strResultWithUnit()
			case 'all':
				return this.toString()
		}
	}

	copy(): Variable {
		return new Variable(this.name, this.assigned, this.unit, {
			format: this.format,
			unitFormat: this.unitFormat,
			exponent: this.exponent,
		})
	}
}

export class Operation extends QuantityNode {
	readonly kind = 'operation'
	readonly operator: OperatorName
	readonly operands: readonly TexNode[]

	constructor(
		operator: OperatorName,
		operands: readonly TexNode[],
		options: Omit<DisplayOptions, 'unitFormat'> = {},
	) {
		super(options)
		this.operator = operator
		this.operands = operands
	}

	private get definition(): OperatorDefinition {
		return OPERATORS[this.operator]
	}

	precedenceIn(mode: RenderMode): Precedence {
		const { precedence } = this.definition
		if (precedence === 'transparent') {
			return this.operands[0]?.precedenceIn(mode) ?? Precedence.atom
		}
		return precedence
	}

	value(): number {
		const values = this.operands.map((operand) => operand.value())
		const result = this.definition.compute(values)
		if (!Number.isFinite(result) && values.every(Number.isFinite)) {
			throw new DomainError(this.operator, values)
		}
		return result
	}

	renderTerm(mode: RenderMode): string {
		const { requires, format } = this.definition
		const rendered = this.operands.map((operand, slot) =>
			wrapIfNeeded(operand, mode, requires(slot)),
		)
		return format(rendered)
	}

	strSymbolic(): string {
		return this.renderTerm('symbolic')
	}

	strSubstituted(): string {
		return this.renderTerm('substituted')
	}

	override toString(): string {
		return `${this.strSymbolic()} = ${this.strSubstituted()}`
	}

	/**
	 * Capture the current result in a new variable.
	 */
	toVariable(name: string, unit = '', options: DisplayOptions = {}): Variable {
		return new Variable(name, this.value(), unit, options)
	}
}

export function constant(value: number): Variable {
	if (!Number.isFinite(value)) {
		throw new TypeError('Literal operand must be a finite number')
	}
	// Negative literals are named as they substitute
	const name = value < 0 ? `\\left( ${value} \\right)` : String(value)
	return new Variable(name, value, '', { format: { notation: 'general' } })
}

export function toNode(input: OperandInput): TexNode {
	return typeof input === 'number' ? constant(input) : input
}

/**
 * Build an operation, checking the operand count against the operator's arity.
 */
export function operation(operator: OperatorName, ...operands: OperandInput[]): Operation {
	const { arity } = OPERATORS[operator]
	if (operands.length < arity.min || operands.length > arity.max) {
		throw new ArityError(operator, describeArity(arity), operands.length)
	}
	return new Operation(operator, operands.map(toNode))
}

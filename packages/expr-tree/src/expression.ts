import { DEFAULT_UNIT_FORMAT, withUnit } from './format.ts'
import { type LaTeXCommand, toLaTeXVariable } from './latex.ts'
import { QuantityNode, Variable } from './nodes.ts'
import { type DisplayOptions, Precedence, type RenderMode, type TexNode } from './types.ts'

export type ExpressionExport = 'float' | 'str' | 'valunit' | 'symb' | 'subst' | 'all'

/**
 * Named, unit-labelled quantity defined by a tree of operations.
 * Renders like a variable whose value is computed from its root node.
 */
export class Expression extends QuantityNode {
	readonly kind = 'expression'
	readonly name: string
	readonly operation: TexNode
	unit: string
	unitFormat: string

	constructor(name: string, operation: TexNode, unit = '', options: DisplayOptions = {}) {
		super(options)
		this.name = name
		this.operation = operation
		this.unit = unit
		this.unitFormat = options.unitFormat ?? DEFAULT_UNIT_FORMAT
	}

	value(): number {
		return this.operation.value()
	}

	precedenceIn(mode: RenderMode): Precedence {
		return mode === 'symbolic' ? Precedence.atom : this.resultPrecedence()
	}

	/**
	 * Inside another operation an expression stands for its name or its value.
	 */
	renderTerm(mode: RenderMode): string {
		return mode === 'symbolic' ? `{${this.name}}` : this.strResult()
	}

	strSymbolic(): string {
		return `${this.name} = ${this.operation.renderTerm('symbolic')}`
	}

	strSubstituted(): string {
		return `${this.name} = ${this.operation.renderTerm('substituted')}`
	}

	strResultWithUnit(): string {
		return withUnit(this.strResult(), this.unit, this.unitFormat)
	}

	/**
	 * The full chain `name = symbolic = substituted = result unit`.
	 */
	strFull(): string {
		const symbolic = this.operation.renderTerm('symbolic')
		const substituted = this.operation.renderTerm('substituted')
		return `${this.name} = ${symbolic} = ${substituted} = ${this.strResultWithUnit()}`
	}

	override toString(): string {
		return `${this.name} = ${this.strResultWithUnit()}`
	}

	toVariable(name = this.name): Variable {
		return new Variable(name, this.value(), this.unit, {
			format: this.format,
			unitFormat: this.unitFormat,
			exponent: this.exponent,
		})
	}

	toLaTeXVariable(macro: string, what: ExpressionExport = 'float', command?: LaTeXCommand): string {
		return toLaTeXVariable(macro, this.exportAs(what), command)
	}

	private exportAs(what: ExpressionExport): string {
		switch (what) {
			case 'float':
				return String(this.value())
			case 'str':
				return this.strResult()
			case 'valunit':
				return this.strResultWithUnit()
			case 'symb':
				return this.strSymbolic()
			case 'subst':
				return this.strSubstituted()
			case 'all':
				return this.strFull()
		}
	}
}

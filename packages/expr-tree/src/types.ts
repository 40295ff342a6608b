/**
 * Numeric formatting applied to a displayed value.
 */
export type NumberFormat =
	| { readonly notation: 'fixed'; readonly digits: number }
	| { readonly notation: 'exponential'; readonly digits: number }
	| { readonly notation: 'precision'; readonly digits: number }
	| { readonly notation: 'general' }

export type RenderMode = 'symbolic' | 'substituted'

export type NodeKind = 'variable' | 'operation' | 'expression'

/**
 * Binding strength of a rendered node. A template slot wraps any operand
 * whose precedence is lower than the slot requires.
 */
export const Precedence = {
	grouped: 0,
	sum: 1,
	product: 2,
	power: 3,
	atom: 4,
} as const

export type Precedence = (typeof Precedence)[keyof typeof Precedence]

/**
 * Display configuration shared by variables, expressions and operations.
 */
export interface DisplayOptions {
	/**
	 * Structured format, or a printf-style string such as `'%.3f'`.
	 * @default { notation: 'fixed', digits: 2 }
	 */
	readonly format?: NumberFormat | string
	/**
	 * Template wrapping the unit label; `%s` is replaced by the unit.
	 * @default '\\mathrm{%s}'
	 */
	readonly unitFormat?: string
	/**
	 * Power of ten factored out of the displayed value.
	 * @default 0
	 */
	readonly exponent?: number
}

/**
 * Internal node interface - implemented by variables, operations and expressions
 */
export interface TexNode {
	readonly kind: NodeKind

	/**
	 * Binding strength of the form `renderTerm(mode)` produces. A value with a
	 * factored-out exponent renders as a product.
	 */
	precedenceIn(mode: RenderMode): Precedence

	/**
	 * Evaluate this node, recomputing from the current operand values
	 */
	value(): number

	/**
	 * Render this node as an operand of an enclosing operation
	 */
	renderTerm(mode: RenderMode): string

	strSymbolic(): string
	strSubstituted(): string
	strResult(): string
	toString(): string
}

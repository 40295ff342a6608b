import * as fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import {
	divide,
	expression,
	operation,
	product,
	sqrt,
	sum,
	UndefinedValueError,
	variable,
} from '../src/index.ts'
import type { NumberFormat, OperatorName } from '../src/index.ts'

const valueArb = fc.double({ min: -1e6, max: 1e6, noNaN: true })
const formatArb: fc.Arbitrary<NumberFormat> = fc.oneof(
	fc.record({ notation: fc.constant('fixed' as const), digits: fc.integer({ min: 0, max: 8 }) }),
	fc.record({
		notation: fc.constant('exponential' as const),
		digits: fc.integer({ min: 0, max: 8 }),
	}),
	fc.record({ notation: fc.constant('precision' as const), digits: fc.integer({ min: 1, max: 8 }) }),
	fc.constant({ notation: 'general' as const }),
)
const exponentArb = fc.integer({ min: -6, max: 6 })
const nameArb = fc.constantFrom('a', 'b', 'F', 'x_1', 'M_{Ed}', '\\alpha')

describe('properties', () => {
	it('leaf substitution equals the result form', () => {
		fc.assert(
			fc.property(nameArb, valueArb, formatArb, exponentArb, (name, value, format, exponent) => {
				const v = variable(name, value, 'm', { format, exponent })
				expect(v.strSubstituted()).toBe(v.strResult())
			}),
		)
	})

	it('evaluation is deterministic for identical trees', () => {
		const operators: OperatorName[] = ['sum', 'subtract', 'product', 'max', 'min']
		const opArb = fc.constantFrom(...operators)
		fc.assert(
			fc.property(opArb, valueArb, valueArb, (operator, x, y) => {
				const a = variable('a', x)
				const b = variable('b', y)
				expect(operation(operator, a, b).value()).toBe(operation(operator, a, b).value())
			}),
		)
	})

	it('rendering preserves operand order', () => {
		fc.assert(
			fc.property(valueArb, valueArb, (x, y) => {
				const a = variable('a', x)
				const b = variable('b', y)
				expect(sum(a, b).strSymbolic()).not.toBe(sum(b, a).strSymbolic())
				expect(sum(a, b).value()).toBe(sum(b, a).value())
			}),
		)
	})

	it('operations recompute after reassignment', () => {
		fc.assert(
			fc.property(valueArb, valueArb, (first, second) => {
				const x = variable('x', first)
				const doubled = product(x, 2)
				expect(doubled.value()).toBe(first * 2)
				x.assign(second)
				expect(doubled.value()).toBe(second * 2)
			}),
		)
	})

	it('an unassigned variable fails evaluation at any depth', () => {
		fc.assert(
			fc.property(fc.integer({ min: 0, max: 20 }), (depth) => {
				let node = sum(variable('x'), 1)
				for (let i = 0; i < depth; i++) {
					node = i % 2 === 0 ? product(node, 2) : sum(sqrt(4), node)
				}
				expect(() => node.value()).toThrow(UndefinedValueError)
			}),
		)
	})
})

describe('scenarios', () => {
	it('renders a variable as name, value and unit', () => {
		expect(String(variable('H', 3.25, 'm'))).toBe('H = 3.25 \\ \\mathrm{m}')
	})

	it('defines an expression by a fraction', () => {
		const a = variable('a', 4, 'm')
		const b = variable('b', 2, 'm')
		const e = expression('c', divide(a, b), '')

		expect(e.value()).toBe(2)
		expect(e.strSymbolic()).toBe('c = \\frac{ {a} }{ {b} }')
		expect(String(e)).toBe('c = 2.00')
	})

	it('evaluates once a declared variable is assigned', () => {
		const v = variable('x', undefined, 'kN')
		const ratio = divide(v, variable('y', 2, 'm'))

		expect(() => ratio.value()).toThrow(UndefinedValueError)
		v.assign(10)
		expect(ratio.value()).toBe(5)
	})
})

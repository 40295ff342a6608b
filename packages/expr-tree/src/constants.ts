import { Variable } from './nodes.ts'

export const ZERO = new Variable('0', 0, '', { format: '%d' })
export const ONE = new Variable('1', 1, '', { format: '%d' })
export const TWO = new Variable('2', 2, '', { format: '%d' })

/** Euler's number */
export const E = new Variable('\\mathrm{e}', Math.E)

export const PI = new Variable('\\pi', Math.PI)

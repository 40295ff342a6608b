/**
 * Bending moment of a cantilever, split over two document snippets.
 * The first snippet computes the moment and saves it; the second reloads it
 * as if it ran in a fresh process.
 */

import { join } from 'node:path'
import {
	divide,
	expression,
	loadVars,
	multiply,
	saveVars,
	square,
	sum,
	variable,
} from '../src/index.ts'

const file = join(process.cwd(), 'cantilever-vars.json')

// Snippet 1
const F = variable('F', 4.5, 'kN')
const q = variable('q', 1.2, 'kN/m')
const L = variable('L', 3, 'm')
const M = expression('M', sum(multiply(F, L), divide(multiply(q, square(L)), 2)), 'kNm')

console.log(`$$ ${F} $$`)
console.log(`$$ ${q} $$`)
console.log(`$$ ${L} $$`)
console.log(`$$ ${M.strFull()} $$`)

saveVars({ F, q, L, M }, { file })

// Snippet 2
const moment = variable('M', undefined, 'kNm', { format: '%.1f' })
const loaded = loadVars({ M: moment }, { file })
console.log(`Loaded ${loaded.join(', ')}`)
console.log(`$$ ${moment} $$`)
console.log(moment.toLaTeXVariable('moment', 'valunit'))

import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
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

// Two snippets of one document build, sharing values only through the store file
describe('document build', () => {
	let dir: string

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'texcalc-document-'))
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	it('reuses a result computed in an earlier snippet', () => {
		const file = join(dir, 'vars.json')

		// First snippet: cantilever moment
		{
			const F = variable('F', 4.5, 'kN')
			const q = variable('q', 1.2, 'kN/m')
			const L = variable('L', 3, 'm')
			const M = expression('M', sum(multiply(F, L), divide(multiply(q, square(L)), 2)), 'kNm')

			expect(M.strFull()).toBe(
				'M = {F} \\cdot {L} + \\frac{ {q} \\cdot {L}^2 }{ {2} } = 4.50 \\cdot 3.00 + \\frac{ 1.20 \\cdot 3.00^2 }{ 2 } = 18.90 \\ \\mathrm{kNm}',
			)
			saveVars({ F, L, M }, { file })
		}

		// Second snippet: bending stress from the stored moment
		{
			const M = variable('M', undefined, 'kNm')
			const W = variable('W', 0.5, 'm^3')
			expect(loadVars({ M }, { file })).toEqual(['M'])

			const sigma = expression('\\sigma', divide(M, W), 'kPa', { format: '%.1f' })
			expect(sigma.strFull()).toBe(
				'\\sigma = \\frac{ {M} }{ {W} } = \\frac{ 18.90 }{ 0.50 } = 37.8 \\ \\mathrm{kPa}',
			)
			expect(sigma.toLaTeXVariable('stress', 'valunit')).toBe(
				'\\def\\stress{37.8 \\ \\mathrm{kPa}}',
			)
		}
	})
})

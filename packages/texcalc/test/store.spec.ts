import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import * as fc from 'fast-check'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
	expression,
	loadVars,
	readVars,
	resolveStoreFile,
	saveVars,
	StoreCorruptError,
	sum,
	UndefinedValueError,
	variable,
} from '../src/index.ts'

describe('variable store', () => {
	let dir: string
	let file: string

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'texcalc-store-'))
		file = join(dir, 'vars.json')
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	describe('saveVars', () => {
		it('writes a versioned document', () => {
			saveVars({ F: variable('F', 4.5, 'kN'), x: variable('x') }, { file })

			expect(JSON.parse(readFileSync(file, 'utf8'))).toEqual({
				version: 1,
				variables: {
					F: { value: 4.5, unit: 'kN' },
					x: { value: null, unit: '' },
				},
			})
		})

		it('stores expressions, operations and numbers by value', () => {
			const a = variable('a', 2, 'm')
			saveVars(
				{
					area: expression('A', a.multiply(a), 'm^2'),
					doubled: sum(a, a),
					count: 3,
				},
				{ file },
			)

			expect(readVars({ file })).toEqual({
				area: { value: 4, unit: 'm^2' },
				doubled: { value: 4, unit: '' },
				count: { value: 3, unit: '' },
			})
		})

		it('replaces the previous content', () => {
			saveVars({ a: variable('a', 1) }, { file })
			saveVars({ b: variable('b', 2) }, { file })

			expect(Object.keys(readVars({ file }))).toEqual(['b'])
		})

		it('writes nothing when an entry cannot be evaluated', () => {
			saveVars({ a: variable('a', 1) }, { file })

			expect(() => saveVars({ a: variable('a', 5), e: sum(variable('u'), 1) }, { file })).toThrow(
				UndefinedValueError,
			)
			expect(readVars({ file })).toEqual({ a: { value: 1, unit: '' } })
		})

		it('spells out values JSON cannot carry', () => {
			saveVars(
				{
					inf: Number.POSITIVE_INFINITY,
					ninf: Number.NEGATIVE_INFINITY,
					nan: Number.NaN,
					nzero: -0,
				},
				{ file },
			)

			const stored = readVars({ file })
			expect(stored.inf?.value).toBe(Number.POSITIVE_INFINITY)
			expect(stored.ninf?.value).toBe(Number.NEGATIVE_INFINITY)
			expect(stored.nan?.value).toBeNaN()
			expect(Object.is(stored.nzero?.value, -0)).toBe(true)
		})
	})

	describe('loadVars', () => {
		it('assigns stored values to variables of the same name', () => {
			saveVars({ F: variable('F', 4.5, 'kN'), L: variable('L', 3, 'm') }, { file })

			const F = variable('F', undefined, 'kN')
			const L = variable('L', undefined, 'm')
			expect(loadVars({ F, L }, { file })).toEqual(['F', 'L'])
			expect(F.value()).toBe(4.5)
			expect(L.value()).toBe(3)
		})

		it('ignores stored names missing from the mapping', () => {
			saveVars({ F: variable('F', 4.5), L: variable('L', 3) }, { file })

			const L = variable('L')
			expect(loadVars({ L }, { file })).toEqual(['L'])
			expect(L.value()).toBe(3)
		})

		it('leaves variables that were not stored untouched', () => {
			saveVars({ a: variable('a', 1) }, { file })

			const b = variable('b', 7)
			expect(loadVars({ b }, { file })).toEqual([])
			expect(b.value()).toBe(7)
		})

		it('restores the declared state', () => {
			saveVars({ x: variable('x') }, { file })

			const x = variable('x', 10)
			loadVars({ x }, { file })
			expect(x.isAssigned()).toBe(false)
		})

		it('does not check stored units', () => {
			saveVars({ F: variable('F', 4500, 'N') }, { file })

			const F = variable('F', undefined, 'kN')
			loadVars({ F }, { file })
			expect(String(F)).toBe('F = 4500.00 \\ \\mathrm{kN}')
		})

		it('round trips every double', () => {
			fc.assert(
				fc.property(fc.double(), (value) => {
					saveVars({ x: variable('x').assign(value) }, { file })
					const x = variable('x')
					loadVars({ x }, { file })
					expect(Object.is(x.value(), value)).toBe(true)
				}),
				{ numRuns: 50 },
			)
		})
	})

	describe('missing and corrupt files', () => {
		it('reads a missing file as empty', () => {
			const missing = join(dir, 'missing.json')

			expect(readVars({ file: missing })).toEqual({})
			expect(loadVars({ x: variable('x') }, { file: missing })).toEqual([])
		})

		it('rejects content that is not JSON', () => {
			writeFileSync(file, '{ not json', 'utf8')

			try {
				readVars({ file })
				expect.unreachable()
			} catch (error) {
				expect.assert(error instanceof StoreCorruptError)
				expect(error.file).toBe(file)
				expect(error.message).toBe(`Variable store '${file}' is corrupt: content is not valid JSON`)
			}
		})

		it('rejects an unknown version', () => {
			writeFileSync(file, JSON.stringify({ version: 2, variables: {} }), 'utf8')

			expect(() => readVars({ file })).toThrow(StoreCorruptError)
			expect(() => readVars({ file })).toThrow(/version/)
		})

		it('rejects malformed entries', () => {
			writeFileSync(
				file,
				JSON.stringify({ version: 1, variables: { F: { value: 'heavy', unit: 'kN' } } }),
				'utf8',
			)

			expect(() => loadVars({ F: variable('F') }, { file })).toThrow(/variables\.F\.value/)
		})
	})

	describe('resolveStoreFile', () => {
		afterEach(() => {
			vi.unstubAllEnvs()
		})

		it('prefers the explicit file', () => {
			vi.stubEnv('TEXCALC_STORE', join(dir, 'env.json'))
			expect(resolveStoreFile({ file })).toBe(file)
		})

		it('falls back to the environment', () => {
			const envFile = join(dir, 'env.json')
			vi.stubEnv('TEXCALC_STORE', envFile)

			expect(resolveStoreFile()).toBe(envFile)
			saveVars({ a: variable('a', 1) })
			expect(readVars({ file: envFile })).toEqual({ a: { value: 1, unit: '' } })
		})

		it('defaults to the temp directory', () => {
			vi.stubEnv('TEXCALC_STORE', undefined)
			expect(resolveStoreFile()).toBe(join(tmpdir(), 'texcalc-vars.json'))
		})
	})
})

import { describe, expect, it } from 'vitest'
import { parseCliArgs } from './config.js'
import { ConfigurationError } from './errors.js'

describe('parseCliArgs', () => {
	it('falls back to the sample dataset defaults', () => {
		const options = parseCliArgs([])
		expect(options.seed).toBe(1)
		expect(options.force).toBe(false)
		expect(options.manifest).toBe(false)
		expect(options.verify).toBe(false)
		expect(options.corpus.outDir).toBe('datasets/sample')
		expect(options.corpus.bench).toEqual({ mode: 'flat', count: 120 })
		expect(options.corpus.aagCount).toBe(120)
		expect(options.corpus.subset).toEqual({ dirName: 'run15', bench: 8, aag: 7 })
	})

	it('reads counts and switches to family mode', () => {
		const options = parseCliArgs([
			'--out_dir', 'out', '--seed', '9', '--num_aag', '3',
			'--family', 'nand_style=4', '--family', 'xor_rich=2',
			'--subset_bench', '2', '--subset_aag', '0', '--force', '--manifest',
		])
		expect(options.seed).toBe(9)
		expect(options.force).toBe(true)
		expect(options.manifest).toBe(true)
		expect(options.corpus.outDir).toBe('out')
		expect(options.corpus.aagCount).toBe(3)
		expect(options.corpus.bench).toEqual({ mode: 'families', counts: [{ family: 'nand_style', count: 4 }, { family: 'xor_rich', count: 2 }] })
		expect(options.corpus.subset).toEqual({ dirName: 'run15', bench: 2, aag: 0 })
	})

	it.each([
		[['--seed', 'abc']],
		[['--num_bench', '-3']],
		[['--family', 'mystery=3']],
		[['--family', 'uniform']],
		[['--bogus']],
		[['--num_bench', '5', '--family', 'uniform=2']],
	])('rejects %j', (argv) => {
		expect(() => parseCliArgs(argv)).toThrow(ConfigurationError)
	})
})

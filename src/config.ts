import { parseArgs } from 'util'
import { CorpusConfig, DEFAULT_CORPUS_CONFIG, FamilyCount } from './corpus.js'
import { ConfigurationError } from './errors.js'
import { FAMILY_NAMES, isFamilyName } from './families.js'

export type CliOptions = {
	seed: number
	corpus: CorpusConfig
	force: boolean
	manifest: boolean
	verify: boolean
}

export const USAGE = `Usage: circuit-corpus [--out_dir DIR] [--seed N] [--num_bench N] [--num_aag N] [--family NAME=COUNT ...]
                      [--subset_bench N] [--subset_aag N] [--force] [--manifest] [--verify]
families: ${ FAMILY_NAMES.join(', ') } (--family replaces --num_bench)`

const parseInteger = (value: string | undefined, flag: string, fallback: number): number => {
	if (value === undefined) return fallback
	if (!/^\d+$/.test(value)) throw new ConfigurationError(`--${ flag } expects a non-negative integer, got '${ value }'`)
	return Number(value)
}

const parseFamilyCount = (value: string): FamilyCount => {
	const [family, count, ...rest] = value.split('=')
	if (count === undefined || rest.length > 0) throw new ConfigurationError(`--family expects NAME=COUNT, got '${ value }'`)
	if (!isFamilyName(family)) throw new ConfigurationError(`unknown family '${ family }', expected one of ${ FAMILY_NAMES.join('|') }`)
	return { family, count: parseInteger(count, 'family', 0) }
}

const readFlags = (argv: string[]) => {
	try {
		return parseArgs({
			args: argv,
			options: {
				out_dir: { type: 'string' },
				seed: { type: 'string' },
				num_bench: { type: 'string' },
				num_aag: { type: 'string' },
				family: { type: 'string', multiple: true },
				subset_bench: { type: 'string' },
				subset_aag: { type: 'string' },
				force: { type: 'boolean', default: false },
				manifest: { type: 'boolean', default: false },
				verify: { type: 'boolean', default: false },
			},
			strict: true,
			allowPositionals: false,
		}).values
	} catch (error: unknown) {
		throw new ConfigurationError(error instanceof Error ? error.message : String(error))
	}
}

export const parseCliArgs = (argv: string[]): CliOptions => {
	const values = readFlags(argv)
	const defaults = DEFAULT_CORPUS_CONFIG
	const benchCount = parseInteger(values.num_bench, 'num_bench', defaults.bench.mode === 'flat' ? defaults.bench.count : 0)
	const families = (values.family ?? []).map(parseFamilyCount)
	if (families.length > 0 && values.num_bench !== undefined) throw new ConfigurationError('--num_bench cannot be combined with --family')
	return {
		seed: parseInteger(values.seed, 'seed', 1),
		force: values.force ?? false,
		manifest: values.manifest ?? false,
		verify: values.verify ?? false,
		corpus: {
			...defaults,
			outDir: values.out_dir ?? defaults.outDir,
			bench: families.length > 0 ? { mode: 'families', counts: families } : { mode: 'flat', count: benchCount },
			aagCount: parseInteger(values.num_aag, 'num_aag', defaults.aagCount),
			subset: {
				...defaults.subset,
				bench: parseInteger(values.subset_bench, 'subset_bench', defaults.subset.bench),
				aag: parseInteger(values.subset_aag, 'subset_aag', defaults.subset.aag),
			},
		},
	}
}

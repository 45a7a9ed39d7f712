import { join } from 'path'
import { emitAag, generateAagCircuit, parseAag } from './aiger.js'
import { emitBench, parseBench } from './bench.js'
import { aagCone, benchCone } from './cone.js'
import { ConfigurationError, FormatError } from './errors.js'
import { FamilyName, getFamily } from './families.js'
import { RandomStream } from './random.js'
import { generateBenchCircuit } from './synthesizer.js'
import { ConeStats } from './types.js'
import { assertNever, copyNewFile, logTimed, padIndex, readText, writeNewFile } from './utils.js'

export const BENCH_DIR = 'bench'
export const AAG_DIR = 'aag'
export const FAMILIES_DIR = 'families'

export type FamilyCount = {
	family: FamilyName
	count: number
}

export type BenchPlan =
	| { mode: 'flat', count: number }
	| { mode: 'families', counts: readonly FamilyCount[] }

export type SubsetConfig = {
	dirName: string
	bench: number
	aag: number
}

export type CorpusConfig = {
	outDir: string
	bench: BenchPlan
	aagCount: number
	subset: SubsetConfig
	inputRange: readonly [number, number]
	benchGateRange: readonly [number, number]
	aagGateRange: readonly [number, number]
}

export const DEFAULT_CORPUS_CONFIG: CorpusConfig = {
	outDir: 'datasets/sample',
	bench: { mode: 'flat', count: 120 },
	aagCount: 120,
	subset: { dirName: 'run15', bench: 8, aag: 7 },
	inputRange: [6, 16],
	benchGateRange: [16, 48],
	aagGateRange: [18, 56],
}

export type CorpusFormat = 'bench' | 'aag'

export type CorpusEntry = ConeStats & {
	path: string // relative to outDir
	format: CorpusFormat
	family: FamilyName | null
	index: number
	inputs: number
	gates: number
}

export type CorpusResult = {
	entries: CorpusEntry[]
	flattened: string[]
	subset: string[]
}

const assertCount = (value: number, what: string) => {
	if (!Number.isSafeInteger(value) || value < 0) throw new ConfigurationError(`${ what } must be a non-negative integer, got ${ value }`)
}

const validateConfig = (config: CorpusConfig) => {
	switch (config.bench.mode) {
		case 'flat':
			assertCount(config.bench.count, 'bench count')
			break
		case 'families': {
			const seen = new Set<FamilyName>()
			for (const { family, count } of config.bench.counts) {
				if (seen.has(family)) throw new ConfigurationError(`family '${ family }' is listed twice`)
				seen.add(family)
				assertCount(count, `${ family } count`)
			}
			break
		}
		default: assertNever(config.bench)
	}
	assertCount(config.aagCount, 'aag count')
	assertCount(config.subset.bench, 'subset bench count')
	assertCount(config.subset.aag, 'subset aag count')
	if (config.subset.dirName === BENCH_DIR || config.subset.dirName === AAG_DIR || config.subset.dirName === FAMILIES_DIR) {
		throw new ConfigurationError(`subset directory cannot be named '${ config.subset.dirName }'`)
	}
}

/**
 * Writes a whole corpus from one random stream: gate-list instances first (families in the configured order),
 * then circuit-exchange instances, then the flattened and subset views. Every file is created exactly once.
 */
export const generateCorpus = (rng: RandomStream, config: CorpusConfig): CorpusResult => {
	validateConfig(config)
	const entries: CorpusEntry[] = []
	const flattened: string[] = []

	const writeBench = (path: string, family: FamilyName | null, index: number, prefix: string) => {
		const circuit = generateBenchCircuit(rng, {
			inputCount: config.inputRange,
			gateCount: config.benchGateRange,
			prefix,
			family: family === null ? undefined : getFamily(family),
		})
		writeNewFile(join(config.outDir, path), emitBench(circuit))
		entries.push({ path, format: 'bench', family, index, inputs: circuit.inputs.length, gates: circuit.gates.length, ...benchCone(circuit) })
	}

	switch (config.bench.mode) {
		case 'flat':
			for (let i = 0; i < config.bench.count; i++) {
				const path = join(BENCH_DIR, `inst_${ padIndex(i) }.bench`)
				writeBench(path, null, i, String(i))
				flattened.push(path)
			}
			break
		case 'families':
			for (const { family, count } of config.bench.counts) {
				logTimed(`generating ${ count } ${ family } instances`)
				const { tag } = getFamily(family)
				for (let i = 0; i < count; i++) {
					const fileName = `${ family }_${ padIndex(i) }.bench`
					const path = join(FAMILIES_DIR, family, fileName)
					writeBench(path, family, i, `${ tag }${ i }`)
					const flatPath = join(BENCH_DIR, fileName)
					copyNewFile(join(config.outDir, path), join(config.outDir, flatPath))
					flattened.push(flatPath)
				}
			}
			break
		default: assertNever(config.bench)
	}

	const aagPaths: string[] = []
	for (let i = 0; i < config.aagCount; i++) {
		const circuit = generateAagCircuit(rng, { inputCount: config.inputRange, gateCount: config.aagGateRange })
		const path = join(AAG_DIR, `inst_${ padIndex(i) }.aag`)
		writeNewFile(join(config.outDir, path), emitAag(circuit))
		entries.push({ path, format: 'aag', family: null, index: i, inputs: circuit.inputs.length, gates: circuit.ands.length, ...aagCone(circuit) })
		aagPaths.push(path)
	}

	const subset: string[] = []
	const copyToSubset = (sources: string[], limit: number, format: CorpusFormat) => {
		sources.slice(0, limit).forEach((source, i) => {
			const path = join(config.subset.dirName, `${ format }_${ padIndex(i) }.${ format }`)
			copyNewFile(join(config.outDir, source), join(config.outDir, path))
			subset.push(path)
		})
	}
	copyToSubset(flattened, config.subset.bench, 'bench')
	copyToSubset(aagPaths, config.subset.aag, 'aag')

	logTimed(`generated bench=${ flattened.length } aag=${ aagPaths.length } into ${ config.outDir }`)
	logTimed(`subset ${ config.subset.dirName }=${ subset.length }`)
	return { entries, flattened, subset }
}

// Reads every primary file back and checks it against what the generator recorded
export const verifyCorpus = (outDir: string, entries: readonly CorpusEntry[]) => {
	for (const entry of entries) {
		const text = readText(join(outDir, entry.path))
		switch (entry.format) {
			case 'bench': {
				const netlist = parseBench(text)
				if (netlist.outputs.length !== 1) throw new FormatError(`${ entry.path }: expected exactly one OUTPUT, found ${ netlist.outputs.length }`)
				if (netlist.inputs.length !== entry.inputs || netlist.assigns.length !== entry.gates) throw new FormatError(`${ entry.path }: counts differ from the generated instance`)
				break
			}
			case 'aag': {
				const circuit = parseAag(text)
				if (circuit.inputs.length !== entry.inputs || circuit.ands.length !== entry.gates) throw new FormatError(`${ entry.path }: counts differ from the generated instance`)
				break
			}
			default: assertNever(entry.format)
		}
	}
	logTimed(`verified ${ entries.length } instances`)
}

import { ConfigurationError } from './errors.js'
import { Family, OperatorSelection, UNIFORM_SELECTION } from './families.js'
import { RandomStream, chance, pick, pickWeighted, randomInt } from './random.js'
import { SignalNamer, SignalRegistry } from './registry.js'
import { BenchCircuit, CountSpec, GateSignal, Operator, Signal, isUnaryOperator } from './types.js'
import { assertNever } from './utils.js'

export type SynthesisOptions = {
	gateCount: number
	selection: OperatorSelection
	idiomProbability?: number
}

export type BenchCircuitOptions = {
	inputCount: CountSpec
	gateCount: CountSpec
	prefix?: string
	family?: Family
}

export const selectOperator = (rng: RandomStream, selection: OperatorSelection): Operator => {
	switch (selection.mode) {
		case 'uniform': return pick(rng, selection.operators)
		case 'weighted': return pickWeighted(rng, selection.weights)
		default: return assertNever(selection)
	}
}

export const drawOperand = (rng: RandomStream, registry: SignalRegistry): Signal => pick(rng, registry.signals)

export const synthesizeGate = (rng: RandomStream, registry: SignalRegistry, operator: Operator): GateSignal => {
	if (isUnaryOperator(operator)) return registry.createGate({ operator, operands: [drawOperand(rng, registry)] })
	const a = drawOperand(rng, registry)
	const b = drawOperand(rng, registry)
	return registry.createGate({ operator, operands: [a, b] })
}

// AND of two drawn operands followed by its inversion
const appendNandIdiom = (rng: RandomStream, registry: SignalRegistry) => {
	const and = synthesizeGate(rng, registry, 'AND')
	registry.createGate({ operator: 'NOT', operands: [and] })
}

export const synthesizeGates = (rng: RandomStream, registry: SignalRegistry, options: SynthesisOptions) => {
	const idiomProbability = options.idiomProbability ?? 0
	for (let i = 0; i < options.gateCount; i++) {
		synthesizeGate(rng, registry, selectOperator(rng, options.selection))
		if (idiomProbability > 0 && chance(rng, idiomProbability)) appendNandIdiom(rng, registry)
	}
}

export const resolveCount = (rng: RandomStream, count: CountSpec, what: string, minimum: number): number => {
	const [min, max] = typeof count === 'number' ? [count, count] : count
	if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) throw new ConfigurationError(`${ what } must be an integer`)
	if (min < minimum) throw new ConfigurationError(`${ what } must be at least ${ minimum }, got ${ min }`)
	if (max < min) throw new ConfigurationError(`${ what } range [${ min }, ${ max }] is inverted`)
	return typeof count === 'number' ? count : randomInt(rng, min, max)
}

export const generateBenchCircuit = (rng: RandomStream, options: BenchCircuitOptions): BenchCircuit => {
	const inputCount = resolveCount(rng, options.inputCount, 'input count', 1)
	const gateCount = resolveCount(rng, options.gateCount, 'gate count', 0)
	const registry = new SignalRegistry(new SignalNamer(options.prefix))
	for (let i = 0; i < inputCount; i++) registry.createInput()
	synthesizeGates(rng, registry, {
		gateCount,
		selection: options.family?.selection ?? UNIFORM_SELECTION,
		idiomProbability: options.family?.idiomProbability ?? 0,
	})
	return registry.finish(drawOperand(rng, registry))
}

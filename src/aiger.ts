import { ConfigurationError, FormatError, InvalidOperandError } from './errors.js'
import { CONST_FALSE, decodeLiteral, encodeLiteral, literalId } from './literals.js'
import { RandomStream, randomBool, randomIndex, randomInt } from './random.js'
import { resolveCount } from './synthesizer.js'
import { AagCircuit, AndGate, CountSpec, Literal } from './types.js'
import { toLines } from './utils.js'

/**
 * Integer ids for the circuit-exchange format: 0 is constant false, inputs take 1..I and AND gates follow contiguously.
 * A gate may only reference ids strictly below its own, which rules out cycles without any separate check.
 */
export class AagAllocator {
	private readonly inputIds: number[] = []
	private readonly andGates: AndGate[] = []
	private nextId = CONST_FALSE + 1

	get inputs(): readonly number[] {
		return this.inputIds
	}

	get ands(): readonly AndGate[] {
		return this.andGates
	}

	get maxId() {
		return this.nextId - 1
	}

	allocateInput(): number {
		if (this.andGates.length > 0) throw new ConfigurationError('inputs must be allocated before any gate')
		const id = this.nextId++
		this.inputIds.push(id)
		return id
	}

	allocateAnd(a: Literal, b: Literal): AndGate {
		const id = this.nextId
		for (const operand of [a, b]) {
			if (literalId(operand) >= id) throw new InvalidOperandError(`gate ${ id } cannot reference id ${ literalId(operand) }`)
		}
		this.nextId++
		const gate = { id, a, b }
		this.andGates.push(gate)
		return gate
	}

	finish(output: Literal): AagCircuit {
		if (this.inputIds.length === 0) throw new ConfigurationError('a circuit needs at least one input')
		if (literalId(output) > this.maxId) throw new InvalidOperandError(`output literal ${ output } references an unknown id`)
		return { maxId: this.maxId, inputs: this.inputIds.slice(), output, ands: this.andGates.slice() }
	}
}

export type AagCircuitOptions = {
	inputCount: CountSpec
	gateCount: CountSpec
}

export const generateAagCircuit = (rng: RandomStream, options: AagCircuitOptions): AagCircuit => {
	const inputCount = resolveCount(rng, options.inputCount, 'input count', 1)
	const gateCount = resolveCount(rng, options.gateCount, 'gate count', 0)
	const allocator = new AagAllocator()
	for (let i = 0; i < inputCount; i++) allocator.allocateInput()
	for (let i = 0; i < gateCount; i++) {
		// any id below the new gate's id, constant false included
		const eligible = allocator.maxId + 1
		const aId = randomIndex(rng, eligible)
		const bId = randomIndex(rng, eligible)
		const a = encodeLiteral(aId, randomBool(rng))
		const b = encodeLiteral(bId, randomBool(rng))
		allocator.allocateAnd(a, b)
	}
	const outputId = randomInt(rng, CONST_FALSE, allocator.maxId)
	return allocator.finish(encodeLiteral(outputId, randomBool(rng)))
}

export const emitAag = (circuit: AagCircuit): string => {
	const lines = [`aag ${ circuit.maxId } ${ circuit.inputs.length } 0 1 ${ circuit.ands.length }`]
	for (const id of circuit.inputs) lines.push(String(encodeLiteral(id, false)))
	lines.push(String(circuit.output))
	for (const gate of circuit.ands) lines.push(`${ encodeLiteral(gate.id, false) } ${ gate.a } ${ gate.b }`)
	return toLines(lines)
}

const parseNumber = (token: string, what: string, line: number): number => {
	if (!/^\d+$/.test(token)) throw new FormatError(`invalid ${ what } value: ${ token }`, line)
	return Number(token)
}

const parseFields = (text: string | undefined, count: number, what: string, line: number): number[] => {
	const parts = (text ?? '').trim().split(/\s+/).filter((x) => x.length > 0)
	if (parts.length !== count) throw new FormatError(`invalid ${ what } line: expected ${ count } field(s), got ${ parts.length }`, line)
	return parts.map((part) => parseNumber(part, what, line))
}

/** Reads a combinational ASCII AIGER file. Every AND must reference strictly smaller ids. */
export const parseAag = (text: string): AagCircuit => {
	const lines = text.split(/\r?\n/)
	if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop()
	if (lines.length === 0) throw new FormatError('empty input')

	const header = lines[0].trim().split(/\s+/)
	if (header.length !== 6 || header[0] !== 'aag') throw new FormatError('invalid header, expected: aag M I L O A', 1)
	const [maxId, inputCount, latchCount, outputCount, andCount] = header.slice(1).map((token) => parseNumber(token, 'header', 1))
	if (latchCount !== 0) throw new FormatError('only combinational aag is supported (L must be 0)', 1)

	const needed = 1 + inputCount + outputCount + andCount
	if (lines.length < needed) throw new FormatError(`truncated aag: expected at least ${ needed } lines, found ${ lines.length }`)

	let cursor = 1
	let maxReferenced = 0
	const inputs: number[] = []
	for (let i = 0; i < inputCount; i++) {
		const [literal] = parseFields(lines[cursor], 1, 'input', cursor + 1)
		cursor++
		const { id, negated } = decodeLiteral(literal)
		if (id === CONST_FALSE || negated) throw new FormatError('input literal must be even and nonzero', cursor)
		if (id > maxId) throw new FormatError('input literal exceeds 2*M', cursor)
		inputs.push(id)
		maxReferenced = Math.max(maxReferenced, id)
	}

	const outputs: Literal[] = []
	for (let i = 0; i < outputCount; i++) {
		const [literal] = parseFields(lines[cursor], 1, 'output', cursor + 1)
		cursor++
		outputs.push(literal)
		maxReferenced = Math.max(maxReferenced, literalId(literal))
	}

	const ands: AndGate[] = []
	let previousId = inputCount
	for (let i = 0; i < andCount; i++) {
		const [lhs, a, b] = parseFields(lines[cursor], 3, 'and', cursor + 1)
		cursor++
		const { id, negated } = decodeLiteral(lhs)
		if (id === CONST_FALSE || negated) throw new FormatError('and lhs must be even and nonzero', cursor)
		if (id <= literalId(a) || id <= literalId(b)) {
			throw new FormatError(`and gate violates topological order: id ${ id } depends on ${ literalId(a) } and ${ literalId(b) }`, cursor)
		}
		if (id <= previousId) throw new FormatError(`and lhs id ${ id } must exceed ${ previousId }`, cursor)
		previousId = id
		maxReferenced = Math.max(maxReferenced, id)
		ands.push({ id, a, b })
	}

	if (maxReferenced > maxId) throw new FormatError(`header M=${ maxId } is smaller than referenced id ${ maxReferenced }`)
	if (outputs.length !== 1) throw new FormatError(`expected exactly one output, found ${ outputs.length }`, 1)
	return { maxId, inputs, output: outputs[0], ands }
}

import { describe, expect, it } from 'vitest'
import { AagAllocator, emitAag, generateAagCircuit, parseAag } from './aiger.js'
import { ConfigurationError, FormatError, InvalidOperandError } from './errors.js'
import { decodeLiteral, encodeLiteral } from './literals.js'
import { SeededRandom } from './random.js'
import { ScriptedRandom, slot } from './testUtils.js'

describe('literals', () => {
	it('round-trips id and polarity', () => {
		const seen = new Set<number>()
		for (let id = 0; id < 64; id++) {
			for (const negated of [false, true]) {
				const literal = encodeLiteral(id, negated)
				expect(decodeLiteral(literal)).toEqual({ id, negated })
				seen.add(literal)
			}
		}
		expect(seen.size).toBe(128)
	})

	it('maps 0 and 1 to constant false and its negation', () => {
		expect(decodeLiteral(0)).toEqual({ id: 0, negated: false })
		expect(decodeLiteral(1)).toEqual({ id: 0, negated: true })
	})

	it('rejects negative and fractional values', () => {
		expect(() => encodeLiteral(-1, false)).toThrow(InvalidOperandError)
		expect(() => decodeLiteral(2.5)).toThrow(InvalidOperandError)
	})
})

describe('AagAllocator', () => {
	it('allocates inputs first and gates contiguously after', () => {
		const allocator = new AagAllocator()
		expect([allocator.allocateInput(), allocator.allocateInput()]).toEqual([1, 2])
		expect(allocator.allocateAnd(2, 5).id).toBe(3)
		expect(allocator.allocateAnd(6, 0).id).toBe(4)
		expect(allocator.maxId).toBe(4)
		expect(() => allocator.allocateInput()).toThrow(ConfigurationError)
	})

	it('refuses operands that are not strictly older', () => {
		const allocator = new AagAllocator()
		allocator.allocateInput()
		expect(() => allocator.allocateAnd(2, 4)).toThrow(InvalidOperandError)
		expect(() => allocator.allocateAnd(5, 2)).toThrow(InvalidOperandError)
		expect(allocator.ands).toHaveLength(0)
	})

	it('needs an input and a known output', () => {
		expect(() => new AagAllocator().finish(0)).toThrow(ConfigurationError)
		const allocator = new AagAllocator()
		allocator.allocateInput()
		expect(() => allocator.finish(4)).toThrow(InvalidOperandError)
		expect(allocator.finish(3)).toEqual({ maxId: 1, inputs: [1], output: 3, ands: [] })
	})
})

describe('generateAagCircuit', () => {
	it('writes the header for 6 inputs and 10 gates', () => {
		const text = emitAag(generateAagCircuit(new SeededRandom(1), { inputCount: 6, gateCount: 10 }))
		expect(text.split('\n')[0]).toBe('aag 16 6 0 1 10')
	})

	it('draws operand ids, then polarities, then the output', () => {
		const rng = new ScriptedRandom([
			slot(2, 3), slot(0, 3), 0.7, 0.2, // 4 and 1
			slot(3, 4), 0.9, // output id 3, plain
		])
		const circuit = generateAagCircuit(rng, { inputCount: 2, gateCount: 1 })
		expect(emitAag(circuit)).toBe('aag 3 2 0 1 1\n2\n4\n6\n6 4 1\n')
		expect(rng.remaining).toBe(0)
	})

	it('produces files whose counts and literals check out', () => {
		const rng = new SeededRandom(9)
		for (let i = 0; i < 25; i++) {
			const text = emitAag(generateAagCircuit(rng, { inputCount: [6, 16], gateCount: [18, 56] }))
			const lines = text.trimEnd().split('\n')
			const [, m, inputs, latches, outputs, ands] = lines[0].split(' ').map(Number)
			expect(latches).toBe(0)
			expect(outputs).toBe(1)
			expect(m).toBe(inputs + ands)
			expect(lines).toHaveLength(1 + inputs + 1 + ands)
			expect(Number(lines[1 + inputs])).toBeLessThanOrEqual(2 * m + 1)
			let previous = 0
			for (const line of lines.slice(2 + inputs)) {
				const [lhs, a, b] = line.split(' ').map(Number)
				expect(lhs % 2).toBe(0)
				expect(lhs / 2).toBeGreaterThan(inputs)
				expect(lhs / 2).toBeLessThanOrEqual(m)
				expect(lhs).toBeGreaterThan(previous)
				expect(decodeLiteral(a).id).toBeLessThan(lhs / 2)
				expect(decodeLiteral(b).id).toBeLessThan(lhs / 2)
				previous = lhs
			}
			expect(parseAag(text).ands).toHaveLength(ands)
		}
	})
})

describe('parseAag', () => {
	it('reads a tiny circuit', () => {
		expect(parseAag('aag 2 1 0 1 1\n2\n4\n4 2 2\n')).toEqual({ maxId: 2, inputs: [1], output: 4, ands: [{ id: 2, a: 2, b: 2 }] })
	})

	it.each([
		['', 'empty input'],
		['aig 2 1 0 1 1\n', 'line 1: invalid header'],
		['aag 2 1 1 1 1\n2\n4\n4 2 2\n', 'L must be 0'],
		['aag 2 1 0 1 1\n2\n4\n', 'truncated aag'],
		['aag 2 1 0 1 1\n3\n4\n4 2 2\n', 'line 2: input literal must be even and nonzero'],
		['aag 2 1 0 1 1\n2\n4\n4 4 2\n', 'line 4: and gate violates topological order'],
		['aag 2 1 0 1 1\n2\n4\n5 2 2\n', 'line 4: and lhs must be even and nonzero'],
		['aag 1 1 0 1 1\n2\n4\n4 2 2\n', 'header M=1 is smaller than referenced id 2'],
		['aag 2 1 0 1 1\n2\n4\n4 2\n', 'line 4: invalid and line'],
		['aag 2 1 0 0 1\n2\n4 2 2\n', 'expected exactly one output'],
		['aag 3 2 0 1 1\n2\n4\n6\n4 2 2\n', 'line 5: and lhs id 2 must exceed 2'],
		['aag 4 2 0 1 2\n2\n4\n6\n8 2 2\n6 2 2\n', 'line 6: and lhs id 3 must exceed 4'],
		['aag 3 2 0 1 2\n2\n4\n6\n6 2 2\n6 4 4\n', 'line 6: and lhs id 3 must exceed 3'],
	])('rejects %j', (text, message) => {
		expect(() => parseAag(text)).toThrow(FormatError)
		expect(() => parseAag(text)).toThrow(message)
	})
})

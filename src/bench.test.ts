import { describe, expect, it } from 'vitest'
import { emitBench, parseBench } from './bench.js'
import { FormatError } from './errors.js'
import { SignalRegistry } from './registry.js'

describe('emitBench', () => {
	it('writes inputs, gates and one output with a trailing newline', () => {
		const registry = new SignalRegistry()
		const a = registry.createInput()
		const b = registry.createInput()
		const g = registry.createGate({ operator: 'XNOR', operands: [a, a] })
		registry.createGate({ operator: 'BUF', operands: [b] })
		expect(emitBench(registry.finish(g))).toBe('INPUT(x0)\nINPUT(x1)\nn_0 = XNOR(x0,x0)\nn_1 = BUF(x1)\nOUTPUT(n_0)\n')
	})

	it('can name an input as the output', () => {
		const registry = new SignalRegistry()
		const a = registry.createInput()
		expect(emitBench(registry.finish(a))).toBe('INPUT(x0)\nOUTPUT(x0)\n')
	})
})

describe('parseBench', () => {
	it('accepts spaces and comments', () => {
		const netlist = parseBench('INPUT(a) # input\n  INPUT(b)\nOUTPUT(out)\nout = OR( a , b ) # logic\n')
		expect(netlist.inputs).toEqual(['a', 'b'])
		expect(netlist.outputs).toEqual(['out'])
		expect(netlist.assigns).toEqual([{ lhs: 'out', operator: 'OR', args: ['a', 'b'], line: 4 }])
	})

	it('reads signals whose names start with a keyword', () => {
		const netlist = parseBench('INPUT(a)\nINPUTS = BUF(a)\nOUTPUTx = NOT(INPUTS)\nOUTPUT(OUTPUTx)\n')
		expect(netlist.inputs).toEqual(['a'])
		expect(netlist.outputs).toEqual(['OUTPUTx'])
		expect(netlist.assigns.map((x) => x.lhs)).toEqual(['INPUTS', 'OUTPUTx'])
	})

	it('orders assignments so operands come first', () => {
		const netlist = parseBench('INPUT(a)\ny = NOT(x)\nx = BUF(a)\nOUTPUT(y)\n')
		expect(netlist.order).toEqual([1, 0])
	})

	it('allows constant arguments', () => {
		const netlist = parseBench('INPUT(a)\nx = AND(a,1)\nOUTPUT(x)\n')
		expect(netlist.assigns[0].args).toEqual(['a', '1'])
	})

	it.each([
		['INPUT(a)\nx = AND(a,y)\ny = NOT(x)\nOUTPUT(y)\n', 'cycle detected in assignments'],
		['INPUT(a)\nx = NOT(z)\nOUTPUT(x)\n', "line 2: undefined signal 'z' used in assignment 'x'"],
		['INPUT(a)\nx = NOT(a,a)\n', 'line 2: wrong arity for NOT, expected 1 args but got 2'],
		['INPUT(a)\nx = NAND(a,a)\n', "line 2: unsupported op 'NAND'"],
		['INPUT(a)\nq = DFF(a)\n', 'line 2: sequential constructs are not supported'],
		['INPUT(a)\nINPUT(a)\n', "line 2: redefinition of 'a'"],
		['INPUT(a)\na = BUF(a)\n', "line 2: redefinition of 'a'"],
		['INPUT(1a)\n', "line 1: invalid name '1a'"],
		['INPUT(a)\nOUTPUT(b)\n', "output references undefined signal 'b'"],
		['INPUT(a)\nx == AND(a,a)\n', 'line 2: invalid assign'],
	])('rejects %j', (text, message) => {
		expect(() => parseBench(text)).toThrow(FormatError)
		expect(() => parseBench(text)).toThrow(message)
	})
})

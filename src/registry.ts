import { ConfigurationError, InvalidOperandError } from './errors.js'
import { BenchCircuit, GateSignal, GateSpec, InputSignal, Signal, isUnaryOperator } from './types.js'

/**
 * Hands out signal names for one instance. Inputs are `x<k>`, gates are `n<prefix>_<k>`.
 * The prefix keeps gate names unique across instances that end up in the same directory.
 */
export class SignalNamer {
	private inputCounter = 0
	private gateCounter = 0

	constructor(readonly prefix = '') {
		if (!/^[A-Za-z0-9]*$/.test(prefix)) throw new ConfigurationError(`gate prefix must be alphanumeric, got '${ prefix }'`)
	}

	nextInputName() {
		return `x${ this.inputCounter++ }`
	}

	nextGateName() {
		return `n${ this.prefix }_${ this.gateCounter++ }`
	}
}

/**
 * Ordered registry of every signal of the instance under construction.
 *
 * Handles are only produced by `createInput` and `createGate`, and `createGate` refuses operands it did not hand out,
 * so every operand precedes its gate and the network is acyclic by construction.
 */
export class SignalRegistry {
	private readonly ordered: Signal[] = []
	private readonly inputList: InputSignal[] = []
	private readonly gateList: GateSignal[] = []
	private readonly known = new Set<Signal>()
	private readonly names = new Set<string>()

	constructor(private readonly namer: SignalNamer = new SignalNamer()) {}

	get signals(): readonly Signal[] {
		return this.ordered
	}

	get inputs(): readonly InputSignal[] {
		return this.inputList
	}

	get gates(): readonly GateSignal[] {
		return this.gateList
	}

	get size() {
		return this.ordered.length
	}

	has(signal: Signal) {
		return this.known.has(signal)
	}

	createInput(name = this.namer.nextInputName()): InputSignal {
		const input: InputSignal = { kind: 'input', name: this.claimName(name), position: this.ordered.length }
		this.inputList.push(input)
		this.register(input)
		return input
	}

	createGate(spec: GateSpec): GateSignal {
		const expected = isUnaryOperator(spec.operator) ? 1 : 2
		if (spec.operands.length !== expected) {
			throw new InvalidOperandError(`${ spec.operator } takes ${ expected } operand(s), got ${ spec.operands.length }`)
		}
		for (const operand of spec.operands) {
			if (!this.known.has(operand)) throw new InvalidOperandError(`operand '${ operand.name }' was not created by this registry`)
		}
		const gate: GateSignal = { ...spec, kind: 'gate', name: this.claimName(this.namer.nextGateName()), position: this.ordered.length }
		this.gateList.push(gate)
		this.register(gate)
		return gate
	}

	finish(output: Signal): BenchCircuit {
		if (this.inputList.length === 0) throw new ConfigurationError('a circuit needs at least one input')
		if (!this.known.has(output)) throw new InvalidOperandError(`output '${ output.name }' was not created by this registry`)
		return { inputs: this.inputList.slice(), gates: this.gateList.slice(), output }
	}

	private claimName(name: string) {
		if (this.names.has(name)) throw new ConfigurationError(`duplicate signal name '${ name }'`)
		this.names.add(name)
		return name
	}

	private register(signal: Signal) {
		this.ordered.push(signal)
		this.known.add(signal)
	}
}

import { literalId } from './literals.js'
import { AagCircuit, BenchCircuit, ConeStats, Signal } from './types.js'

// Walks the transitive fan-in of the output. Gates outside of it are dead: they feed nothing the output observes.
export const benchCone = (circuit: BenchCircuit): ConeStats => {
	const visited = new Set<Signal>()
	const stack: Signal[] = [circuit.output]
	while (stack.length > 0) {
		const signal = stack.pop()
		if (signal === undefined || visited.has(signal)) continue
		visited.add(signal)
		if (signal.kind === 'gate') stack.push(...signal.operands)
	}
	const coneInputs = circuit.inputs.filter((input) => visited.has(input)).length
	const coneGates = circuit.gates.filter((gate) => visited.has(gate)).length
	return { coneInputs, coneGates, deadGates: circuit.gates.length - coneGates }
}

export const aagCone = (circuit: AagCircuit): ConeStats => {
	const gatesById = new Map(circuit.ands.map((gate) => [gate.id, gate]))
	const inputIds = new Set(circuit.inputs)
	const visited = new Set<number>()
	const stack = [literalId(circuit.output)]
	while (stack.length > 0) {
		const id = stack.pop()
		if (id === undefined || visited.has(id)) continue
		visited.add(id)
		const gate = gatesById.get(id)
		if (gate !== undefined) stack.push(literalId(gate.a), literalId(gate.b))
	}
	const coneInputs = [...visited].filter((id) => inputIds.has(id)).length
	const coneGates = [...visited].filter((id) => gatesById.has(id)).length
	return { coneInputs, coneGates, deadGates: circuit.ands.length - coneGates }
}

import { FormatError } from './errors.js'
import { BenchCircuit, Operator, isOperator, isUnaryOperator } from './types.js'
import { toLines } from './utils.js'

export const emitBench = (circuit: BenchCircuit): string => {
	const lines: string[] = []
	for (const input of circuit.inputs) lines.push(`INPUT(${ input.name })`)
	for (const gate of circuit.gates) lines.push(`${ gate.name } = ${ gate.operator }(${ gate.operands.map((x) => x.name).join(',') })`)
	lines.push(`OUTPUT(${ circuit.output.name })`)
	return toLines(lines)
}

export type BenchAssign = {
	lhs: string
	operator: Operator
	args: string[]
	line: number
}

export type BenchNetlist = {
	inputs: string[]
	outputs: string[]
	assigns: BenchAssign[]
	order: number[] // indexes into assigns, operands before users
}

const isValidName = (name: string) => /^[A-Za-z_][A-Za-z0-9_]*$/.test(name)
const isConstant = (name: string) => name === '0' || name === '1'
const stripComment = (line: string) => {
	const index = line.indexOf('#')
	return index < 0 ? line : line.slice(0, index)
}

const parseDeclaration = (text: string, keyword: 'INPUT' | 'OUTPUT', line: number): string => {
	const match = /^(\w+)\s*\(\s*([^()]*?)\s*\)$/.exec(text)
	if (!match || match[1] !== keyword) throw new FormatError(`invalid ${ keyword }`, line)
	if (!isValidName(match[2])) throw new FormatError(`invalid name '${ match[2] }'`, line)
	return match[2]
}

const parseAssign = (text: string, line: number): BenchAssign => {
	const match = /^([^=]+)=\s*(\w+)\s*\(([^()]*)\)$/.exec(text)
	if (!match) throw new FormatError('invalid assign', line)
	const lhs = match[1].trim()
	const operator = match[2]
	if (!isValidName(lhs)) throw new FormatError(`invalid lhs '${ lhs }'`, line)
	if (!isOperator(operator)) throw new FormatError(`unsupported op '${ operator }'`, line)
	const args = match[3].trim() === '' ? [] : match[3].split(',').map((arg) => arg.trim())
	for (const arg of args) {
		if (!isConstant(arg) && !isValidName(arg)) throw new FormatError(`invalid arg '${ arg }'`, line)
	}
	const expected = isUnaryOperator(operator) ? 1 : 2
	if (args.length !== expected) throw new FormatError(`wrong arity for ${ operator }, expected ${ expected } args but got ${ args.length }`, line)
	return { lhs, operator, args, line }
}

// Kahn's algorithm over assignments; inputs and constants have no producers
const topologicalOrder = (inputs: Set<string>, assigns: BenchAssign[]): number[] => {
	const producer = new Map(assigns.map((assign, index) => [assign.lhs, index]))
	const pending = assigns.map(() => 0)
	const users = assigns.map((): number[] => [])
	assigns.forEach((assign, index) => {
		for (const arg of assign.args) {
			if (isConstant(arg) || inputs.has(arg)) continue
			const dependency = producer.get(arg)
			if (dependency === undefined) throw new FormatError(`undefined signal '${ arg }' used in assignment '${ assign.lhs }'`, assign.line)
			pending[index]++
			users[dependency].push(index)
		}
	})
	const queue = pending.flatMap((count, index) => count === 0 ? [index] : [])
	const order: number[] = []
	for (let head = 0; head < queue.length; head++) {
		const index = queue[head]
		order.push(index)
		for (const user of users[index]) {
			pending[user]--
			if (pending[user] === 0) queue.push(user)
		}
	}
	if (order.length !== assigns.length) throw new FormatError('cycle detected in assignments')
	return order
}

/** Reads a combinational gate-list file. Comments start with `#`; statements may be in any order. */
export const parseBench = (text: string): BenchNetlist => {
	const inputs: string[] = []
	const outputs: string[] = []
	const assigns: BenchAssign[] = []
	const defined = new Set<string>()
	text.split(/\r?\n/).forEach((raw, index) => {
		const line = index + 1
		const clean = stripComment(raw).trim()
		if (clean === '') return
		if (/^INPUT\s*\(/.test(clean)) {
			const name = parseDeclaration(clean, 'INPUT', line)
			if (defined.has(name)) throw new FormatError(`redefinition of '${ name }'`, line)
			defined.add(name)
			inputs.push(name)
			return
		}
		if (/^OUTPUT\s*\(/.test(clean)) {
			outputs.push(parseDeclaration(clean, 'OUTPUT', line))
			return
		}
		if (/LATCH|DFF|REG/.test(clean.toUpperCase())) throw new FormatError('sequential constructs are not supported', line)
		const assign = parseAssign(clean, line)
		if (defined.has(assign.lhs)) throw new FormatError(`redefinition of '${ assign.lhs }'`, line)
		defined.add(assign.lhs)
		assigns.push(assign)
	})
	const order = topologicalOrder(new Set(inputs), assigns)
	for (const output of outputs) {
		if (!defined.has(output)) throw new FormatError(`output references undefined signal '${ output }'`)
	}
	return { inputs, outputs, assigns, order }
}

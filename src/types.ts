export const UNARY_OPERATORS = ['NOT', 'BUF'] as const
export const BINARY_OPERATORS = ['AND', 'OR', 'XOR', 'XNOR'] as const
// order used by uniform selection
export const OPERATORS = ['AND', 'OR', 'XOR', 'XNOR', 'NOT', 'BUF'] as const

export type UnaryOperator = typeof UNARY_OPERATORS[number]
export type BinaryOperator = typeof BINARY_OPERATORS[number]
export type Operator = UnaryOperator | BinaryOperator

export const isUnaryOperator = (operator: string): operator is UnaryOperator => UNARY_OPERATORS.some((x) => x === operator)
export const isBinaryOperator = (operator: string): operator is BinaryOperator => BINARY_OPERATORS.some((x) => x === operator)
export const isOperator = (operator: string): operator is Operator => isUnaryOperator(operator) || isBinaryOperator(operator)

export type InputSignal = {
	readonly kind: 'input'
	readonly name: string
	readonly position: number // creation order within the instance
}

export type UnaryGateSpec = {
	readonly operator: UnaryOperator
	readonly operands: readonly [Signal]
}

export type BinaryGateSpec = {
	readonly operator: BinaryOperator
	readonly operands: readonly [Signal, Signal]
}

export type GateSpec = UnaryGateSpec | BinaryGateSpec

export type GateSignal = GateSpec & {
	readonly kind: 'gate'
	readonly name: string
	readonly position: number
}

export type Signal = InputSignal | GateSignal

export type BenchCircuit = {
	readonly inputs: readonly InputSignal[]
	readonly gates: readonly GateSignal[]
	readonly output: Signal
}

export type Literal = number

export type AndGate = {
	readonly id: number
	readonly a: Literal
	readonly b: Literal
}

export type AagCircuit = {
	readonly maxId: number
	readonly inputs: readonly number[]
	readonly output: Literal
	readonly ands: readonly AndGate[]
}

export type CountSpec = number | readonly [min: number, max: number]

export type ConeStats = {
	coneInputs: number
	coneGates: number
	deadGates: number
}

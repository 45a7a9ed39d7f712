export class CircuitError extends Error {
	constructor(message: string) {
		super(message)
		this.name = new.target.name
	}
}

// An operand that was not created by the registry building the current instance
export class InvalidOperandError extends CircuitError {}

export class EmptyRegistryError extends CircuitError {}

export class ConfigurationError extends CircuitError {}

export class FormatError extends CircuitError {
	readonly line: number | undefined

	constructor(message: string, line?: number) {
		super(line === undefined ? message : `line ${ line }: ${ message }`)
		this.line = line
	}
}

import { InvalidOperandError } from './errors.js'
import { Literal } from './types.js'

export const CONST_FALSE: Literal = 0

export type DecodedLiteral = {
	id: number
	negated: boolean
}

export const encodeLiteral = (id: number, negated: boolean): Literal => {
	if (!Number.isSafeInteger(id) || id < 0) throw new InvalidOperandError(`signal id must be a non-negative integer, got ${ id }`)
	return id * 2 + (negated ? 1 : 0)
}

export const decodeLiteral = (literal: Literal): DecodedLiteral => {
	if (!Number.isSafeInteger(literal) || literal < 0) throw new InvalidOperandError(`literal must be a non-negative integer, got ${ literal }`)
	return { id: Math.floor(literal / 2), negated: literal % 2 === 1 }
}

export const literalId = (literal: Literal) => decodeLiteral(literal).id


import * as fs from 'fs'
import { dirname } from 'path'

export const readText = (filePath: string): string => fs.readFileSync(filePath, 'utf8')

// Instance files are never overwritten, 'wx' fails when the file exists
export const writeNewFile = (filePath: string, data: string) => {
	fs.mkdirSync(dirname(filePath), { recursive: true })
	fs.writeFileSync(filePath, data, { encoding: 'utf8', flag: 'wx' })
}

export const copyNewFile = (source: string, destination: string) => {
	fs.mkdirSync(dirname(destination), { recursive: true })
	fs.copyFileSync(source, destination, fs.constants.COPYFILE_EXCL)
}

export const padIndex = (index: number, width = 4) => String(index).padStart(width, '0')

export const toLines = (lines: string[]) => lines.map((line) => `${ line }\n`).join('')

export function assertNever(value: never): never {
	throw new Error(`Unhandled discriminated union member: ${JSON.stringify(value)}`)
}

export function logTimed(...args: unknown[]) {
	const date = new Date()
	const year = date.getFullYear()
	const month = String(date.getMonth() + 1).padStart(2, '0')
	const day = String(date.getDate()).padStart(2, '0')
	const hour = String(date.getHours()).padStart(2, '0')
	const minute = String(date.getMinutes()).padStart(2, '0')
	const second = String(date.getSeconds()).padStart(2, '0')
	const timestamp = `${ year }-${ month }-${ day } ${ hour }:${ minute }:${ second }`
	console.log(`[${ timestamp }]`, ...args)
}

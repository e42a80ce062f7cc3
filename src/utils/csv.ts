import Papa from 'papaparse'
import type { ParseError } from 'papaparse'
import { FatalInputError } from '../errors'

function describeParseError(source: string, err: ParseError): string {
	const where = err.row === undefined ? '' : ` (row ${err.row + 1})`
	return `${source}: ${err.message}${where}`
}

/**
 * Parses delimited text into raw rows. Empty lines are skipped; rows keep
 * whatever number of fields they have.
 */
export function parseRows(text: string, delimiter: string, source: string): string[][] {
	const res = Papa.parse<string[]>(text, {
		delimiter,
		skipEmptyLines: true,
	})
	if (res.errors.length) {
		throw new FatalInputError(describeParseError(source, res.errors[0]))
	}
	return res.data
}

export function unparseRows(rows: string[][], delimiter: string): string {
	return Papa.unparse(rows, { delimiter, newline: '\r\n' })
}

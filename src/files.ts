import { readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs'
import type { Stats } from 'node:fs'
import path from 'node:path'
import iconv from 'iconv-lite'
import { FatalInputError, describeError } from './errors'
import { decodeText } from './exportReader'
import type { ReportLocale } from './locale'
import type { ReportHeader } from './types'

const LOG_PREFIX = '[Files]'

/**
 * Most recently modified `.csv` file in `dir`; exports land in the downloads
 * folder under names the platform chooses.
 */
export function findLatestExport(dir: string): string {
	let names: string[]
	try {
		names = readdirSync(dir)
	} catch (e) {
		throw new FatalInputError(`Cannot open folder ${dir}: ${describeError(e)}`, { cause: e })
	}

	let latest: { file: string; mtimeMs: number } | undefined
	for (const name of names) {
		if (path.extname(name).toLowerCase() !== '.csv') continue
		const file = path.join(dir, name)
		let stat: Stats
		try {
			stat = statSync(file)
		} catch (e) {
			throw new FatalInputError(`Cannot inspect ${file} in ${dir}: ${describeError(e)}`, { cause: e })
		}
		if (!stat.isFile()) continue
		if (!latest || stat.mtimeMs > latest.mtimeMs) latest = { file, mtimeMs: stat.mtimeMs }
	}
	if (!latest) {
		throw new FatalInputError(`No .csv exports in ${dir}; check the download folder setting`)
	}
	console.log(LOG_PREFIX, 'Using export', { file: latest.file })
	return latest.file
}

export function readTextFile(file: string): string {
	let buffer: Buffer
	try {
		buffer = readFileSync(file)
	} catch (e) {
		throw new FatalInputError(`Cannot read ${file}: ${describeError(e)}`, { cause: e })
	}
	return decodeText(buffer)
}

export function reportFileName(header: ReportHeader, locale: ReportLocale): string {
	const name = `${locale.reportFilePrefix}_${header.title}_${header.date}.csv`
	return name.replace(/[\\/]/g, '-')
}

/** UTF-8 with a byte-order mark. */
export function writeReportFile(file: string, csv: string): void {
	writeFileSync(file, iconv.encode(csv, 'utf8', { addBOM: true }))
	console.log(LOG_PREFIX, 'Wrote report', { file })
}

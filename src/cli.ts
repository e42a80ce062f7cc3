#!/usr/bin/env node
import path from 'node:path'
import { parseArgs } from 'node:util'
import { loadConfig } from './config'
import { describeError } from './errors'
import { runAttendanceReport } from './pipeline'

const USAGE = `Usage: attendance-report [options]

Options:
  -c, --config <file>   configuration file (default: attendance.config.json)
  -e, --export <file>   attendance export to read (default: newest .csv in the download folder)
  -o, --out <dir>       folder for the report (default: configured report folder)
  -h, --help            show this help`

function parseCliArgs(argv: string[]) {
	return parseArgs({
		args: argv,
		options: {
			config: { type: 'string', short: 'c' },
			export: { type: 'string', short: 'e' },
			out: { type: 'string', short: 'o' },
			help: { type: 'boolean', short: 'h' },
		},
	}).values
}

export function main(argv: string[]): number {
	let values: ReturnType<typeof parseCliArgs>
	try {
		values = parseCliArgs(argv)
	} catch (e) {
		console.error(describeError(e))
		console.error(USAGE)
		return 2
	}

	if (values.help) {
		console.log(USAGE)
		return 0
	}

	try {
		const config = loadConfig(values.config)
		const result = runAttendanceReport(config, {
			exportFile: values.export ? path.resolve(values.export) : undefined,
			outDir: values.out ? path.resolve(values.out) : undefined,
		})
		console.log(`Report written to ${result.reportFile} (${result.report.members.length} members)`)
		return 0
	} catch (e) {
		console.error(`attendance-report: ${describeError(e)}`)
		return 1
	}
}

if (require.main === module) {
	process.exitCode = main(process.argv.slice(2))
}

import path from 'node:path'
import type { AttendanceConfig } from './config'
import { readExport } from './exportReader'
import type { ExportContext } from './exportReader'
import { findLatestExport, readTextFile, reportFileName, writeReportFile } from './files'
import { getLocale } from './locale'
import type { ReportLocale } from './locale'
import { reconcileRoster } from './reconcile'
import { assembleReport, displayGroup, renderReport, serializeReport } from './report'
import { createRoster, parseRoster } from './roster'
import type { Roster } from './roster'
import { CONSULTATION } from './types'
import type { AttendanceReport } from './types'

const LOG_PREFIX = '[Pipeline]'

/**
 * Everything one run needs, built once and passed down. Tests construct it
 * with an in-memory roster.
 */
export interface RunContext {
	config: AttendanceConfig
	roster: Roster
	locale: ReportLocale
}

export function createRunContext(config: AttendanceConfig, roster: Roster): RunContext {
	return Object.freeze({ config, roster, locale: getLocale(config.locale) })
}

function exportContext(ctx: RunContext): ExportContext {
	return {
		identity: ctx.config.identity,
		lookup: ctx.roster,
		organizerMarkers: ctx.config.organizerMarkers,
		defaultTitles: ctx.config.defaultTitles,
		placeholderTitle: ctx.locale.defaultTitle,
	}
}

/**
 * Export text in, sorted report out. Consultations have no fixed roster, so
 * nobody is marked absent for them.
 */
export function buildReport(exportText: string, ctx: RunContext): AttendanceReport {
	const { header, members } = readExport(exportText, exportContext(ctx))
	const label = (group: string) => displayGroup(group, ctx.locale)
	if (header.timeSlot === CONSULTATION) {
		console.log(LOG_PREFIX, 'Consultation session, skipping roster reconciliation')
		return assembleReport(header, members, label)
	}
	const reconciled = reconcileRoster(members, ctx.roster.entries, ctx.roster)
	console.log(LOG_PREFIX, 'Reconciled roster', { observed: members.length, absent: reconciled.length - members.length })
	return assembleReport(header, reconciled, label)
}

export interface RunOptions {
	/** Export to read instead of the newest one in the download folder */
	exportFile?: string
	/** Overrides the configured report folder */
	outDir?: string
}

export interface RunResult {
	exportFile: string
	reportFile: string
	report: AttendanceReport
}

export function runAttendanceReport(config: AttendanceConfig, options: RunOptions = {}): RunResult {
	const roster = createRoster(parseRoster(readTextFile(config.rosterPath), config.rosterPath))
	const ctx = createRunContext(config, roster)

	const exportFile = options.exportFile ?? findLatestExport(config.downloadFolder)
	const report = buildReport(readTextFile(exportFile), ctx)
	const csv = serializeReport(renderReport(report, ctx.locale))

	const reportFile = path.join(options.outDir ?? config.reportFolder, reportFileName(report.header, ctx.locale))
	writeReportFile(reportFile, csv)
	return { exportFile, reportFile, report }
}

import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { FatalInputError, describeError } from './errors'
import type { IdentityOptions } from './identity'
import type { LocaleName } from './locale'

const LOG_PREFIX = '[Config]'

export const DEFAULT_CONFIG_FILE = 'attendance.config.json'

export const DEFAULT_GROUP_PREFIXES = ['мп', 'мт', 'мк', 'мн']
export const DEFAULT_GUEST_MARKERS = ['(гость)', '(Guest)']
export const DEFAULT_ORGANIZER_MARKERS = ['Organizer', 'Инициатор']
export const DEFAULT_TITLES = ['General']

const ConfigFileSchema = z
	.object({
		paths: z
			.object({
				downloadFolder: z.string().min(1).optional(),
				reportFolder: z.string().min(1).optional(),
				roster: z.string().min(1).default('GroupsBase.csv'),
			})
			.strict()
			.default({}),
		locale: z.enum(['en', 'ru']).default('en'),
		groupPrefixes: z.array(z.string().min(1)).default(DEFAULT_GROUP_PREFIXES),
		guestMarkers: z.array(z.string().min(1)).default(DEFAULT_GUEST_MARKERS),
		organizerMarkers: z.array(z.string().min(1)).default(DEFAULT_ORGANIZER_MARKERS),
		defaultTitles: z.array(z.string()).default(DEFAULT_TITLES),
	})
	.strict()

export type ConfigFile = z.input<typeof ConfigFileSchema>

export interface AttendanceConfig {
	downloadFolder: string
	reportFolder: string
	rosterPath: string
	locale: LocaleName
	identity: IdentityOptions
	organizerMarkers: readonly string[]
	/** Titles the platform assigns when the organizer never named the meeting */
	defaultTitles: readonly string[]
}

export interface ConfigEnvironment {
	cwd: string
	home: string
	platform: NodeJS.Platform
	env: Record<string, string | undefined>
}

function expandHome(p: string, home: string): string {
	if (p === '~') return home
	if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(home, p.slice(2))
	return p
}

function defaultFolders(platform: NodeJS.Platform, home: string): { downloads: string; reports: string } {
	if (platform === 'win32' || platform === 'darwin') {
		return { downloads: path.join(home, 'Downloads'), reports: path.join(home, 'Desktop') }
	}
	return { downloads: '.', reports: '.' }
}

/**
 * Merges a parsed config file with environment overrides and per-OS defaults.
 */
export function resolveConfig(file: unknown, environment: ConfigEnvironment): AttendanceConfig {
	const parsed = ConfigFileSchema.safeParse(file ?? {})
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		throw new FatalInputError(`Invalid configuration at "${issue.path.join('.') || '(root)'}": ${issue.message}`)
	}
	const cfg = parsed.data
	const { cwd, home, platform, env } = environment
	const defaults = defaultFolders(platform, home)
	const resolvePath = (p: string) => path.resolve(cwd, expandHome(p, home))

	return Object.freeze({
		downloadFolder: resolvePath(env.ATTENDANCE_DOWNLOAD_DIR || cfg.paths.downloadFolder || defaults.downloads),
		reportFolder: resolvePath(env.ATTENDANCE_REPORT_DIR || cfg.paths.reportFolder || defaults.reports),
		rosterPath: resolvePath(env.ATTENDANCE_ROSTER || cfg.paths.roster),
		locale: cfg.locale,
		identity: Object.freeze({
			groupPrefixes: cfg.groupPrefixes.map((p) => p.toLowerCase()),
			guestMarkers: cfg.guestMarkers,
		}),
		organizerMarkers: cfg.organizerMarkers,
		defaultTitles: cfg.defaultTitles,
	})
}

export function currentEnvironment(): ConfigEnvironment {
	return { cwd: process.cwd(), home: homedir(), platform: process.platform, env: process.env }
}

/**
 * Loads the config file (explicit path, ATTENDANCE_CONFIG, or the default file
 * in the working directory). Only the default file may be missing.
 */
export function loadConfig(configPath?: string, environment: ConfigEnvironment = currentEnvironment()): AttendanceConfig {
	const explicit = configPath ?? environment.env.ATTENDANCE_CONFIG
	const file = path.resolve(environment.cwd, explicit ?? DEFAULT_CONFIG_FILE)

	if (!explicit && !existsSync(file)) {
		console.log(LOG_PREFIX, 'No config file, using defaults', { file })
		return resolveConfig({}, environment)
	}

	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(file, 'utf8').replace(/^\uFEFF/, ''))
	} catch (e) {
		throw new FatalInputError(`Cannot read configuration ${file}: ${describeError(e)}`, { cause: e })
	}
	console.log(LOG_PREFIX, 'Loaded config', { file })
	return resolveConfig(raw, environment)
}

/**
 * Injected logging. Nothing is configured process-wide: components accept a `Logger` option and fall back to
 * `consoleLogger`.
 *
 * @module
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type Logger = (message: string, level?: LogLevel) => void

export const consoleLogger: Logger = (message, level = "info") => {
	if (level === "error") console.error(message)
	else if (level === "warn") console.warn(message)
	else console.log(message)
}

export const silentLogger: Logger = () => {}

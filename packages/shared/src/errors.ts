/**
 * Error taxonomy shared by every Tidemark package.
 *
 * - `ValidationError`: a value is out of range or of the wrong type.
 * - `StructuralError`: data breaks a structural contract (missing merge key, inner ring without outer ring).
 * - `IOError`: a file could not be read or written, or does not hold an interchange document.
 *
 * @module
 */

export class ValidationError extends Error {
	override name = "ValidationError"
}

export class StructuralError extends Error {
	override name = "StructuralError"
}

export class IOError extends Error {
	override name = "IOError"
	readonly path: string

	constructor(message: string, path: string, options?: ErrorOptions) {
		super(message, options)
		this.path = path
	}
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message
	return String(error)
}

/**
 * ============================================================================
 * ERREURS - Taxonomie des erreurs fatales
 * ============================================================================
 *
 * Toutes les erreurs qui interrompent une exécution passent par
 * KdpFormatterError. Un paragraphe ignoré pendant les corrections n'est pas
 * une erreur : il est compté dans FixResult.skipped.
 *
 * @version 1.0.0
 */

export enum KdpErrorCode {
	/** Le fichier d'entrée n'existe pas */
	INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
	/** Archive illisible ou sans word/document.xml */
	NOT_A_VALID_PACKAGE = 'NOT_A_VALID_PACKAGE',
	/** Partie demandée absente de l'archive */
	PART_MISSING = 'PART_MISSING',
	/** Partie présente mais XML mal formé */
	MALFORMED_CONTENT = 'MALFORMED_CONTENT',
	/** Échec d'écriture du fichier de sortie */
	OUTPUT_WRITE_FAILED = 'OUTPUT_WRITE_FAILED',
}

export class KdpFormatterError extends Error {
	constructor(
		message: string,
		public readonly code: KdpErrorCode,
		public readonly context?: Record<string, unknown>
	) {
		super(message);
		this.name = 'KdpFormatterError';
		Error.captureStackTrace?.(this, KdpFormatterError);
	}
}

/**
 * Vérifie si une erreur est une KdpFormatterError, avec un code donné en option.
 */
export function isKdpFormatterError(error: unknown, code?: KdpErrorCode): error is KdpFormatterError {
	return error instanceof KdpFormatterError && (code === undefined || error.code === code);
}

/**
 * Extrait un message lisible de n'importe quelle valeur levée.
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

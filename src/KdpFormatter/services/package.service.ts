/**
 * ============================================================================
 * SERVICE PACKAGE - Lecture et écriture de l'archive DOCX
 * ============================================================================
 *
 * Un fichier DOCX est une archive ZIP (format OPC) contenant plusieurs
 * parties XML. Ce service ouvre l'archive avec PizZip, donne accès aux
 * parties et réécrit une copie de l'archive où seules les parties modifiées
 * changent.
 *
 * L'écriture passe par un fichier temporaire voisin renommé à la fin :
 * le fichier de sortie n'existe jamais à moitié écrit.
 *
 * @version 1.0.0
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import PizZip from 'pizzip';
import { MAIN_CONTENT_PART, OUTPUT_SUFFIX } from '../../shared/constants';
import { KdpErrorCode, KdpFormatterError, errorMessage } from '../../shared/errors';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Archive DOCX ouverte.
 */
export interface DocxPackage {
	/** Chemin du fichier d'origine */
	sourcePath: string;

	/** Octets d'origine de l'archive */
	buffer: Buffer;

	/** Archive décompressée */
	zip: PizZip;

	/** Noms des parties (hors répertoires), dans l'ordre de l'archive */
	partNames: string[];
}

/**
 * Parties à remplacer lors de l'écriture, indexées par chemin logique.
 */
export type ModifiedParts = Record<string, string | Buffer>;

// ============================================================================
// LECTURE
// ============================================================================

/**
 * Ouvre un fichier DOCX.
 *
 * @param filePath - Chemin du fichier à ouvrir
 * @throws KdpFormatterError INPUT_NOT_FOUND si le fichier n'existe pas
 * @throws KdpFormatterError NOT_A_VALID_PACKAGE si l'archive est illisible ou sans word/document.xml
 */
export async function openPackage(filePath: string): Promise<DocxPackage> {
	let buffer: Buffer;

	try {
		const stat = await fs.promises.stat(filePath);
		if (!stat.isFile()) {
			throw new KdpFormatterError(`Not a file: ${filePath}`, KdpErrorCode.INPUT_NOT_FOUND, {
				path: filePath,
			});
		}
		buffer = await fs.promises.readFile(filePath);
	} catch (error) {
		if (error instanceof KdpFormatterError) {
			throw error;
		}

		const message =
			errnoCode(error) === 'ENOENT' ? `File not found: ${filePath}` : `Cannot read file: ${filePath}`;
		throw new KdpFormatterError(message, KdpErrorCode.INPUT_NOT_FOUND, {
			path: filePath,
			cause: errorMessage(error),
		});
	}

	return loadPackage(buffer, filePath);
}

/**
 * Charge une archive DOCX déjà en mémoire.
 *
 * @param buffer - Octets de l'archive
 * @param sourcePath - Chemin d'origine (pour les messages et la protection en écriture)
 */
export function loadPackage(buffer: Buffer, sourcePath: string): DocxPackage {
	let zip: PizZip;

	try {
		zip = new PizZip(buffer);
	} catch (error) {
		throw new KdpFormatterError(
			`${path.basename(sourcePath)} is not a valid DOCX package (unreadable ZIP archive)`,
			KdpErrorCode.NOT_A_VALID_PACKAGE,
			{ path: sourcePath, cause: errorMessage(error) }
		);
	}

	const partNames = Object.keys(zip.files).filter((name) => !zip.files[name].dir);

	if (!partNames.includes(MAIN_CONTENT_PART)) {
		throw new KdpFormatterError(
			`${path.basename(sourcePath)} is not a valid DOCX package (missing ${MAIN_CONTENT_PART})`,
			KdpErrorCode.NOT_A_VALID_PACKAGE,
			{ path: sourcePath }
		);
	}

	return { sourcePath, buffer, zip, partNames };
}

/**
 * Retourne les octets d'une partie.
 *
 * @throws KdpFormatterError PART_MISSING si la partie n'existe pas
 */
export function readPart(pkg: DocxPackage, logicalPath: string): Buffer {
	const entry = pkg.zip.file(logicalPath);

	if (!entry || entry.dir) {
		throw new KdpFormatterError(`Part not found in package: ${logicalPath}`, KdpErrorCode.PART_MISSING, {
			path: pkg.sourcePath,
			part: logicalPath,
		});
	}

	return Buffer.from(entry.asUint8Array());
}

/**
 * Retourne le texte UTF-8 d'une partie, sans BOM.
 */
export function readTextPart(pkg: DocxPackage, logicalPath: string): string {
	return readPart(pkg, logicalPath).toString('utf8').replace(/^\uFEFF/, '');
}

// ============================================================================
// ÉCRITURE
// ============================================================================

/**
 * Construit une nouvelle archive à partir des octets d'origine en remplaçant
 * uniquement les parties listées.
 *
 * @throws KdpFormatterError PART_MISSING si une partie listée n'existe pas dans l'archive
 */
export function buildPackage(pkg: DocxPackage, modifiedParts: ModifiedParts): Buffer {
	const zip = new PizZip(pkg.buffer);

	for (const [name, content] of Object.entries(modifiedParts)) {
		if (!pkg.partNames.includes(name)) {
			throw new KdpFormatterError(`Part not found in package: ${name}`, KdpErrorCode.PART_MISSING, {
				path: pkg.sourcePath,
				part: name,
			});
		}
		zip.file(name, content);
	}

	return zip.generate({
		type: 'nodebuffer',
		compression: 'DEFLATE',
	});
}

/**
 * Écrit l'archive modifiée dans outputPath.
 *
 * L'archive est entièrement générée en mémoire, écrite dans un fichier
 * temporaire voisin puis renommée. En cas d'échec, le fichier temporaire
 * est supprimé et rien n'est écrit à outputPath.
 *
 * @throws KdpFormatterError OUTPUT_WRITE_FAILED si outputPath est le fichier d'entrée ou si l'écriture échoue
 */
export async function writePackage(
	outputPath: string,
	pkg: DocxPackage,
	modifiedParts: ModifiedParts
): Promise<void> {
	const target = path.resolve(outputPath);

	if (target === path.resolve(pkg.sourcePath)) {
		throw new KdpFormatterError(
			`Refusing to overwrite the input file: ${outputPath}`,
			KdpErrorCode.OUTPUT_WRITE_FAILED,
			{ path: outputPath }
		);
	}

	const buffer = buildPackage(pkg, modifiedParts);
	const tempPath = temporaryPathFor(target);

	try {
		await fs.promises.writeFile(tempPath, buffer, { flag: 'wx' });
		await fs.promises.rename(tempPath, target);
	} catch (error) {
		const cleanupError = await removeTemporaryFile(tempPath);

		throw new KdpFormatterError(`Cannot write output file: ${outputPath}`, KdpErrorCode.OUTPUT_WRITE_FAILED, {
			path: outputPath,
			cause: errorMessage(error),
			...(cleanupError !== null ? { cleanup: cleanupError } : {}),
		});
	}
}

/**
 * Chemin de sortie par défaut : <dossier>/<nom>_kdp_formatted<extension>.
 *
 * @example
 * defaultOutputPath('/books/roman.docx'); // "/books/roman_kdp_formatted.docx"
 */
export function defaultOutputPath(inputPath: string): string {
	const extension = path.extname(inputPath);
	const stem = path.basename(inputPath, extension);

	return path.join(path.dirname(inputPath), `${stem}${OUTPUT_SUFFIX}${extension}`);
}

// ============================================================================
// FONCTIONS INTERNES
// ============================================================================

/**
 * Supprime le fichier temporaire après un échec d'écriture.
 *
 * @returns Le message d'erreur de la suppression, ou null si elle a réussi
 */
async function removeTemporaryFile(tempPath: string): Promise<string | null> {
	try {
		await fs.promises.rm(tempPath, { force: true });
		return null;
	} catch (error) {
		return errorMessage(error);
	}
}

function temporaryPathFor(target: string): string {
	const suffix = crypto.randomBytes(6).toString('hex');
	return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.tmp`);
}

function errnoCode(error: unknown): string | undefined {
	if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
		return error.code;
	}
	return undefined;
}

/**
 * ============================================================================
 * KDP FORMATTER - Analyse et correction d'un manuscrit DOCX
 * ============================================================================
 *
 * Orchestration d'une exécution :
 * 1. Ouvrir le package DOCX
 * 2. Parser word/document.xml
 * 3. Classer les paragraphes et construire le rapport
 * 4. (--fix) Appliquer les corrections
 * 5. (--fix) Écrire le package corrigé
 *
 * Les services sont purs ; seul ce module écrit dans la console, via le
 * ConsoleLike reçu en paramètre.
 *
 * @version 1.0.0
 */

import * as path from 'path';
import { KDP_RULES, MAIN_CONTENT_PART } from '../shared/constants';
import type { KdpRules } from '../shared/constants';
import type { Classification, FixKind, FixResult, Report } from '../shared/types';
import {
	FIX_KINDS,
	analyzeContentTree,
	appendFindings,
	applyFixes,
	defaultOutputPath,
	openPackage,
	parseContentTree,
	readTextPart,
	serializeContentTree,
	writePackage,
} from './services';
import type { ModifiedParts } from './services';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Sortie console utilisée pour les messages de progression.
 */
export type ConsoleLike = Pick<Console, 'log'>;

export interface FormatterOptions {
	/** Chemin du fichier .docx à analyser */
	inputPath: string;

	/** Appliquer les corrections et écrire un nouveau fichier (défaut: false) */
	fix?: boolean;

	/** Chemin du fichier corrigé (défaut: <nom>_kdp_formatted.docx à côté de l'entrée) */
	outputPath?: string;

	/** Corrections à appliquer en mode fix (défaut: toutes) */
	fixes?: FixKind[];

	/** Règles de formatage (défaut: KDP_RULES) */
	rules?: Partial<KdpRules>;
}

interface ResolvedOptions {
	inputPath: string;
	fix: boolean;
	outputPath: string;
	fixes: readonly FixKind[];
	rules: KdpRules;
}

export interface FormatterResult {
	/** Rapport d'analyse, suivi des constats de correction en mode fix */
	report: Report;

	classification: Classification;

	/** Résultat des corrections (mode fix uniquement) */
	fix?: FixResult;

	/** Fichier écrit (mode fix uniquement) */
	outputPath?: string;
}

// ============================================================================
// EXÉCUTION
// ============================================================================

/**
 * Analyse un document DOCX et, en mode fix, écrit une copie corrigée.
 *
 * @throws KdpFormatterError pour toute erreur fatale (aucun fichier n'est alors écrit)
 *
 * @example
 * const { report } = await formatDocument({ inputPath: 'roman.docx', fix: true });
 */
export async function formatDocument(
	options: FormatterOptions,
	output: ConsoleLike = console
): Promise<FormatterResult> {
	// ============================================================
	// ÉTAPE 1: Récupérer les paramètres
	// ============================================================

	const resolved = resolveOptions(options);

	// ============================================================
	// ÉTAPE 2: Charger le document DOCX
	// ============================================================

	output.log(`📖 Analyzing: ${path.basename(resolved.inputPath)}`);
	const pkg = await openPackage(resolved.inputPath);
	const originalXml = readTextPart(pkg, MAIN_CONTENT_PART);

	// ============================================================
	// ÉTAPE 3: Analyser le contenu
	// ============================================================

	const tree = parseContentTree(originalXml);
	const { classification, report } = analyzeContentTree(tree, resolved.rules);

	if (!resolved.fix) {
		return { report, classification };
	}

	// ============================================================
	// ÉTAPE 4: Appliquer les corrections
	// ============================================================

	output.log('🔧 Fixing formatting issues...');
	const fix = applyFixes(tree, classification, resolved.rules, resolved.fixes);

	// Sans modification, la partie d'origine est recopiée telle quelle
	const modifiedParts: ModifiedParts = fix.changed ? { [MAIN_CONTENT_PART]: serializeContentTree(tree) } : {};

	// ============================================================
	// ÉTAPE 5: Sauvegarder le document
	// ============================================================

	await writePackage(resolved.outputPath, pkg, modifiedParts);
	output.log(`📄 Saved: ${resolved.outputPath}`);

	return {
		report: appendFindings(report, fix.findings),
		classification,
		fix,
		outputPath: resolved.outputPath,
	};
}

/**
 * Analyse le XML de word/document.xml sans passer par une archive.
 */
export function analyzeDocumentXml(
	xml: string,
	rules: Partial<KdpRules> = {}
): { report: Report; classification: Classification } {
	return analyzeContentTree(parseContentTree(xml), resolveRules(rules));
}

/**
 * Analyse puis corrige le XML de word/document.xml.
 *
 * Sans modification, le XML d'origine est retourné tel quel.
 */
export function fixDocumentXml(
	xml: string,
	rules: Partial<KdpRules> = {},
	fixes: readonly FixKind[] = FIX_KINDS
): { xml: string; report: Report; fix: FixResult } {
	const resolvedRules = resolveRules(rules);
	const tree = parseContentTree(xml);
	const { classification, report } = analyzeContentTree(tree, resolvedRules);
	const fix = applyFixes(tree, classification, resolvedRules, fixes);

	return {
		xml: fix.changed ? serializeContentTree(tree) : xml,
		report: appendFindings(report, fix.findings),
		fix,
	};
}

// ============================================================================
// FONCTIONS UTILITAIRES
// ============================================================================

/**
 * Applique les valeurs par défaut aux options.
 */
function resolveOptions(options: FormatterOptions): ResolvedOptions {
	return {
		inputPath: options.inputPath,
		fix: options.fix || false,
		outputPath: options.outputPath || defaultOutputPath(options.inputPath),
		fixes: options.fixes || FIX_KINDS,
		rules: resolveRules(options.rules || {}),
	};
}

function resolveRules(rules: Partial<KdpRules>): KdpRules {
	return {
		paragraphIndentTwips: rules.paragraphIndentTwips ?? KDP_RULES.paragraphIndentTwips,
		minimumIndentTwips: rules.minimumIndentTwips ?? KDP_RULES.minimumIndentTwips,
		lineSpacing: rules.lineSpacing ?? KDP_RULES.lineSpacing,
		imageDpi: rules.imageDpi ?? KDP_RULES.imageDpi,
	};
}

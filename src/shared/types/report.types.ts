/**
 * ============================================================================
 * TYPES RAPPORT - Constats, rapport d'analyse et corrections
 * ============================================================================
 *
 * @version 1.0.0
 */

import type { DocumentStats, LineSpacing } from './docx.types';

/**
 * Gravité d'un constat.
 *
 * - critical : bloque la conversion eBook (tabulations, absence de titres)
 * - warning  : à corriger pour un meilleur rendu
 * - info     : vérification manuelle recommandée
 * - success  : bonne pratique constatée
 */
export type Severity = 'critical' | 'warning' | 'info' | 'success';

/**
 * Catégorie de vérification à l'origine d'un constat.
 */
export type FindingCategory =
	| 'tabs'
	| 'indentation'
	| 'headings'
	| 'spacing'
	| 'pageBreaks'
	| 'tableOfContents'
	| 'images'
	| 'fixes';

/**
 * Un constat du rapport. Immuable une fois créé.
 */
export type Finding = Readonly<{
	category: FindingCategory;
	severity: Severity;
	message: string;
	/** Nombre de paragraphes concernés (d'images pour la catégorie images) */
	count?: number;
	/** Explication du problème */
	detail?: string;
	/** Action recommandée */
	remediation?: string;
}>;

/**
 * Rapport d'analyse : constats ordonnés (critical, warning, info, success).
 */
export type Report = Readonly<{
	findings: readonly Finding[];
	stats: DocumentStats;
}>;

/**
 * Résultat de la classification d'un paragraphe.
 */
export interface ParagraphFlags {
	index: number;
	tabIndented: boolean;
	missingFirstLineIndent: boolean;
	inconsistentSpacing: boolean;
}

/**
 * Résultat complet de la classification, transmis explicitement
 * de l'analyse aux corrections.
 */
export interface Classification {
	paragraphs: ParagraphFlags[];

	/** Interligne le plus fréquent (hors valeur cible), null si aucun */
	spacingMode: LineSpacing | null;

	hasHeadings: boolean;
	headingCount: number;
	hasPageBreakBeforeHeading: boolean;
	hasTableOfContents: boolean;
	imageCount: number;
}

/**
 * Type de correction automatique.
 */
export type FixKind = 'removeTabs' | 'applyIndent' | 'normalizeSpacing';

/**
 * Une classe de corrections appliquée à tous les paragraphes concernés.
 */
export interface FixAction {
	kind: FixKind;

	/** Nombre de paragraphes modifiés */
	count: number;

	/** Index des paragraphes modifiés */
	paragraphIndexes: number[];
}

/**
 * Résultat de l'application des corrections.
 */
export interface FixResult {
	actions: FixAction[];

	/** Index des paragraphes ignorés pour structure inattendue */
	skipped: number[];

	/** Constats "success" (et "warning" pour les paragraphes ignorés) */
	findings: Finding[];

	/** true si au moins un élément DOM a été modifié */
	changed: boolean;
}

/**
 * ============================================================================
 * CONSTANTES - Règles de formatage KDP
 * ============================================================================
 *
 * Toutes les valeurs numériques utilisées par l'analyse et les corrections.
 * Les retraits sont exprimés en twips (1/1440 de pouce), comme dans le XML
 * Word ; l'interligne "auto" est exprimé en 240èmes de ligne.
 *
 * @version 1.0.0
 */

import type { LineSpacing } from './types';

/** Nombre de twips dans un pouce */
export const TWIPS_PER_INCH = 1440;

/** Valeur de w:line correspondant à un interligne simple (lineRule="auto") */
export const LINE_UNITS_PER_LINE = 240;

/**
 * Règles appliquées par l'analyse et les corrections.
 */
export interface KdpRules {
	paragraphIndentTwips: number;
	minimumIndentTwips: number;
	lineSpacing: LineSpacing;
	imageDpi: number;
}

export const KDP_RULES: Readonly<KdpRules> = {
	/** Retrait de première ligne appliqué par les corrections (0.5 pouce) */
	paragraphIndentTwips: 720,

	/** En dessous de ce retrait (0.3 pouce), le paragraphe est considéré sans retrait */
	minimumIndentTwips: 432,

	/** Interligne cible : 1.15 (276 = 1.15 × 240) */
	lineSpacing: { rule: 'auto', line: 276 },

	/** Résolution recommandée pour les images (vérification manuelle) */
	imageDpi: 300,
};

/** Chemin logique de la partie principale dans l'archive DOCX */
export const MAIN_CONTENT_PART = 'word/document.xml';

/** Suffixe ajouté au nom du fichier de sortie */
export const OUTPUT_SUFFIX = '_kdp_formatted';


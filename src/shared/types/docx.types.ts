/**
 * ============================================================================
 * TYPES DOCX - Arbre de contenu d'un document Word
 * ============================================================================
 *
 * Ce fichier décrit la représentation en mémoire de word/document.xml
 * utilisée par l'analyse et les corrections.
 *
 * POUR LES DÉVELOPPEURS JUNIORS :
 * - Un fichier DOCX est une archive ZIP contenant des fichiers XML
 * - Le contenu principal est dans word/document.xml
 * - Chaque paragraphe (<w:p>) garde une référence vers son élément DOM :
 *   les corrections modifient directement cet élément
 *
 * @version 1.0.0
 */

/**
 * Règle d'interligne Word (attribut w:lineRule).
 *
 * - auto    : w:line en 240èmes de ligne (276 = 1.15)
 * - exact   : w:line en twips, hauteur fixe
 * - atLeast : w:line en twips, hauteur minimale
 */
export type LineRule = 'auto' | 'exact' | 'atLeast';

/**
 * Interligne explicite d'un paragraphe (<w:spacing w:line="..." w:lineRule="..."/>).
 */
export interface LineSpacing {
	rule: LineRule;
	line: number;
}

/**
 * Anomalie de structure qui empêche de modifier un paragraphe sans risque.
 *
 * - multiple_ppr      : plusieurs <w:pPr> dans le même paragraphe
 * - misplaced_ppr     : <w:pPr> n'est pas le premier enfant du paragraphe
 * - duplicate_ind     : plusieurs <w:ind> dans <w:pPr>
 * - duplicate_spacing : plusieurs <w:spacing> dans <w:pPr>
 */
export type StructureIssue = 'multiple_ppr' | 'misplaced_ppr' | 'duplicate_ind' | 'duplicate_spacing';

/**
 * Un run (<w:r>) direct d'un paragraphe.
 */
export interface RunNode {
	/** Élément <w:r> */
	element: Element;

	/** Texte concaténé des <w:t> du run (les <w:tab/> comptent comme "\t") */
	text: string;

	/** true si le premier contenu du run est une tabulation */
	startsWithTab: boolean;

	/** false pour un run qui ne contient que <w:rPr> */
	hasContent: boolean;
}

/**
 * Un paragraphe (<w:p>) du corps du document.
 */
export interface ParagraphNode {
	/** Index du paragraphe dans le document (commence à 0) */
	index: number;

	/** Élément <w:p> */
	element: Element;

	/** Valeur de <w:pStyle w:val="..."> ou null */
	styleId: string | null;

	/** Niveau de titre (1..N) ou null si le paragraphe n'est pas un titre */
	headingLevel: number | null;

	/** true pour les styles Title / Subtitle */
	isTitleStyle: boolean;

	/** true si le paragraphe est dans une cellule de tableau */
	inTableCell: boolean;

	/** Retrait de première ligne en twips (négatif pour un retrait suspendu), null si absent */
	firstLineIndent: number | null;

	/** Interligne explicite, null si le paragraphe hérite du défaut */
	lineSpacing: LineSpacing | null;

	/** Runs directs, dans l'ordre du document */
	runs: RunNode[];

	/** Texte visible du paragraphe */
	text: string;

	/** true si le premier run avec contenu commence par une tabulation */
	startsWithTab: boolean;

	/** Saut de page avant tout texte (ou pageBreakBefore) */
	pageBreakAtStart: boolean;

	/** Saut de page après tout texte */
	pageBreakAtEnd: boolean;

	/** Nombre d'images référencées dans le paragraphe */
	mediaCount: number;

	/** Anomalie de structure, null si le paragraphe est modifiable */
	structureIssue: StructureIssue | null;
}

/**
 * Statistiques du document affichées en tête du rapport.
 */
export interface DocumentStats {
	paragraphs: number;
	words: number;
	headings: number;
	images: number;
}

/**
 * Arbre de contenu complet de word/document.xml.
 */
export interface ContentTree {
	/** Document DOM parsé */
	document: Document;

	/** Élément <w:body> */
	body: Element;

	/** Paragraphes du corps, dans l'ordre du document */
	paragraphs: ParagraphNode[];

	/** true si un champ TOC est présent */
	hasTableOfContents: boolean;

	/** Statistiques calculées au parsing */
	stats: DocumentStats;
}

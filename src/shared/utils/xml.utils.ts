/**
 * ============================================================================
 * UTILITAIRES XML - Parsing et navigation DOM du XML Word
 * ============================================================================
 *
 * Ce module contient les fonctions de bas niveau pour lire et modifier le XML
 * des documents Word (DOCX). Le XML est parsé avec @xmldom/xmldom, ce qui
 * conserve l'ordre des nœuds et permet de resérialiser le document.
 *
 * STRUCTURE XML WORD (pour les développeurs juniors) :
 * ----------------------------------------------------
 * - <w:p>     : Paragraphe (paragraph)
 * - <w:pPr>   : Propriétés de paragraphe (style, retrait, interligne)
 * - <w:r>     : Run - une portion de texte avec un formatage uniforme
 * - <w:rPr>   : Propriétés de run (formatage du texte)
 * - <w:t>     : Texte brut (text)
 * - <w:tab/>  : Caractère de tabulation
 * - <w:br/>   : Saut de ligne, de colonne ou de page (w:type="page")
 *
 * EXEMPLE DE STRUCTURE XML :
 * ```xml
 * <w:p>
 *   <w:pPr>
 *     <w:spacing w:line="276" w:lineRule="auto"/>
 *     <w:ind w:firstLine="720"/>
 *   </w:pPr>
 *   <w:r><w:tab/><w:t>Il était une fois</w:t></w:r>
 * </w:p>
 * ```
 *
 * Les éléments sont recherchés par nom qualifié (w:p, w:r...) : Word utilise
 * toujours le préfixe "w" pour l'espace de noms WordprocessingML.
 *
 * @version 1.0.0
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';

const ELEMENT_NODE = 1;

// ============================================================================
// PARSING ET SÉRIALISATION
// ============================================================================

/**
 * Erreur levée quand le XML n'est pas bien formé.
 */
export class XmlParseError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'XmlParseError';
	}
}

/**
 * Parse une chaîne XML en Document DOM.
 *
 * Contrairement au comportement par défaut de xmldom (qui se contente
 * d'afficher les erreurs), tout message du parser, warning compris, est levé.
 *
 * @param xml - Le XML à parser
 * @returns Le document DOM
 * @throws XmlParseError si le XML est vide ou mal formé
 *
 * @example
 * const doc = parseXml('<w:document xmlns:w="...">...</w:document>');
 */
export function parseXml(xml: string): Document {
	if (!xml.trim()) {
		throw new XmlParseError('Document XML vide');
	}

	const fail = (message: string): never => {
		throw new XmlParseError(message);
	};

	// xmldom 0.8 signale une balise fermante mal appariée comme simple warning
	const document = new DOMParser({
		errorHandler: {
			warning: fail,
			error: fail,
			fatalError: fail,
		},
	}).parseFromString(xml, 'application/xml');

	if (!document || !document.documentElement) {
		throw new XmlParseError('Aucun élément racine');
	}

	return document;
}

/**
 * Sérialise un Document DOM en chaîne XML.
 */
export function serializeXml(document: Document): string {
	return new XMLSerializer().serializeToString(document);
}

// ============================================================================
// NAVIGATION
// ============================================================================

/**
 * Type guard : le nœud est-il un élément ?
 */
export function isElement(node: Node | null | undefined): node is Element {
	return node !== null && node !== undefined && node.nodeType === ELEMENT_NODE;
}

/**
 * Retourne les enfants directs de type élément, dans l'ordre du document.
 */
export function elementChildren(parent: Node): Element[] {
	const children: Element[] = [];
	const nodes = parent.childNodes;

	for (let i = 0; i < nodes.length; i++) {
		const node = nodes.item(i);
		if (isElement(node)) {
			children.push(node);
		}
	}

	return children;
}

/**
 * Retourne les enfants directs portant le nom qualifié donné.
 *
 * @example
 * const runs = findChildren(paragraph, 'w:r');
 */
export function findChildren(parent: Node, name: string): Element[] {
	return elementChildren(parent).filter((child) => child.nodeName === name);
}

/**
 * Retourne le premier enfant direct portant le nom qualifié donné, ou null.
 */
export function findChild(parent: Node, name: string): Element | null {
	return findChildren(parent, name)[0] ?? null;
}

/**
 * Retourne tous les descendants portant le nom qualifié donné (ordre du document).
 */
export function findDescendants(root: Element | Document, name: string): Element[] {
	const collection = root.getElementsByTagName(name);
	const result: Element[] = [];

	for (let i = 0; i < collection.length; i++) {
		const element = collection.item(i);
		if (element) {
			result.push(element);
		}
	}

	return result;
}

/**
 * Vérifie si un élément a un ancêtre portant le nom donné.
 *
 * @param element - L'élément de départ (exclu de la recherche)
 * @param name - Nom qualifié recherché (ex: "w:tc")
 * @param stopAt - Ancêtre où arrêter la remontée (exclu)
 */
export function hasAncestor(element: Element, name: string, stopAt?: Element): boolean {
	let current = element.parentNode;

	while (current && current !== stopAt) {
		if (isElement(current) && current.nodeName === name) {
			return true;
		}
		current = current.parentNode;
	}

	return false;
}

/**
 * Parcourt récursivement les éléments descendants dans l'ordre du document.
 * Le callback peut retourner false pour ne pas descendre dans un élément.
 */
export function walkElements(root: Element, visit: (element: Element) => boolean | void): void {
	for (const child of elementChildren(root)) {
		if (visit(child) !== false) {
			walkElements(child, visit);
		}
	}
}

// ============================================================================
// ATTRIBUTS
// ============================================================================

/**
 * Lit un attribut, null s'il est absent.
 *
 * xmldom retourne une chaîne vide pour un attribut absent : on distingue
 * les deux cas avec hasAttribute.
 */
export function getAttribute(element: Element, name: string): string | null {
	return element.hasAttribute(name) ? element.getAttribute(name) : null;
}

/**
 * Lit un attribut entier, null s'il est absent ou non numérique.
 */
export function getIntAttribute(element: Element, name: string): number | null {
	const raw = getAttribute(element, name);
	if (raw === null || !/^-?\d+$/.test(raw.trim())) {
		return null;
	}
	return parseInt(raw, 10);
}

/**
 * Interprète une propriété booléenne Word (CT_OnOff).
 *
 * <w:pageBreakBefore/> est vrai, <w:pageBreakBefore w:val="0"/> est faux.
 */
export function isOnOffEnabled(element: Element): boolean {
	const value = getAttribute(element, 'w:val');
	return value === null || !['0', 'false', 'off'].includes(value.toLowerCase());
}

// ============================================================================
// MODIFICATION
// ============================================================================

/**
 * Crée un élément "w:*" dans l'espace de noms de son futur parent.
 *
 * @example
 * const ind = createWordElement(pPr, 'w:ind');
 */
export function createWordElement(parent: Element, name: string): Element {
	const owner = parent.ownerDocument;
	const namespace = parent.namespaceURI;

	return namespace ? owner.createElementNS(namespace, name) : owner.createElement(name);
}

/**
 * Définit un attribut préfixé "w:" dans l'espace de noms de l'élément.
 *
 * Un attribut existant de même nom local est remplacé.
 */
export function setWordAttribute(element: Element, name: string, value: string): void {
	const namespace = element.namespaceURI;
	if (namespace) {
		element.setAttributeNS(namespace, name, value);
	} else {
		element.setAttribute(name, value);
	}
}

/**
 * Supprime un attribut préfixé "w:" s'il est présent.
 */
export function removeWordAttribute(element: Element, name: string): boolean {
	if (!element.hasAttribute(name)) {
		return false;
	}
	element.removeAttribute(name);
	return true;
}

import { describe, expect, it } from 'vitest';
import {
	countWords,
	detectHeadingFromStyle,
	detectHeadingLevel,
	findDescendants,
	hasVisibleText,
	isTitleStyle,
	isTocFieldCode,
	normalizeText,
	parseXml,
	pluralize,
} from '../../../src/shared/utils';
import { documentXml } from '../../helpers/docx-fixtures';

function pPrOf(properties: string): Element | null {
	const document = parseXml(documentXml(`<w:p><w:pPr>${properties}</w:pPr></w:p>`));
	return findDescendants(document, 'w:pPr')[0] ?? null;
}

describe('text.utils', () => {
	it('normalizes whitespace and non-breaking spaces', () => {
		expect(normalizeText('  Il était\t une   fois ')).toBe('Il était une fois');
		expect(normalizeText('Chapitre\u00A01')).toBe('Chapitre 1');
	});

	it('detects visible text', () => {
		expect(hasVisibleText(' \t ')).toBe(false);
		expect(hasVisibleText(' a ')).toBe(true);
	});

	it('counts words', () => {
		expect(countWords('  Il était   une fois ')).toBe(4);
		expect(countWords('')).toBe(0);
	});

	it('pluralizes counts', () => {
		expect(pluralize(1, 'image')).toBe('1 image');
		expect(pluralize(3, 'image')).toBe('3 images');
		expect(pluralize(0, 'paragraph')).toBe('0 paragraphs');
	});
});

describe('style-detector.utils', () => {
	it('recognizes numbered heading styles', () => {
		expect(detectHeadingFromStyle('Heading1')).toBe(1);
		expect(detectHeadingFromStyle('heading 2')).toBe(2);
		expect(detectHeadingFromStyle('Titre3')).toBe(3);
		expect(detectHeadingFromStyle('Überschrift1')).toBe(1);
		expect(detectHeadingFromStyle('Heading12')).toBe(12);
	});

	it('ignores body and title styles', () => {
		expect(detectHeadingFromStyle('Normal')).toBeNull();
		expect(detectHeadingFromStyle('Title')).toBeNull();
		expect(detectHeadingFromStyle('Heading0')).toBeNull();
	});

	it('recognizes title styles', () => {
		expect(isTitleStyle('Title')).toBe(true);
		expect(isTitleStyle('Subtitle')).toBe(true);
		expect(isTitleStyle('Heading1')).toBe(false);
		expect(isTitleStyle(null)).toBe(false);
	});

	it('falls back to the outline level', () => {
		expect(detectHeadingLevel(pPrOf('<w:pStyle w:val="ChapterTitle"/><w:outlineLvl w:val="0"/>'))).toBe(1);
		expect(detectHeadingLevel(pPrOf('<w:outlineLvl w:val="9"/>'))).toBeNull();
		expect(detectHeadingLevel(pPrOf('<w:pStyle w:val="Heading2"/><w:outlineLvl w:val="0"/>'))).toBe(2);
		expect(detectHeadingLevel(null)).toBeNull();
	});

	it('recognizes table of contents field codes', () => {
		expect(isTocFieldCode(' TOC \\o "1-3" \\h \\z \\u ')).toBe(true);
		expect(isTocFieldCode(' PAGE ')).toBe(false);
		expect(isTocFieldCode('TOCX')).toBe(false);
	});
});

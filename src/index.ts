/**
 * ============================================================================
 * KDP DOCX FORMATTER - API publique
 * ============================================================================
 *
 * @version 1.0.0
 */

export { formatDocument, analyzeDocumentXml, fixDocumentXml } from './KdpFormatter/KdpFormatter';
export type { ConsoleLike, FormatterOptions, FormatterResult } from './KdpFormatter/KdpFormatter';
export {
	openPackage,
	loadPackage,
	readPart,
	readTextPart,
	writePackage,
	defaultOutputPath,
	renderReport,
	FIX_KINDS,
} from './KdpFormatter/services';
export type { DocxPackage, ModifiedParts, RenderOptions } from './KdpFormatter/services';
export { runCli } from './cli';
export type { CliIO } from './cli';
export { KDP_RULES, KdpErrorCode, KdpFormatterError, isKdpFormatterError } from './shared';
export type { KdpRules } from './shared';
export type * from './shared/types';

/**
 * ============================================================================
 * CLI - kdp-format
 * ============================================================================
 *
 * Usage :
 *   kdp-format <input.docx>                  Analyse et affiche le rapport
 *   kdp-format <input.docx> --fix            Analyse, corrige et écrit
 *                                            <input>_kdp_formatted.docx
 *   kdp-format <input.docx> --fix -o out.docx
 *   kdp-format <input.docx> --fix --only tabs,spacing
 *
 * Code de sortie : 0 si l'analyse (et l'écriture) réussit, même avec des
 * problèmes critiques ; 1 en cas d'erreur fatale.
 *
 * @version 1.0.0
 */

import * as path from 'path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { formatDocument } from './KdpFormatter/KdpFormatter';
import { renderReport } from './KdpFormatter/services';
import { errorMessage, isKdpFormatterError } from './shared/errors';
import type { Finding, FixKind } from './shared/types';

/**
 * Sorties du CLI (injectables pour les tests).
 */
export interface CliIO {
	out: (message: string) => void;
	err: (message: string) => void;
}

interface CliOptions {
	fix?: boolean;
	output?: string;
	only?: FixKind[];
}

/** Noms des corrections acceptés par --only */
const FIX_NAMES = new Map<string, FixKind>([
	['tabs', 'removeTabs'],
	['indent', 'applyIndent'],
	['spacing', 'normalizeSpacing'],
]);

const defaultIO: CliIO = {
	out: (message) => console.log(message),
	err: (message) => console.error(message),
};

/**
 * Exécute le CLI.
 *
 * @param argv - Arguments au format process.argv (node, script, ...)
 * @returns Le code de sortie
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
	let exitCode = 0;
	const program = new Command();

	program
		.name('kdp-format')
		.description('Check and fix DOCX manuscript formatting for Kindle Direct Publishing')
		.version('1.0.0')
		.argument('<input>', 'Input .docx file')
		.option('--fix', 'Apply automatic fixes and write a new file')
		.option('-o, --output <path>', 'Output file path (default: <input>_kdp_formatted.docx)')
		.option('--only <fixes>', 'Comma-separated fixes to apply with --fix: tabs, indent, spacing', parseFixList)
		.exitOverride()
		.configureOutput({
			writeOut: (text) => io.out(text.trimEnd()),
			writeErr: (text) => io.err(text.trimEnd()),
		})
		.action(async (input: string, options: CliOptions) => {
			exitCode = await execute(input, options, io);
		});

	try {
		await program.parseAsync(argv);
	} catch (error) {
		if (error instanceof CommanderError) {
			return error.exitCode;
		}
		throw error;
	}

	return exitCode;
}

async function execute(input: string, options: CliOptions, io: CliIO): Promise<number> {
	const fix = options.fix === true;

	if (options.output && !fix) {
		io.out('ℹ️  --output is ignored without --fix');
	}
	if (options.only && !fix) {
		io.out('ℹ️  --only is ignored without --fix');
	}

	try {
		const result = await formatDocument(
			{ inputPath: input, fix, outputPath: fix ? options.output : undefined, fixes: options.only },
			{ log: io.out }
		);

		io.out('');
		io.out(renderReport(result.report, { documentName: path.basename(input) }));

		if (result.outputPath) {
			io.out(`\n✅ Formatted document saved to: ${result.outputPath}`);
		} else if (hasIssues(result.report.findings)) {
			io.out('\n💡 Run again with --fix to correct the fixable issues');
		}

		return 0;
	} catch (error) {
		if (isKdpFormatterError(error)) {
			io.err(`❌ Error: ${error.message}`);
		} else {
			io.err(`❌ Unexpected error: ${errorMessage(error)}`);
		}
		return 1;
	}
}

/**
 * Convertit la valeur de --only ("tabs,spacing") en liste de corrections.
 */
function parseFixList(value: string): FixKind[] {
	const names = value
		.split(',')
		.map((name) => name.trim())
		.filter((name) => name !== '');

	if (names.length === 0) {
		throw new InvalidArgumentError(`Expected one or more of: ${[...FIX_NAMES.keys()].join(', ')}`);
	}

	return names.map((name) => {
		const kind = FIX_NAMES.get(name);
		if (kind === undefined) {
			throw new InvalidArgumentError(`Unknown fix "${name}" (expected: ${[...FIX_NAMES.keys()].join(', ')})`);
		}
		return kind;
	});
}

function hasIssues(findings: readonly Finding[]): boolean {
	return findings.some((finding) => finding.severity === 'critical' || finding.severity === 'warning');
}

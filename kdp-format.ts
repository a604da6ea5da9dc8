#!/usr/bin/env node
/**
 * Point d'entrée exécutable du CLI kdp-format.
 */

import { runCli } from './src/cli';

runCli(process.argv).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error(error);
		process.exitCode = 1;
	}
);

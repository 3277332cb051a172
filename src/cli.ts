#!/usr/bin/env node

import { runCli } from './runCli.js';

runCli(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		// eslint-disable-next-line no-console
		console.error('[zigbind] unexpected failure', err);
		process.exitCode = 1;
	},
);

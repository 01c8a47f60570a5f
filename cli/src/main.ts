#!/usr/bin/env node

import { errorMessage } from 'chess-perspective-core';

import { createProgram } from './program';

createProgram()
	.parseAsync(process.argv)
	.catch((err: unknown) => {
		console.error(`[CLI] ${errorMessage(err)}`);
		process.exitCode = 1;
	});

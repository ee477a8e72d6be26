#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createProgram } from './cli/program.js';

// package.json sits two levels up from both src/app and dist/app
const PackageJsonSchema = z.object({ version: z.string() });
const pkg = PackageJsonSchema.parse(
    JSON.parse(readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf-8'))
);

await createProgram(pkg.version).parseAsync(process.argv);

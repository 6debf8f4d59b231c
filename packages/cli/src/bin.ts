#!/usr/bin/env node

import { readFileSync } from 'fs';

import { z } from '@retrykit/configuration';

import { createProgram } from './cli.js';

const PackageJsonSchema = z.object({ version: z.string() });

const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
);

createProgram({ version: packageJson.version })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('💥 Unexpected error:', error);
    process.exitCode = 1;
  });

import { readFileSync } from 'node:fs';

// Resolves from both src/ and dist/: package.json sits one level up in either case.
const pkg = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8')) as {
  version: string;
};

export const VERSION: string = pkg.version;

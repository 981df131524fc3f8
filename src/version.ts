/**
 * Package name and version, read from package.json next to src/ or dist/
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

const pkg = z
    .object({ name: z.string(), version: z.string() })
    .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8')));

export const PACKAGE_NAME = pkg.name;
export const VERSION = pkg.version;

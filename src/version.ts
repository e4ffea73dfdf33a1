/**
 * pqcscan Version - Single source of truth
 */

import { createRequire } from 'node:module';
const require = createRequire(import.meta.url);

interface PackageJson {
  version: string;
}

const pkg: PackageJson = require('../package.json');

export const VERSION = pkg.version;

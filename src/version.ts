import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

export const VERSION = pkg.version;

/**
 * Runtime data locations, relative to process.cwd() so a test or a second instance can
 * run from its own directory: `cd sandbox && node ../dist/src/server.js`
 */

import path from 'node:path';

export const Paths = {
  dataRoot: process.cwd(),
  get config() { return path.join(this.dataRoot, 'config'); },
  get dialogues() { return path.join(this.dataRoot, 'dialogues'); },
};

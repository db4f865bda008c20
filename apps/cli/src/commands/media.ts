/**
 * Media Command
 * 
 * List the built-in media types usable in --size.
 */

import { SAFE_SPACE, listMediaTypes } from '@debslice/core';
import { printInfo, printJson, printMediaTable } from '../lib/output.js';

interface MediaOptions {
  json?: boolean;
}

export function mediaCommand(options: MediaOptions): void {
  const media = listMediaTypes();

  if (options.json) {
    printJson(media);
    return;
  }

  printMediaTable(media);
  printInfo(`Capacities are ${Math.round(SAFE_SPACE * 100)}% of the raw media size`);
}

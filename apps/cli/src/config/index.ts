/**
 * CLI Configuration
 *
 * Defaults for the split options come from the environment (or a .env
 * file in the working directory); command-line flags override them.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Split defaults
  DEBSLICE_SIZE: z.string().min(1).default('CD74'),
  DEBSLICE_DIST: z.string().min(1).default('unstable'),
  DEBSLICE_SECTION: z.string().min(1).default('main,contrib,non-free'),
  DEBSLICE_ARCH: z.string().min(1).default('i386'),
  DEBSLICE_DIRPREFIX: z.string().default('Debian'),
  DEBSLICE_DIRSRCPREFIX: z.string().default('Debian-Src'),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

export interface SplitDefaults {
  size: string;
  dist: string;
  section: string;
  arch: string;
  dirprefix: string;
  dirsrcprefix: string;
}

export const config = {
  nodeEnv: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,

  defaults: {
    size: env.DEBSLICE_SIZE,
    dist: env.DEBSLICE_DIST,
    section: env.DEBSLICE_SECTION,
    arch: env.DEBSLICE_ARCH,
    dirprefix: env.DEBSLICE_DIRPREFIX,
    dirsrcprefix: env.DEBSLICE_DIRSRCPREFIX,
  } satisfies SplitDefaults,
} as const;

// Runtime configuration from environment variables

import { z } from 'zod';
import { PROTOTYPE_EXTENSIONS, formatFieldPath } from '@protoforge/protocol';
import { ConfigError } from '../errors.js';
import { LOG_LEVELS, type LogLevel } from '../logging/index.js';

export type ProtoforgeConfig = {
  /** Directory documents and assets are read from; asset paths are relative to it */
  assetRoot: string;
  /** Directory below the asset root holding prototype documents */
  prototypeDir: string;
  logLevel: LogLevel;
  /** Recognised document extensions */
  extensions: string[];
};

const ExtensionListSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((ext) => ext.trim().toLowerCase())
      .filter((ext) => ext !== '')
  )
  .pipe(
    z
      .array(z.string().startsWith('.', { message: 'Extensions must start with "."' }))
      .min(1, { message: 'At least one extension is required' })
  );

const EnvSchema = z.object({
  PROTOFORGE_ASSET_ROOT: z.string().min(1).default('assets'),
  PROTOFORGE_PROTOTYPE_DIR: z.string().min(1).default('prototypes'),
  PROTOFORGE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  PROTOFORGE_EXTENSIONS: ExtensionListSchema.optional(),
});

/**
 * Read configuration from the environment.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ProtoforgeConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${formatFieldPath(issue.path)}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    assetRoot: parsed.PROTOFORGE_ASSET_ROOT,
    prototypeDir: parsed.PROTOFORGE_PROTOTYPE_DIR,
    logLevel: parsed.PROTOFORGE_LOG_LEVEL,
    extensions: parsed.PROTOFORGE_EXTENSIONS ?? [...PROTOTYPE_EXTENSIONS],
  };
}

import { z } from 'zod';
import { ConfigError } from '../core/errors.js';

const nonEmpty = z.string().min(1);

export const ConfigSchema = z.object({
  /** Directory commands run in; relative spec paths and revisions resolve against it */
  projectRoot: nonEmpty,
  nixCommand: nonEmpty,
  nixBuildCommand: nonEmpty,
  nixInstantiateCommand: nonEmpty,
  nixStoreCommand: nonEmpty,
  gitCommand: nonEmpty,
  hyperfineCommand: nonEmpty,
  /** Passed as --extra-experimental-features to `nix`; empty string omits the flag */
  experimentalFeatures: z.string(),
  /** Derivations realised per nix-store invocation, keeps argv under the OS limit */
  realiseBatchSize: z.number().int().positive(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

export type Config = z.infer<typeof ConfigSchema>;

const defaultConfig: Config = {
  projectRoot: process.cwd(),
  nixCommand: 'nix',
  nixBuildCommand: 'nix-build',
  nixInstantiateCommand: 'nix-instantiate',
  nixStoreCommand: 'nix-store',
  gitCommand: 'git',
  hyperfineCommand: 'hyperfine',
  experimentalFeatures: 'nix-command flakes',
  realiseBatchSize: 100,
  logLevel: 'info',
};

const ENV_STRINGS = {
  PROJECT_ROOT: 'projectRoot',
  NIX_CMD: 'nixCommand',
  NIX_BUILD_CMD: 'nixBuildCommand',
  NIX_INSTANTIATE_CMD: 'nixInstantiateCommand',
  NIX_STORE_CMD: 'nixStoreCommand',
  GIT_CMD: 'gitCommand',
  HYPERFINE_CMD: 'hyperfineCommand',
} as const;

export function loadConfig(overrides: Partial<Config> = {}): Config {
  const envConfig: Record<string, unknown> = {};

  for (const [variable, key] of Object.entries(ENV_STRINGS)) {
    const value = process.env[variable];
    if (value) {
      envConfig[key] = value;
    }
  }
  if (process.env.NIX_EXPERIMENTAL_FEATURES !== undefined) {
    envConfig.experimentalFeatures = process.env.NIX_EXPERIMENTAL_FEATURES;
  }
  if (process.env.REALISE_BATCH_SIZE) {
    envConfig.realiseBatchSize = Number(process.env.REALISE_BATCH_SIZE);
  }
  if (process.env.LOG_LEVEL) {
    envConfig.logLevel = process.env.LOG_LEVEL;
  }

  const result = ConfigSchema.safeParse({
    ...defaultConfig,
    ...envConfig,
    ...overrides,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`, result.error);
  }

  return result.data;
}

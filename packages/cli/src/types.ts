export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
};

/**
 * Process surroundings the commands read. Defaults to the real process; tests
 * point it at a temporary directory.
 */
export interface CliContext {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Where `~/.logkb/config.yaml` is looked up */
  homeDir?: string;
}

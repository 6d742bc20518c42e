/**
 * Config Module
 *
 * Provides:
 * - YAML and JSON config file parsing
 * - Action input (INPUT_*) reading
 * - Zod-validated, frozen invocation context
 */

export {
  ConfigParser,
  createConfigParser,
  loadContext,
  normalizeFolder,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  MODES,
  ModeSchema,
  PilotConfigSchema,
  PilotConfigFileSchema,
  type EnvSource,
  type GitHubContext,
  type InvocationContext,
  type LoadContextOptions,
  type Mode,
  type PilotConfig,
  type PilotConfigFile,
  type Toggles,
} from './parser.js';

/**
 * Configuration Parser
 *
 * Builds the invocation context from three layers, lowest first:
 * built-in defaults, an optional .iac-pilot.yml (or .json) file, and the
 * action inputs (INPUT_* environment variables). The result is validated
 * with Zod and frozen; it is passed explicitly to every component.
 */

import { access, readFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z, ZodError } from 'zod';
import { ConfigurationError, formatZodIssues } from '../errors/index.js';

// ============================================================================
// Schemas
// ============================================================================

export const MODES = ['pr', 'merge', 'rollup'] as const;
export const ModeSchema = z.enum(MODES);

function coerceBoolean(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off', ''].includes(normalized)) return false;
  return value;
}

function coerceNumber(value: unknown): unknown {
  if (typeof value !== 'string' || value.trim() === '') return value;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
}

const Toggle = z.preprocess(coerceBoolean, z.boolean());
const Seconds = z.preprocess(coerceNumber, z.number().int().positive());

export const PilotConfigSchema = z.object({
  mode: ModeSchema,
  working_dir: z.string().min(1),
  terraform_version: z.string().min(1),
  terraform_apply: Toggle,
  lint_enabled: Toggle,
  lint_delete_on_clean: Toggle,
  create_plan_comment: Toggle,
  infracost_enabled: Toggle,
  cost_comment_title: z.string().min(1),
  currency: z.string().regex(/^[A-Z]{3}$/, 'must be a 3-letter ISO 4217 code'),
  infracost_silent_skip: Toggle,
  slack_error_notifications: Toggle,
  rollup_success_slack: Toggle,
  rollup_input_dir: z.string().min(1),
  artifact_dir: z.string().min(1),
  baseline_dir: z.string().optional(),
  slack_channel: z.string().optional(),
  pr_comment_marker: z.string().optional(),
  tool_timeout_seconds: Seconds,
});

/** File layer: every key optional, secrets not allowed */
export const PilotConfigFileSchema = PilotConfigSchema.partial().strict();

// ============================================================================
// Types
// ============================================================================

export type Mode = z.infer<typeof ModeSchema>;
export type PilotConfig = z.infer<typeof PilotConfigSchema>;
export type PilotConfigFile = z.infer<typeof PilotConfigFileSchema>;
export type EnvSource = Record<string, string | undefined>;

export interface Toggles {
  lint: boolean;
  planComment: boolean;
  cost: boolean;
  apply: boolean;
  silentSkipOnZeroDelta: boolean;
  lintDeleteOnClean: boolean;
  slackOnError: boolean;
  slackOnRollupSuccess: boolean;
}

export interface GitHubContext {
  token?: string;
  owner: string;
  repo: string;
  apiUrl: string;
  serverUrl: string;
  eventName: string;
  eventPath?: string;
  runId: string;
  workflow: string;
}

export interface InvocationContext {
  readonly mode: Mode;
  readonly workingDir: string;
  /** Folder label used in markers, artifacts and comments */
  readonly folder: string;
  readonly rollupInputDir: string;
  readonly artifactDir: string;
  readonly baselineDir?: string;
  readonly terraformVersion: string;
  readonly toggles: Readonly<Toggles>;
  readonly currency: string;
  readonly costCommentTitle: string;
  readonly prCommentMarker?: string;
  readonly toolTimeoutMs: number;
  readonly actor: string;
  readonly runId: string;
  readonly commitSha: string;
  readonly github: Readonly<GitHubContext>;
  readonly slack: Readonly<{ channel?: string; botToken?: string }>;
}

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_CONFIG: Omit<PilotConfig, 'mode'> = {
  working_dir: '.',
  terraform_version: 'latest',
  terraform_apply: false,
  lint_enabled: true,
  lint_delete_on_clean: false,
  create_plan_comment: true,
  infracost_enabled: false,
  cost_comment_title: 'Infracost cost estimate',
  currency: 'USD',
  infracost_silent_skip: false,
  slack_error_notifications: false,
  rollup_success_slack: false,
  rollup_input_dir: './cost-artifacts',
  artifact_dir: './.iac-pilot',
  tool_timeout_seconds: 1800,
};

export const DEFAULT_CONFIG_FILE = '.iac-pilot.yml';

const CONFIG_KEYS = PilotConfigSchema.keyof().options;

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse the file layer
   */
  async loadFile(path: string): Promise<PilotConfigFile> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read config file ${path}`, { cause: error });
    }
    return this.parse(content, path);
  }

  /**
   * Parse file content (JSON when the name ends in .json, YAML otherwise)
   */
  parse(content: string, filename: string = 'config'): PilotConfigFile {
    let parsed: unknown;
    try {
      parsed = filename.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      throw new ConfigurationError(`Cannot parse ${filename}`, { cause: error });
    }

    const result = PilotConfigFileSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw new ConfigurationError(`Invalid config in ${filename}: ${formatZodIssues(result.error)}`);
    }
    return result.data;
  }

  /**
   * Action inputs: INPUT_<NAME> as GitHub sets them, or plain <NAME>
   */
  readInputs(env: EnvSource): Record<string, string> {
    const inputs: Record<string, string> = {};
    for (const key of CONFIG_KEYS) {
      const value = readInput(env, key);
      if (value !== undefined) inputs[key] = value;
    }
    return inputs;
  }

  /**
   * defaults < file < inputs, validated
   */
  merge(file: PilotConfigFile, inputs: Record<string, string>): PilotConfig {
    const merged: Record<string, unknown> = { ...DEFAULT_CONFIG, ...file, ...inputs };

    const mode = merged.mode;
    if (mode === undefined) {
      throw new ConfigurationError(`mode is required (one of: ${MODES.join(', ')})`);
    }
    if (typeof mode !== 'string' || !ModeSchema.safeParse(mode.trim().toLowerCase()).success) {
      throw new ConfigurationError(`Unknown mode "${String(mode)}" (expected one of: ${MODES.join(', ')})`);
    }
    merged.mode = mode.trim().toLowerCase();

    try {
      return PilotConfigSchema.parse(merged);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ConfigurationError(`Invalid configuration: ${formatZodIssues(error)}`);
      }
      throw error;
    }
  }

  /**
   * Combine validated config with the GitHub run environment
   */
  buildContext(config: PilotConfig, env: EnvSource, cwd: string = process.cwd()): InvocationContext {
    const repository = env.GITHUB_REPOSITORY ?? '';
    const [owner = '', repo = ''] = repository.split('/', 2);
    const workingDir = absolute(cwd, config.working_dir);

    const context: InvocationContext = {
      mode: config.mode,
      workingDir,
      folder: normalizeFolder(config.working_dir),
      rollupInputDir: absolute(cwd, config.rollup_input_dir),
      artifactDir: absolute(cwd, config.artifact_dir),
      baselineDir: config.baseline_dir ? absolute(cwd, config.baseline_dir) : undefined,
      terraformVersion: config.terraform_version,
      toggles: {
        lint: config.lint_enabled,
        planComment: config.create_plan_comment,
        cost: config.infracost_enabled,
        apply: config.terraform_apply,
        silentSkipOnZeroDelta: config.infracost_silent_skip,
        lintDeleteOnClean: config.lint_delete_on_clean,
        slackOnError: config.slack_error_notifications,
        slackOnRollupSuccess: config.rollup_success_slack,
      },
      currency: config.currency,
      costCommentTitle: config.cost_comment_title,
      prCommentMarker: config.pr_comment_marker,
      toolTimeoutMs: config.tool_timeout_seconds * 1000,
      actor: env.GITHUB_ACTOR ?? '',
      runId: env.GITHUB_RUN_ID ?? '',
      commitSha: env.GITHUB_SHA ?? '',
      github: {
        token: readInput(env, 'github_token'),
        owner: env.GITHUB_REPOSITORY_OWNER ?? owner,
        repo,
        apiUrl: env.GITHUB_API_URL ?? 'https://api.github.com',
        serverUrl: env.GITHUB_SERVER_URL ?? 'https://github.com',
        eventName: env.GITHUB_EVENT_NAME ?? '',
        eventPath: env.GITHUB_EVENT_PATH || undefined,
        runId: env.GITHUB_RUN_ID ?? '',
        workflow: env.GITHUB_WORKFLOW ?? '',
      },
      slack: {
        channel: config.slack_channel,
        botToken: readInput(env, 'slack_bot_token'),
      },
    };

    return deepFreeze(context);
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# iac-pilot configuration
# Action inputs override anything set here.

working_dir: infra/prod
terraform_version: 1.7.5

# pr mode
lint_enabled: true
create_plan_comment: true
infracost_enabled: true
cost_comment_title: "Monthly cost impact"
currency: USD
infracost_silent_skip: true

# merge mode
terraform_apply: false
slack_error_notifications: true
slack_channel: "#infra-alerts"

# rollup mode
rollup_input_dir: ./cost-artifacts
rollup_success_slack: true

artifact_dir: ./.iac-pilot
tool_timeout_seconds: 1800
`;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function readInput(env: EnvSource, name: string): string | undefined {
  const upper = name.toUpperCase();
  const value = env[`INPUT_${upper}`] ?? env[upper];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function absolute(cwd: string, path: string): string {
  return isAbsolute(path) ? path : resolve(cwd, path);
}

/**
 * "./infra/prod/" -> "infra/prod"; "" or "./" -> "."
 */
export function normalizeFolder(path: string): string {
  const cleaned = path.replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/\/+$/, '');
  return cleaned === '' ? '.' : cleaned;
}

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

export interface LoadContextOptions {
  cwd?: string;
  /** Explicit config file; otherwise CONFIG_FILE input or .iac-pilot.yml when present */
  configFile?: string;
}

/**
 * One-shot: file + env -> frozen invocation context
 *
 * @throws {ConfigurationError}
 */
export async function loadContext(env: EnvSource, options: LoadContextOptions = {}): Promise<InvocationContext> {
  const parser = new ConfigParser();
  const cwd = options.cwd ?? process.cwd();

  let file: PilotConfigFile = {};
  const explicit = options.configFile ?? readInput(env, 'config_file');
  if (explicit) {
    file = await parser.loadFile(absolute(cwd, explicit));
  } else if (await exists(resolve(cwd, DEFAULT_CONFIG_FILE))) {
    file = await parser.loadFile(resolve(cwd, DEFAULT_CONFIG_FILE));
  }

  const config = parser.merge(file, parser.readInputs(env));
  return parser.buildContext(config, env, cwd);
}

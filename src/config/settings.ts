/**
 * Client settings.
 *
 * Values come from `SLICEKIT_*` environment variables, then from an rc file
 * of `export KEY=VALUE` lines, then from defaults. The environment always
 * wins over the rc file.
 *
 * Usage:
 *   const settings = requireSettings(await loadSettings({ rcFile: '~/.slicekit/slicekit_rc' }));
 *   const keys = await loadSliceKeys(settings);
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SettingsError } from '../domain/errors';
import { SliceKeyPair } from '../domain/topology';
import { parseLogLevel } from '../logger';
import { BastionSettings, SliceKeySettings } from '../remote/channel';

export interface Settings {
  orchestratorHost: string;
  credmgrHost: string;
  projectId?: string;
  tokenLocation?: string;
  bastionHost: string;
  bastionPort: number;
  bastionUsername?: string;
  bastionKeyFile?: string;
  bastionKeyPassphrase?: string;
  slicePrivateKeyFile?: string;
  slicePublicKeyFile?: string;
  slicePrivateKeyPassphrase?: string;
  /** Level name as configured; see parseLogLevel. */
  logLevel: string;
  dataDir: string;
}

export interface SettingsValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface LoadSettingsOptions {
  /** Defaults to process.env. */
  env?: Record<string, string | undefined>;
  /**
   * rc file to read. When omitted, SLICEKIT_RC or ~/.slicekit/slicekit_rc is
   * read if it exists.
   */
  rcFile?: string;
}

export const ENV_PREFIX = 'SLICEKIT_';
export const DEFAULT_RC_FILE = path.join('~', '.slicekit', 'slicekit_rc');

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  orchestratorHost: 'orchestrator.testbed.example.net',
  credmgrHost: 'cm.testbed.example.net',
  bastionHost: 'bastion.testbed.example.net',
  bastionPort: 22,
  logLevel: 'INFO',
  dataDir: path.join(os.tmpdir(), 'slicekit'),
});

/** Setting keys, as written after the SLICEKIT_ prefix. */
const KEYS = {
  ORCHESTRATOR_HOST: 'orchestratorHost',
  CREDMGR_HOST: 'credmgrHost',
  PROJECT_ID: 'projectId',
  TOKEN_LOCATION: 'tokenLocation',
  BASTION_HOST: 'bastionHost',
  BASTION_PORT: 'bastionPort',
  BASTION_USERNAME: 'bastionUsername',
  BASTION_KEY_LOCATION: 'bastionKeyFile',
  BASTION_KEY_PASSPHRASE: 'bastionKeyPassphrase',
  SLICE_PRIVATE_KEY_FILE: 'slicePrivateKeyFile',
  SLICE_PUBLIC_KEY_FILE: 'slicePublicKeyFile',
  SLICE_PRIVATE_KEY_PASSPHRASE: 'slicePrivateKeyPassphrase',
  LOG_LEVEL: 'logLevel',
  DATA_DIR: 'dataDir',
} as const satisfies Record<string, keyof Settings>;

/**
 * Parse rc file text. Accepts `export KEY=VALUE` and `KEY=VALUE` lines,
 * `#` comments and single- or double-quoted values.
 */
export function parseRcFile(text: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) continue;
    const match = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)=(.*)$/.exec(line);
    if (!match) continue;
    values[match[1]] = unquote(match[2].trim());
  }
  return values;
}

/**
 * Combine rc-file values and environment values over the defaults.
 * Only SLICEKIT_* keys are considered; unknown ones are ignored.
 */
export function resolveSettings(
  rcValues: Record<string, string | undefined>,
  env: Record<string, string | undefined>,
): Settings {
  const settings: Settings = { ...DEFAULT_SETTINGS };
  for (const source of [rcValues, env]) {
    for (const [suffix, field] of Object.entries(KEYS)) {
      const value = source[`${ENV_PREFIX}${suffix}`];
      if (value === undefined || value === '') continue;
      assign(settings, field, value);
    }
  }
  return settings;
}

export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const env = options.env ?? process.env;
  const explicit = options.rcFile ?? env.SLICEKIT_RC;
  const rcFile = expandHome(explicit ?? DEFAULT_RC_FILE);

  let rcValues: Record<string, string> = {};
  try {
    rcValues = parseRcFile(await fs.readFile(rcFile, 'utf8'));
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    if (!missing || explicit !== undefined) {
      throw new SettingsError([`Cannot read rc file ${rcFile}: ${err instanceof Error ? err.message : String(err)}`]);
    }
  }

  const settings = resolveSettings(rcValues, env);
  settings.dataDir = expandHome(settings.dataDir);
  for (const field of ['tokenLocation', 'bastionKeyFile', 'slicePrivateKeyFile', 'slicePublicKeyFile'] as const) {
    const value = settings[field];
    if (value !== undefined) settings[field] = expandHome(value);
  }
  return settings;
}

/** Validate settings for consistency. */
export function validateSettings(settings: Settings): SettingsValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!settings.orchestratorHost) errors.push('orchestratorHost is required');
  if (!settings.bastionHost) errors.push('bastionHost is required');
  if (!Number.isInteger(settings.bastionPort) || settings.bastionPort < 1 || settings.bastionPort > 65535) {
    errors.push(`bastionPort must be an integer between 1 and 65535, got ${settings.bastionPort}`);
  }
  if (!settings.bastionUsername) errors.push(`${ENV_PREFIX}BASTION_USERNAME is required`);
  if (!settings.bastionKeyFile) errors.push(`${ENV_PREFIX}BASTION_KEY_LOCATION is required`);
  if (!settings.slicePrivateKeyFile) errors.push(`${ENV_PREFIX}SLICE_PRIVATE_KEY_FILE is required`);
  if (!settings.dataDir) errors.push('dataDir is required');
  if (parseLogLevel(settings.logLevel) === undefined) {
    errors.push(`Unknown log level "${settings.logLevel}"`);
  }

  if (!settings.projectId) {
    warnings.push(`${ENV_PREFIX}PROJECT_ID is not set; every submission must name its project`);
  }
  if (!settings.slicePublicKeyFile) {
    warnings.push(`${ENV_PREFIX}SLICE_PUBLIC_KEY_FILE is not set; slice keys must be passed explicitly`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

/** Settings checked for use, or a SettingsError listing every problem. */
export function requireSettings(settings: Settings): Settings {
  const result = validateSettings(settings);
  if (!result.valid) throw new SettingsError(result.errors);
  return settings;
}

export function bastionSettings(settings: Settings): BastionSettings {
  if (!settings.bastionUsername || !settings.bastionKeyFile) {
    throw new SettingsError(['Bastion username and key file must be configured']);
  }
  return {
    host: settings.bastionHost,
    port: settings.bastionPort,
    username: settings.bastionUsername,
    keyFile: settings.bastionKeyFile,
    passphrase: settings.bastionKeyPassphrase,
  };
}

export function sliceKeySettings(settings: Settings): SliceKeySettings {
  if (!settings.slicePrivateKeyFile) {
    throw new SettingsError([`${ENV_PREFIX}SLICE_PRIVATE_KEY_FILE is required`]);
  }
  return { privateKeyFile: settings.slicePrivateKeyFile, passphrase: settings.slicePrivateKeyPassphrase };
}

/** Read the slice key pair named by the settings. */
export async function loadSliceKeys(settings: Settings): Promise<SliceKeyPair> {
  const { privateKeyFile, passphrase } = sliceKeySettings(settings);
  const publicKeyFile = settings.slicePublicKeyFile ?? `${privateKeyFile}.pub`;
  let publicKey: string;
  try {
    publicKey = (await fs.readFile(publicKeyFile, 'utf8')).trim();
  } catch (err) {
    throw new SettingsError([
      `Cannot read slice public key ${publicKeyFile}: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
  if (publicKey === '') throw new SettingsError([`Slice public key ${publicKeyFile} is empty`]);
  return { publicKey, privateKeyFile, passphrase };
}

function assign(settings: Settings, field: (typeof KEYS)[keyof typeof KEYS], value: string): void {
  switch (field) {
    case 'bastionPort':
      settings.bastionPort = Number(value);
      return;
    default:
      settings[field] = value;
  }
}

function unquote(value: string): string {
  if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value[value.length - 1] === value[0]) {
    return value.slice(1, -1);
  }
  return value;
}

function expandHome(file: string): string {
  if (file === '~') return os.homedir();
  if (file.startsWith('~/') || file.startsWith(`~${path.sep}`)) return path.join(os.homedir(), file.slice(2));
  return file;
}

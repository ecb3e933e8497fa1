/**
 * Configuration loading.
 *
 * Sources, later wins: config file → environment → CLI flags. Allowed
 * directories are the union of the file's list and the positional arguments.
 * Relative paths in the config file are taken relative to the file itself;
 * relative paths from the command line or environment, to the working directory.
 *
 * @module config
 */

import fs from 'fs/promises';
import net from 'net';
import os from 'os';
import path from 'path';
import { z } from 'zod';

import { errorMessage, hasErrorCode } from './errors';
import { normalizeAddress, parseCidr } from './ipFilter';
import { PathValidator, expandHome } from './sandbox/pathValidator';

export const CONFIG_FILE_NAME = 'fsgate.config.json';
export const DEFAULT_HOST = 'localhost';
export const DEFAULT_PORT = 3002;
export const BACKUP_DIR_ENV = 'FSGATE_BACKUP_DIR';

const PortSchema = z.number().int().min(0).max(65535);

const NetworkFileSchema = z
  .object({
    enabled: z.boolean().optional(),
    host: z.string().min(1).optional(),
    port: PortSchema.optional(),
    allowedIPs: z.array(z.string()).default([]),
    allowedSubnets: z.array(z.string()).default([]),
  })
  .strict();

export const ConfigFileSchema = z
  .object({
    allowedDirectories: z.array(z.string().min(1)).default([]),
    backupDir: z.string().min(1).optional(),
    caseInsensitive: z.boolean().optional(),
    network: NetworkFileSchema.optional(),
  })
  .strict();

export type ConfigFile = z.output<typeof ConfigFileSchema>;

/** Flags as commander hands them over. */
export interface CliOptions {
  config?: string;
  backupDir?: string;
  caseInsensitive?: boolean;
  network?: boolean;
  host?: string;
  port?: number;
  allowIp?: string[];
  allowSubnet?: string[];
}

export interface NetworkConfig {
  enabled: boolean;
  host: string;
  port: number;
  allowedIPs: string[];
  allowedSubnets: string[];
}

export interface FsGateConfig {
  /** Absolute and deduplicated, spelled as configured; each is checked to be an existing directory. */
  allowedDirectories: string[];
  caseInsensitive: boolean;
  backupDir: string;
  network: NetworkConfig;
  /** Config file that was read, if any. */
  configPath: string | null;
}

export interface LoadConfigEnvironment {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  homeDir?: string;
  tmpDir?: string;
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

async function readConfigFile(configPath: string, required: boolean): Promise<ConfigFile | null> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    if (!required && hasErrorCode(error, 'ENOENT')) return null;
    throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(error)}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${configPath}: ${issues}`);
  }
  return parsed.data;
}

function validateAddresses(allowedIPs: readonly string[], allowedSubnets: readonly string[]): void {
  for (const ip of allowedIPs) {
    if (net.isIP(normalizeAddress(ip)) === 0) {
      throw new ConfigError(`Invalid allowed IP address: ${ip}`);
    }
  }
  for (const subnet of allowedSubnets) {
    try {
      parseCidr(subnet);
    } catch (error) {
      throw new ConfigError(errorMessage(error), { cause: error });
    }
  }
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

/**
 * Merge every configuration source into a validated {@link FsGateConfig}.
 *
 * @param directories - positional CLI arguments
 * @throws ConfigError on unreadable or invalid input, or when no usable directory remains
 */
export async function loadConfig(
  directories: readonly string[],
  cli: CliOptions,
  environment: LoadConfigEnvironment = {}
): Promise<FsGateConfig> {
  const cwd = environment.cwd ?? process.cwd();
  const env = environment.env ?? process.env;
  const platform = environment.platform ?? process.platform;
  const homeDir = environment.homeDir ?? os.homedir();
  const tmpDir = environment.tmpDir ?? os.tmpdir();

  const resolveFrom = (base: string, value: string): string => path.resolve(base, expandHome(value, () => homeDir));

  const configPath = cli.config ? resolveFrom(cwd, cli.config) : path.join(cwd, CONFIG_FILE_NAME);
  const file = await readConfigFile(configPath, cli.config !== undefined);
  const fileDir = path.dirname(configPath);

  const requested = [
    ...(file?.allowedDirectories ?? []).map((dir) => resolveFrom(fileDir, dir)),
    ...directories.map((dir) => resolveFrom(cwd, dir)),
  ];
  if (requested.length === 0) {
    throw new ConfigError('At least one allowed directory is required');
  }

  try {
    await PathValidator.create(requested, { homeDir: () => homeDir, cwd: () => cwd });
  } catch (error) {
    throw new ConfigError(errorMessage(error), { cause: error });
  }
  const allowedDirectories = unique(requested);

  const envBackupDir = env[BACKUP_DIR_ENV];
  let backupDir: string;
  if (cli.backupDir) {
    backupDir = resolveFrom(cwd, cli.backupDir);
  } else if (envBackupDir) {
    backupDir = resolveFrom(cwd, envBackupDir);
  } else if (file?.backupDir) {
    backupDir = resolveFrom(fileDir, file.backupDir);
  } else {
    backupDir = path.join(tmpDir, 'fsgate-backups');
  }

  const port = cli.port ?? file?.network?.port ?? DEFAULT_PORT;
  if (!PortSchema.safeParse(port).success) {
    throw new ConfigError(`Invalid port: ${port}`);
  }

  const allowedIPs = unique([...(file?.network?.allowedIPs ?? []), ...(cli.allowIp ?? [])]);
  const allowedSubnets = unique([...(file?.network?.allowedSubnets ?? []), ...(cli.allowSubnet ?? [])]);
  validateAddresses(allowedIPs, allowedSubnets);

  return {
    allowedDirectories,
    caseInsensitive: cli.caseInsensitive ?? file?.caseInsensitive ?? platform === 'win32',
    backupDir,
    network: {
      enabled: cli.network ?? file?.network?.enabled ?? false,
      host: cli.host ?? file?.network?.host ?? DEFAULT_HOST,
      port,
      allowedIPs,
      allowedSubnets,
    },
    configPath: file ? configPath : null,
  };
}

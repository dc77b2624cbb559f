import fs from 'node:fs';
import ini from 'ini';
import {
  DEFAULT_DESCRIPTION,
  DEFAULT_MAX_PLAYERS,
  DEFAULT_PORT,
  DEFAULT_UDP_ANNOUNCE_PORT,
  MAX_PLAYERS_CAP,
  parseDifficulty,
  parseLogLevel,
  type Difficulty,
  type LogLevel,
  type Logger
} from '@stalked/shared';
import { ConfigError, describeError } from './errors';
import { getLocalIPv4 } from './net/localAddress';

export const DEFAULT_CONFIG_PATH = 'serverconfig.ini';
export const DEFAULT_TOKEN_PATH = 'TOKEN';

export interface ServerConfig {
  host: string;
  port: number;
  maxPlayers: number; // 0 = unlimited
  description: string;
  difficulty: Difficulty;
  webPort: number; // 0 = off
  udp: boolean;
  udpPort: number;
  logLevel: LogLevel;
  configPath: string;
  tokenPath: string;
}

type Argv = readonly string[];
type Env = Readonly<Record<string, string | undefined>>;
type IniSection = Record<string, unknown>;

export function getArg(argv: Argv, name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx >= 0 && idx + 1 < argv.length) return argv[idx + 1];
  return undefined;
}

export function hasFlag(argv: Argv, name: string): boolean {
  return argv.includes(name);
}

function isSection(v: unknown): v is IniSection {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function iniValue(section: IniSection, key: string): string | undefined {
  const v = section[key];
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  return undefined;
}

function parsePort(value: string, label: string, allowZero = false): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < (allowZero ? 0 : 1) || n > 65535) {
    throw new ConfigError(`Invalid ${label} '${value}'`);
  }
  return n;
}

function parseMaxPlayers(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new ConfigError(`Invalid max players '${value}'`);
  return Math.max(0, Math.min(MAX_PLAYERS_CAP, Math.trunc(n)));
}

export function defaultIniContents(): string {
  return ini.stringify(
    {
      Server: {
        Description: DEFAULT_DESCRIPTION,
        MaxPlayers: String(DEFAULT_MAX_PLAYERS),
        Difficulty: 'MEDIUM',
        Port: String(DEFAULT_PORT)
      }
    },
    { whitespace: true }
  );
}

/** Reads the [Server] section, writing a default file first when none exists. */
export function readIniSection(configPath: string, log: Logger): IniSection {
  if (!fs.existsSync(configPath)) {
    log.info(`Creating default ${configPath}...`);
    try {
      fs.writeFileSync(configPath, defaultIniContents(), 'utf8');
      log.info(`Note: Set MaxPlayers to 0 in ${configPath} for unlimited players (requires partnership TOKEN file)`);
    } catch (err) {
      log.warn(`Could not write ${configPath}: ${describeError(err)}`);
      return {};
    }
  }

  try {
    const parsed: Record<string, unknown> = ini.parse(fs.readFileSync(configPath, 'utf8'));
    const section = parsed.Server;
    return isSection(section) ? section : {};
  } catch (err) {
    log.warn(`Error loading server config: ${describeError(err)}`);
    return {};
  }
}

/** CLI flags win over env, env over the ini file, the ini file over defaults. */
export function loadConfig(argv: Argv, env: Env, log: Logger): ServerConfig {
  const configPath = getArg(argv, '--config') ?? env.STALKED_CONFIG ?? DEFAULT_CONFIG_PATH;
  const file = readIniSection(configPath, log);

  const pick = (flag: string, envKey: string, iniKey?: string): string | undefined =>
    getArg(argv, flag) ?? env[envKey] ?? (iniKey ? iniValue(file, iniKey) : undefined);

  const port = pick('--port', 'STALKED_PORT', 'Port');
  const maxPlayers = pick('--max-players', 'STALKED_MAX_PLAYERS', 'MaxPlayers');
  const webPort = pick('--web-port', 'STALKED_WEB_PORT', 'WebPort');
  const udpPort = pick('--udp-port', 'STALKED_UDP_PORT', 'UdpPort');

  return {
    host: pick('--host', 'STALKED_HOST', 'Host') ?? getLocalIPv4(),
    port: port === undefined ? DEFAULT_PORT : parsePort(port, 'port'),
    maxPlayers: maxPlayers === undefined ? DEFAULT_MAX_PLAYERS : parseMaxPlayers(maxPlayers),
    description: pick('--description', 'STALKED_DESCRIPTION', 'Description') ?? DEFAULT_DESCRIPTION,
    // Unknown names fall back to MEDIUM.
    difficulty: parseDifficulty(pick('--difficulty', 'STALKED_DIFFICULTY', 'Difficulty')),
    webPort: webPort === undefined ? 0 : parsePort(webPort, 'web port', true),
    udp: !hasFlag(argv, '--no-udp'),
    udpPort: udpPort === undefined ? DEFAULT_UDP_ANNOUNCE_PORT : parsePort(udpPort, 'udp port'),
    logLevel: parseLogLevel(pick('--log', 'LOG_LEVEL', 'LogLevel')),
    configPath,
    tokenPath: getArg(argv, '--token') ?? env.STALKED_TOKEN_FILE ?? DEFAULT_TOKEN_PATH
  };
}

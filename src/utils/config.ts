import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { LogLevel, type StackOptions } from '../types';
import { DEFAULT_TIMEOUT_MS } from '../state/state-owner';
import { fromZodError } from './validators';

const CONFIG_FILE_NAMES = [
  'pstack.config.yaml',
  'pstack.config.yml',
  'pstack.config.json',
  '.pstackrc',
];

export interface LogConfig {
  level: LogLevel;
  /** Also write JSON logs under `.pstack/logs` of the config directory. */
  file: boolean;
}

export interface PstackConfig {
  stack: StackOptions;
  log: LogConfig;
}

const DEFAULT_STACK_OPTIONS: StackOptions = {
  timeoutMs: DEFAULT_TIMEOUT_MS,
  restoreCwdAfterRoot: false,
};

const DEFAULT_LOG_CONFIG: LogConfig = {
  level: LogLevel.INFO,
  file: false,
};

const ConfigFileSchema = z.object({
  stack: z.object({
    timeoutMs: z.number().int().positive().optional(),
    restoreCwdAfterRoot: z.boolean().optional(),
  }).optional(),
  log: z.object({
    level: z.nativeEnum(LogLevel).optional(),
    file: z.boolean().optional(),
  }).optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function findConfigFile(dir: string): string | undefined {
  return CONFIG_FILE_NAMES
    .map((fileName) => path.join(dir, fileName))
    .find((filePath) => fs.existsSync(filePath));
}

export function loadConfig(dir: string): PstackConfig {
  const filePath = findConfigFile(dir);
  if (!filePath) {
    return getDefaultConfig();
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed: unknown = filePath.endsWith('.json')
    ? JSON.parse(content)
    : yaml.parse(content);

  // An empty YAML file parses to null.
  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw fromZodError(result.error, path.basename(filePath))[0];
  }
  return mergeWithDefaults(result.data);
}

export function getDefaultConfig(): PstackConfig {
  return {
    stack: { ...DEFAULT_STACK_OPTIONS },
    log: { ...DEFAULT_LOG_CONFIG },
  };
}

function mergeWithDefaults(partial: ConfigFile): PstackConfig {
  return {
    stack: {
      timeoutMs: partial.stack?.timeoutMs ?? DEFAULT_STACK_OPTIONS.timeoutMs,
      restoreCwdAfterRoot: partial.stack?.restoreCwdAfterRoot ?? DEFAULT_STACK_OPTIONS.restoreCwdAfterRoot,
    },
    log: {
      level: partial.log?.level ?? DEFAULT_LOG_CONFIG.level,
      file: partial.log?.file ?? DEFAULT_LOG_CONFIG.file,
    },
  };
}

export function saveConfig(dir: string, config: PstackConfig): string {
  const filePath = path.join(dir, 'pstack.config.yaml');
  fs.writeFileSync(filePath, yaml.stringify(config), 'utf-8');
  return filePath;
}

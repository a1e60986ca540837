import { homedir } from "os";
import { join, resolve } from "path";
import { constants, existsSync } from "fs";
import { access, readFile, stat } from "fs/promises";
import { z } from "zod";
import { ConfigError, DEFAULT_CONFIG, type Config } from "@mdlive/core";

const CONFIG_DIR = join(homedir(), ".mdlive");
const CONFIG_PATH = join(CONFIG_DIR, "config.json");

const fileSchema = z
  .object({
    notes: z
      .object({
        root: z.string().min(1),
        ignore: z.array(z.string()),
      })
      .strict()
      .partial(),
    watch: z
      .object({
        enabled: z.boolean(),
        debounceMs: z.number().int().min(0),
        retryAttempts: z.number().int().min(0),
        retryDelayMs: z.number().int().min(0),
      })
      .strict()
      .partial(),
    search: z.object({ maxResults: z.number().int().positive() }).strict().partial(),
    server: z
      .object({
        port: z.number().int().min(1).max(65535),
        host: z.string().min(1),
      })
      .strict()
      .partial(),
  })
  .strict()
  .partial();

export type ConfigFile = z.infer<typeof fileSchema>;

export interface CliOverrides {
  notesDir?: string;
  port?: number;
  debounceMs?: number;
  watch?: boolean;
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}

export function defaultNotesDir(): string {
  return join(homedir(), "src", "Notes");
}

export function parseConfigFile(raw: string, source = CONFIG_PATH): ConfigFile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`${source} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = fileSchema.safeParse(json);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration in ${source}:\n${problems.join("\n")}`);
  }
  return parsed.data;
}

function envNumber(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value === "") return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return n;
}

/** Merges defaults, the config file, environment and CLI flags, later winning. */
export function mergeConfig(file: ConfigFile, overrides: CliOverrides = {}): Config {
  const root =
    overrides.notesDir ?? (process.env.MDLIVE_ROOT || undefined) ?? file.notes?.root ?? defaultNotesDir();

  return {
    notes: {
      ...DEFAULT_CONFIG.notes,
      ...file.notes,
      root: resolve(root),
    },
    watch: {
      ...DEFAULT_CONFIG.watch,
      ...file.watch,
      ...(overrides.watch === false ? { enabled: false } : {}),
      debounceMs:
        overrides.debounceMs ?? envNumber("MDLIVE_DEBOUNCE_MS") ?? file.watch?.debounceMs ?? DEFAULT_CONFIG.watch.debounceMs,
    },
    search: { ...DEFAULT_CONFIG.search, ...file.search },
    server: {
      ...DEFAULT_CONFIG.server,
      ...file.server,
      port: overrides.port ?? envNumber("MDLIVE_PORT") ?? file.server?.port ?? DEFAULT_CONFIG.server.port,
    },
  };
}

export async function loadConfig(overrides: CliOverrides = {}): Promise<Config> {
  const file = existsSync(CONFIG_PATH) ? parseConfigFile(await readFile(CONFIG_PATH, "utf8")) : {};
  return mergeConfig(file, overrides);
}

/** The notes root has to exist and be readable before anything starts. */
export async function assertNotesRoot(root: string): Promise<void> {
  let isDir: boolean;
  try {
    isDir = (await stat(root)).isDirectory();
  } catch (e) {
    throw new ConfigError(`Notes directory ${root} does not exist: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isDir) {
    throw new ConfigError(`Notes directory ${root} is not a directory`);
  }
  try {
    await access(root, constants.R_OK | constants.X_OK);
  } catch (e) {
    throw new ConfigError(`Notes directory ${root} is not readable: ${e instanceof Error ? e.message : String(e)}`);
  }
}

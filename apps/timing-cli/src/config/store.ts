import fs from "fs/promises";
import os from "os";
import path from "path";

export type CliDefaults = {
  fCpu?: number;
  headerName?: string;
};

type Env = Record<string, string | undefined>;

const CONFIG_FILE = "config.json";
const APP_DIR = "can-timing";

export const resolveConfigDir = (env: Env = process.env) => {
  const override = env.CAN_TIMING_CONFIG_DIR;
  if (override) {
    return override;
  }

  if (process.platform === "win32") {
    const appData = env.APPDATA;
    if (appData) {
      return path.join(appData, APP_DIR);
    }
  }

  return path.join(os.homedir(), ".config", APP_DIR);
};

const getConfigPath = (env: Env) => path.join(resolveConfigDir(env), CONFIG_FILE);

const toDefaults = (raw: unknown): CliDefaults => {
  if (typeof raw !== "object" || raw === null) {
    return {};
  }
  const record: Record<string, unknown> = { ...raw };
  const defaults: CliDefaults = {};
  if (typeof record.fCpu === "number") {
    defaults.fCpu = record.fCpu;
  }
  if (typeof record.headerName === "string") {
    defaults.headerName = record.headerName;
  }
  return defaults;
};

export const loadDefaults = async (env: Env = process.env): Promise<CliDefaults> => {
  const filePath = getConfigPath(env);
  try {
    const raw = await fs.readFile(filePath, "utf8");
    return toDefaults(JSON.parse(raw));
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === "ENOENT") {
      return {};
    }
    throw error;
  }
};

export const saveDefaults = async (defaults: CliDefaults, env: Env = process.env) => {
  const dir = resolveConfigDir(env);
  await fs.mkdir(dir, { recursive: true });
  const filePath = getConfigPath(env);
  await fs.writeFile(filePath, JSON.stringify(defaults, null, 2), "utf8");
  return filePath;
};

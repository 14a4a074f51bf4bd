import * as fs from "node:fs";
import * as path from "node:path";
import { ConfigError } from "./errors";
import { isValidDateString } from "./shealth/epochDays";
import { PERSONAL_STEPS_TO_KM_COEFFS, parseCoeffs, type QuadraticCoeffs } from "./shealth/stepsToKm";
import type { Cluster } from "./shealth/types";

const DEFAULT_ROOT_DIR = path.resolve(process.cwd(), "Samsung-Data");
const DEFAULT_CLUSTERS_FILE = path.resolve(process.cwd(), "config/clusters.json");
const DEFAULT_PORT = 5000;

export const DEFAULT_USER_ID = "local_default";

export interface ShealthConfig {
  rootDir: string;
  zipDir: string;
  rawDir: string;
  clusters: Cluster[];
  calStart?: string;
  calEnd?: string;
  stepsToKmCoeffs: QuadraticCoeffs;
  userId: string;
}

export interface ServiceConfig {
  port: number;
  apiKey: string | undefined;
  databaseUrl: string | undefined;
  shealth: ShealthConfig;
}

type Env = Record<string, string | undefined>;

export function shealthDirs(rootDir: string): Pick<ShealthConfig, "rootDir" | "zipDir" | "rawDir"> {
  const root = path.resolve(rootDir);
  return { rootDir: root, zipDir: path.join(root, "ZIP_FILES"), rawDir: path.join(root, "RAW_DATA") };
}

export function parseClusters(input: unknown, origin = "clusters"): Cluster[] {
  if (!Array.isArray(input)) {
    throw new ConfigError(`${origin}: expected an array of clusters`);
  }
  return input.map((item: unknown, i) => {
    if (typeof item !== "object" || item === null) {
      throw new ConfigError(`${origin}[${i}]: expected an object`);
    }
    const startDate: unknown = "startDate" in item ? item.startDate : undefined;
    const stepSequence: unknown = "stepSequence" in item ? item.stepSequence : undefined;
    if (typeof startDate !== "string" || !isValidDateString(startDate)) {
      throw new ConfigError(`${origin}[${i}].startDate: invalid date "${String(startDate)}"`);
    }
    if (
      !Array.isArray(stepSequence) ||
      stepSequence.length === 0 ||
      !stepSequence.every((n: unknown) => typeof n === "number" && Number.isInteger(n) && n > 0)
    ) {
      throw new ConfigError(`${origin}[${i}].stepSequence: expected a non-empty list of positive integers`);
    }
    return { startDate, stepSequence: stepSequence.map(Number) };
  });
}

export function loadClustersFile(file: string): Cluster[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot read clusters file ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseClusters(raw, path.basename(file));
}

function optionalDate(env: Env, key: string): string | undefined {
  const v = env[key]?.trim();
  if (!v) return undefined;
  if (!isValidDateString(v)) throw new ConfigError(`${key}: invalid date "${v}"`);
  return v;
}

export function loadShealthConfig(env: Env = process.env): ShealthConfig {
  const rootDir = env.SHEALTH_ROOT_DIR?.trim() || DEFAULT_ROOT_DIR;
  const clustersEnv = env.SHEALTH_CLUSTERS_FILE?.trim();
  const clustersFile = clustersEnv ? path.resolve(clustersEnv) : DEFAULT_CLUSTERS_FILE;

  let stepsToKmCoeffs = PERSONAL_STEPS_TO_KM_COEFFS;
  const rawCoeffs = env.SHEALTH_STEPS_TO_KM_COEFFS?.trim();
  if (rawCoeffs) {
    const parsed = parseCoeffs(rawCoeffs);
    if (!parsed) throw new ConfigError(`SHEALTH_STEPS_TO_KM_COEFFS: expected "a,b,c", got "${rawCoeffs}"`);
    stepsToKmCoeffs = parsed;
  }

  const calStart = optionalDate(env, "SHEALTH_CAL_START");
  const calEnd = optionalDate(env, "SHEALTH_CAL_END");
  if (calStart && calEnd && calStart > calEnd) {
    throw new ConfigError(`SHEALTH_CAL_START ${calStart} is after SHEALTH_CAL_END ${calEnd}`);
  }

  return {
    ...shealthDirs(rootDir),
    clusters: loadClustersFile(clustersFile),
    calStart,
    calEnd,
    stepsToKmCoeffs,
    userId: env.SHEALTH_USER_ID?.trim() || DEFAULT_USER_ID,
  };
}

export function loadServiceConfig(env: Env = process.env): ServiceConfig {
  const port = Number(env.PORT || DEFAULT_PORT);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT: invalid port "${env.PORT}"`);
  }
  return {
    port,
    apiKey: env.API_KEY || undefined,
    databaseUrl: env.DATABASE_URL || undefined,
    shealth: loadShealthConfig(env),
  };
}

/**
 * Test environment configuration shared by the bootstrapper, which exports
 * it, and the integration suites, which read it back.
 */
import { z } from "zod";
import { DEFAULT_PORT } from "../client/core/constants";
import { LogLevel } from "../client/core/logger";

export interface TestEnvironment {
  database: string;
  hostname: string;
  username: string;
  password: string;
  debug: string;
}

export type TestEnvironmentKey = keyof TestEnvironment;

// export order
export const TEST_ENVIRONMENT_KEYS: readonly TestEnvironmentKey[] = [
  "database",
  "hostname",
  "username",
  "password",
  "debug",
];

export const TEST_ENV_VARIABLES = {
  database: "TSTDB",
  hostname: "TSTHOSTNAME",
  username: "TSTUSERNAME",
  password: "TSTPASSWORD",
  debug: "TSTDEBUG",
} as const satisfies Record<TestEnvironmentKey, string>;

export const DEFAULT_TEST_ENVIRONMENT: Readonly<TestEnvironment> = Object.freeze({
  database: "demo",
  hostname: "localhost",
  username: "monetdb",
  password: "monetdb",
  debug: "no",
});

const TRUTHY_FLAGS = ["yes", "true", "1", "on"];

export class TestEnvironmentError extends Error {
  constructor(readonly variables: string[]) {
    super(`Missing or empty test environment variables: ${variables.join(", ")}`);
    this.name = "TestEnvironmentError";
  }
}

/**
 * Variable name to value, in export order
 */
export function toEnvVariables(environment: TestEnvironment): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const key of TEST_ENVIRONMENT_KEYS) {
    variables[TEST_ENV_VARIABLES[key]] = environment[key];
  }
  return variables;
}

/**
 * Writes the five variables into `env`. Other variables are left alone.
 * Every value must be non-empty; nothing is written otherwise.
 */
export function applyTestEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  environment: TestEnvironment = DEFAULT_TEST_ENVIRONMENT,
): Record<string, string> {
  const empty = TEST_ENVIRONMENT_KEYS.filter((key) => environment[key] === "").map(
    (key) => TEST_ENV_VARIABLES[key],
  );
  if (empty.length > 0) {
    throw new TestEnvironmentError(empty);
  }

  const variables = toEnvVariables(environment);
  Object.assign(env, variables);
  return variables;
}

const requiredValue = z.string().min(1);

// an optional variable set to "" counts as unset
function emptyAsUnset(value: unknown): unknown {
  return value === "" ? undefined : value;
}

const settingsSchema = z.object({
  [TEST_ENV_VARIABLES.database]: requiredValue,
  [TEST_ENV_VARIABLES.hostname]: requiredValue,
  [TEST_ENV_VARIABLES.username]: requiredValue,
  [TEST_ENV_VARIABLES.password]: requiredValue,
  [TEST_ENV_VARIABLES.debug]: requiredValue,
  TSTPORT: z.preprocess(emptyAsUnset, z.coerce.number().int().positive().default(DEFAULT_PORT)),
  TSTPASSPHRASE: z.preprocess(emptyAsUnset, z.string().min(1).optional()),
});

export interface TestSettings extends TestEnvironment {
  port: number;
  /**
   * Daemon control passphrase, falls back to the password
   */
  passphrase: string;
}

/**
 * Reads the settings the integration suites connect with
 */
export function readTestSettings(env: NodeJS.ProcessEnv = process.env): TestSettings {
  const result = settingsSchema.safeParse(env);
  if (!result.success) {
    const variables = [...new Set(result.error.issues.map((issue) => String(issue.path[0])))];
    throw new TestEnvironmentError(variables);
  }

  const parsed = result.data;
  return {
    database: parsed.TSTDB,
    hostname: parsed.TSTHOSTNAME,
    username: parsed.TSTUSERNAME,
    password: parsed.TSTPASSWORD,
    debug: parsed.TSTDEBUG,
    port: parsed.TSTPORT,
    passphrase: parsed.TSTPASSPHRASE ?? parsed.TSTPASSWORD,
  };
}

export function isDebugEnabled(flag: string): boolean {
  return TRUTHY_FLAGS.includes(flag.trim().toLowerCase());
}

export function logLevelFor(flag: string): LogLevel {
  return isDebugEnabled(flag) ? LogLevel.DEBUG : LogLevel.INFO;
}

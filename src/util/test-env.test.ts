import { describe, expect, it } from "vitest";
import { LogLevel } from "../client/core/logger";
import {
  applyTestEnvironment,
  DEFAULT_TEST_ENVIRONMENT,
  isDebugEnabled,
  logLevelFor,
  readTestSettings,
  TestEnvironmentError,
  toEnvVariables,
} from "./test-env";

const EXPECTED_VARIABLES = {
  TSTDB: "demo",
  TSTHOSTNAME: "localhost",
  TSTUSERNAME: "monetdb",
  TSTPASSWORD: "monetdb",
  TSTDEBUG: "no",
};

describe("applyTestEnvironment", () => {
  it("exports the five defaults in table order", () => {
    const env: NodeJS.ProcessEnv = {};
    const exported = applyTestEnvironment(env);

    expect(exported).toEqual(EXPECTED_VARIABLES);
    expect(Object.keys(exported)).toEqual(["TSTDB", "TSTHOSTNAME", "TSTUSERNAME", "TSTPASSWORD", "TSTDEBUG"]);
    expect(Object.values(exported)).toEqual(["demo", "localhost", "monetdb", "monetdb", "no"]);
    expect(env).toEqual(EXPECTED_VARIABLES);
  });

  it("adds to the existing environment without touching other variables", () => {
    const env: NodeJS.ProcessEnv = { PATH: "/usr/bin", HOME: "/home/tester" };
    applyTestEnvironment(env);
    expect(env).toEqual({ PATH: "/usr/bin", HOME: "/home/tester", ...EXPECTED_VARIABLES });
  });

  it("overrides stale values of its own variables", () => {
    const env: NodeJS.ProcessEnv = { TSTDB: "other", TSTDEBUG: "yes" };
    applyTestEnvironment(env);
    expect(env).toEqual(EXPECTED_VARIABLES);
  });

  it("gives the same result when applied twice", () => {
    const env: NodeJS.ProcessEnv = { SHELL: "/bin/sh" };
    applyTestEnvironment(env);
    const first = { ...env };
    applyTestEnvironment(env);
    expect(env).toEqual(first);
    expect(Object.keys(env)).toHaveLength(6);
  });

  it("refuses empty values and writes nothing", () => {
    const env: NodeJS.ProcessEnv = {};
    expect(() => applyTestEnvironment(env, { ...DEFAULT_TEST_ENVIRONMENT, hostname: "", password: "" })).toThrow(
      new TestEnvironmentError(["TSTHOSTNAME", "TSTPASSWORD"]),
    );
    expect(env).toEqual({});
  });

  it("keeps the defaults frozen", () => {
    expect(Object.isFrozen(DEFAULT_TEST_ENVIRONMENT)).toBe(true);
  });
});

describe("toEnvVariables", () => {
  it("maps a custom configuration", () => {
    expect(
      toEnvVariables({ database: "db", hostname: "h", username: "u", password: "p", debug: "yes" }),
    ).toEqual({ TSTDB: "db", TSTHOSTNAME: "h", TSTUSERNAME: "u", TSTPASSWORD: "p", TSTDEBUG: "yes" });
  });
});

describe("readTestSettings", () => {
  it("reads what the bootstrapper exported", () => {
    const env: NodeJS.ProcessEnv = {};
    applyTestEnvironment(env);
    expect(readTestSettings(env)).toEqual({
      database: "demo",
      hostname: "localhost",
      username: "monetdb",
      password: "monetdb",
      debug: "no",
      port: 50000,
      passphrase: "monetdb",
    });
  });

  it("takes the optional port and passphrase", () => {
    const settings = readTestSettings({ ...EXPECTED_VARIABLES, TSTPORT: "50001", TSTPASSPHRASE: "test-secret" });
    expect(settings.port).toBe(50001);
    expect(settings.passphrase).toBe("test-secret");
  });

  it("falls back to the defaults when the optional variables are empty", () => {
    const settings = readTestSettings({ ...EXPECTED_VARIABLES, TSTPORT: "", TSTPASSPHRASE: "" });
    expect(settings.port).toBe(50000);
    expect(settings.passphrase).toBe("monetdb");
  });

  it("names every missing or empty variable", () => {
    expect(() => readTestSettings({ TSTDB: "demo", TSTHOSTNAME: "", TSTUSERNAME: "monetdb" })).toThrow(
      new TestEnvironmentError(["TSTHOSTNAME", "TSTPASSWORD", "TSTDEBUG"]),
    );
  });

  it("rejects a port that is not a number", () => {
    expect(() => readTestSettings({ ...EXPECTED_VARIABLES, TSTPORT: "fifty" })).toThrow(
      new TestEnvironmentError(["TSTPORT"]),
    );
  });
});

describe("debug flag", () => {
  it("treats yes, true, 1 and on as enabled", () => {
    expect(["yes", "TRUE", " 1 ", "on"].map(isDebugEnabled)).toEqual([true, true, true, true]);
    expect(["no", "", "0", "off"].map(isDebugEnabled)).toEqual([false, false, false, false]);
  });

  it("picks the suite log level", () => {
    expect(logLevelFor("yes")).toBe(LogLevel.DEBUG);
    expect(logLevelFor("no")).toBe(LogLevel.INFO);
  });
});

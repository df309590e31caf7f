import { MapiConnection, type ConnectParams } from "../client/core/connection";
import { Control } from "../client/core/control";
import { createLogger, type ILogger } from "../client/core/logger";
import { logLevelFor, readTestSettings, type TestSettings } from "../util/test-env";

export function loadSettings(): TestSettings {
  return readTestSettings(process.env);
}

export function suiteLogger(settings: TestSettings, contextName: string): ILogger {
  return createLogger({ contextName, logLevel: logLevelFor(settings.debug) });
}

export function sqlConnectParams(settings: TestSettings, overrides: Partial<ConnectParams> = {}): ConnectParams {
  return {
    hostname: settings.hostname,
    port: settings.port,
    username: settings.username,
    password: settings.password,
    database: settings.database,
    language: "sql",
    connectTimeoutMs: 10000,
    ...overrides,
  };
}

export async function openConnection(settings: TestSettings, logger: ILogger): Promise<MapiConnection> {
  const connection = new MapiConnection({ logger });
  await connection.connect(sqlConnectParams(settings));
  return connection;
}

export function openControl(settings: TestSettings, logger: ILogger): Promise<Control> {
  return Control.connect({
    hostname: settings.hostname,
    port: settings.port,
    passphrase: settings.passphrase,
    connectTimeoutMs: 10000,
    logger,
  });
}

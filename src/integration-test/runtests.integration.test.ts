/**
 * MAPI connection tests against the server named by TSTHOSTNAME/TSTDB
 */
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { MapiConnection } from "../client/core/connection";
import { DatabaseError, InterfaceError, OperationalError } from "../client/core/errors";
import { loadSettings, openConnection, sqlConnectParams, suiteLogger } from "./helpers";

const settings = loadSettings();
const logger = suiteLogger(settings, "runtests");

describe("MAPI connection", () => {
  let connection: MapiConnection;

  beforeAll(async () => {
    logger.info(`Connecting to ${settings.hostname}:${settings.port}/${settings.database}`);
    connection = await openConnection(settings, logger);
  });

  afterAll(async () => {
    await connection.disconnect();
  });

  it("runs a query and returns the raw result", async () => {
    const reply = await connection.query("SELECT 42");
    logger.debug(`reply: ${reply}`);
    expect(reply.startsWith("&1")).toBe(true);
    expect(reply).toContain("[ 42\t]");
  });

  it("maps a missing table to OperationalError", async () => {
    await expect(connection.query("SELECT * FROM no_such_table_for_tests")).rejects.toBeInstanceOf(
      OperationalError,
    );
  });

  it("keeps working after a failed statement", async () => {
    const reply = await connection.query("SELECT 1");
    expect(reply.startsWith("&1")).toBe(true);
  });

  it("refuses commands after disconnect", async () => {
    const other = await openConnection(settings, logger);
    await other.disconnect();
    expect(other.isConnected).toBe(false);
    await expect(other.query("SELECT 1")).rejects.toBeInstanceOf(InterfaceError);
  });

  it("can reconnect with the same instance", async () => {
    const other = await openConnection(settings, logger);
    await other.disconnect();
    await other.connect(sqlConnectParams(settings));
    expect((await other.query("SELECT 1")).startsWith("&1")).toBe(true);
    await other.disconnect();
  });

  it("rejects a wrong password", async () => {
    const other = new MapiConnection({ logger });
    await expect(
      other.connect(sqlConnectParams(settings, { password: `${settings.password}-wrong` })),
    ).rejects.toBeInstanceOf(DatabaseError);
    expect(other.isConnected).toBe(false);
  });
});

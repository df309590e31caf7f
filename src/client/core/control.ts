/**
 * Management of the databases served by a MonetDB daemon: create, start,
 * stop, lock, release, destroy, properties and status.
 */
import { type ConnectParams, MapiConnection } from "./connection";
import { config, DEFAULT_PORT, merovingianSocketPath } from "./constants";
import { OperationalError } from "./errors";
import { createLogger, type ILogger } from "./logger";
import { type DatabaseStatus, parseStatusLine } from "./status";

export interface ControlOptions {
  /**
   * Daemon host. Without one the daemon's unix socket is used.
   */
  hostname?: string;
  port?: number;
  /**
   * Control passphrase, required for TCP connections
   */
  passphrase?: string;
  unixSocket?: string;
  connectTimeoutMs?: number;
  logger?: ILogger;
}

const ALL_DATABASES = "#all";
const DEFAULTS = "#defaults";

/**
 * Throws unless the daemon answered with an empty reply
 */
export function isEmpty(result: string): true {
  if (result !== "") {
    throw new OperationalError(result);
  }
  return true;
}

/**
 * Parses `key=value` property lines, skipping comments
 */
export function parseProperties(raw: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const rawLine of raw.split("\n")) {
    const line = rawLine.startsWith("=") ? rawLine.slice(1) : rawLine;
    if (line.startsWith("#")) {
      continue;
    }
    const separator = line.indexOf("=");
    if (separator !== -1) {
      values[line.slice(0, separator)] = line.slice(separator + 1);
    }
  }
  return values;
}

export class Control {
  readonly hostname: string | undefined;
  readonly port: number;
  readonly unixSocket: string;
  private readonly passphrase: string | undefined;
  private readonly connectTimeoutMs: number | undefined;
  private readonly logger: ILogger;

  /**
   * Creates a Control and checks that the daemon accepts the credentials
   */
  static async connect(options: ControlOptions = {}): Promise<Control> {
    const control = new Control(options);
    const server = control.newConnection();
    await server.connect(control.connectParams());
    await server.disconnect();
    return control;
  }

  private constructor(options: ControlOptions) {
    this.port = options.port ?? DEFAULT_PORT;
    this.unixSocket = options.unixSocket ?? merovingianSocketPath(this.port);
    // no unix sockets on Windows
    this.hostname = options.hostname ?? (process.platform === "win32" ? "localhost" : undefined);
    this.passphrase = options.passphrase;
    this.connectTimeoutMs = options.connectTimeoutMs;
    this.logger = options.logger ?? createLogger({ contextName: "control" });
  }

  private newConnection(): MapiConnection {
    return new MapiConnection({ logger: this.logger.createChildLogger({ contextName: "mapi" }) });
  }

  private connectParams(): ConnectParams {
    return {
      hostname: this.hostname,
      port: this.port,
      username: config.control.username,
      password: this.passphrase,
      database: config.control.database,
      language: config.control.language,
      unixSocket: this.unixSocket,
      connectTimeoutMs: this.connectTimeoutMs,
    };
  }

  private async sendCommand(databaseName: string, command: string): Promise<string> {
    this.logger.debug(`${databaseName} ${command}`);
    // one connection per command, so commands may run concurrently
    const server = this.newConnection();
    await server.connect(this.connectParams());
    try {
      return await server.cmd(`${databaseName} ${command}\n`);
    } finally {
      await server.disconnect();
    }
  }

  /**
   * Initialises a new database. It starts out in maintenance mode (locked).
   */
  async create(databaseName: string): Promise<true> {
    return isEmpty(await this.sendCommand(databaseName, "create"));
  }

  /**
   * Removes the database with all its data and logs
   */
  async destroy(databaseName: string): Promise<true> {
    return isEmpty(await this.sendCommand(databaseName, "destroy"));
  }

  /**
   * Puts the database in maintenance mode: only the DBA may connect and it
   * is not started automatically
   */
  async lock(databaseName: string): Promise<true> {
    return isEmpty(await this.sendCommand(databaseName, "lock"));
  }

  /**
   * Brings the database back from maintenance mode
   */
  async release(databaseName: string): Promise<true> {
    return isEmpty(await this.sendCommand(databaseName, "release"));
  }

  status(databaseName: string): Promise<DatabaseStatus>;
  status(): Promise<DatabaseStatus[]>;
  async status(databaseName?: string): Promise<DatabaseStatus | DatabaseStatus[]> {
    if (databaseName) {
      return parseStatusLine(await this.sendCommand(databaseName, "status"));
    }
    const raw = await this.sendCommand(ALL_DATABASES, "status");
    return raw
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map(parseStatusLine);
  }

  async start(databaseName: string): Promise<true> {
    return isEmpty(await this.sendCommand(databaseName, "start"));
  }

  async stop(databaseName: string): Promise<true> {
    return isEmpty(await this.sendCommand(databaseName, "stop"));
  }

  /**
   * Kills the database process. Last resort, may lose data.
   */
  async kill(databaseName: string): Promise<true> {
    return isEmpty(await this.sendCommand(databaseName, "kill"));
  }

  async set(databaseName: string, property: string, value: string): Promise<true> {
    return isEmpty(await this.sendCommand(databaseName, `${property}=${value}`));
  }

  /**
   * All properties of the database
   */
  async get(databaseName: string): Promise<Record<string, string>> {
    return parseProperties(await this.sendCommand(databaseName, "get"));
  }

  /**
   * Unsets the property so the daemon default applies again
   */
  async inherit(databaseName: string, property: string): Promise<true> {
    return isEmpty(await this.sendCommand(databaseName, `${property}=`));
  }

  rename(oldName: string, newName: string): Promise<true> {
    return this.set(oldName, "name", newName);
  }

  defaults(): Promise<Record<string, string>> {
    return this.get(DEFAULTS);
  }

  neighbours(): Promise<string> {
    return this.sendCommand("anelosimus", "eximius");
  }
}

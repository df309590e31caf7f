/**
 * MAPI connection: one socket to a MonetDB server or to the daemon,
 * speaking the block protocol with challenge-response login.
 */
import { connect as netConnect, type Socket } from "net";
import { buildChallengeResponse, parseChallenge } from "./auth";
import { BlockDecoder, serializeMessage } from "./blocks";
import {
  config,
  MAX_REDIRECTS,
  Message,
  monetdbSocketPath,
  REDIRECT_PREFIX,
} from "./constants";
import { errorFromServer, InterfaceError, OperationalError, ProgrammingError } from "./errors";
import { createLogger, type ILogger } from "./logger";

export type Language = "sql" | "mal" | "control";

export interface ConnectParams {
  /**
   * Connect over TCP when set, over a unix socket otherwise
   */
  hostname?: string;
  port: number;
  username: string;
  password?: string;
  database: string;
  language: Language;
  /**
   * Unix socket path, defaults to /tmp/.s.monetdb.<port>
   */
  unixSocket?: string;
  connectTimeoutMs?: number;
}

export interface MapiConnectionOptions {
  logger?: ILogger;
}

interface PendingRead {
  resolve: (message: string) => void;
  reject: (error: Error) => void;
}

const MONETDB_REDIRECT = /^\^mapi:monetdb:\/\/([^:/\s]+):(\d+)\/([^?\s]+)/;

export class MapiConnection {
  private socket: Socket | null = null;
  private params: ConnectParams | null = null;
  private decoder = new BlockDecoder();
  private inbox: string[] = [];
  private pendingReads: PendingRead[] = [];
  private closedError: Error | null = null;
  private readonly logger: ILogger;

  constructor(options: MapiConnectionOptions = {}) {
    this.logger = options.logger ?? createLogger({ contextName: "mapi" });
  }

  get isConnected(): boolean {
    return this.socket !== null && this.closedError === null;
  }

  /**
   * The parameters of the current connection, after any redirects
   */
  get connectParams(): Readonly<ConnectParams> | null {
    return this.params;
  }

  async connect(params: ConnectParams): Promise<void> {
    await this.connectWithRedirects(params, 0);
  }

  private async connectWithRedirects(params: ConnectParams, redirects: number): Promise<void> {
    await this.disconnect();
    this.params = { ...params };
    await this.openSocket(params);

    // the local daemon trusts whoever can reach its socket
    if (params.language === "control" && !params.hostname) {
      return;
    }

    try {
      await this.login(redirects);
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  private openSocket(params: ConnectParams): Promise<void> {
    const unixSocket = params.hostname ? undefined : params.unixSocket ?? monetdbSocketPath(params.port);
    const target = unixSocket ?? `${params.hostname}:${params.port}`;
    this.logger.debug(`Connecting to ${target}`);

    return new Promise<void>((resolve, reject) => {
      const socket = unixSocket
        ? netConnect({ path: unixSocket })
        : netConnect({ host: params.hostname, port: params.port });

      let timer: NodeJS.Timeout | undefined;
      const fail = (error: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(new OperationalError(`Failed to connect to ${target}: ${error.message}`));
      };

      if (params.connectTimeoutMs !== undefined) {
        const timeoutMs = params.connectTimeoutMs;
        timer = setTimeout(() => fail(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
      }

      socket.once("error", fail);
      socket.once("connect", () => {
        clearTimeout(timer);
        socket.off("error", fail);
        this.attach(socket);
        if (!unixSocket) {
          resolve();
          return;
        }
        socket.write(config.unixSocketHandshake, (error) => {
          if (error) {
            reject(new OperationalError(`Failed to send handshake to ${target}: ${error.message}`));
          } else {
            resolve();
          }
        });
      });
    });
  }

  private attach(socket: Socket): void {
    this.socket = socket;
    this.decoder = new BlockDecoder();
    this.inbox = [];
    this.closedError = null;

    // events of a socket that was already replaced or closed must not touch the current one
    socket.on("data", (chunk: Buffer) => {
      if (this.socket !== socket) {
        return;
      }
      for (const message of this.decoder.push(chunk)) {
        this.deliver(message);
      }
    });
    socket.on("error", (error: Error) => {
      if (this.socket === socket) {
        this.logger.warn(`Socket error: ${error.message}`);
        this.fail(new OperationalError(error.message));
      }
    });
    socket.on("close", () => {
      if (this.socket === socket) {
        this.socket = null;
        this.fail(new OperationalError("Server closed the connection"));
      }
    });
  }

  private deliver(message: string): void {
    const pending = this.pendingReads.shift();
    if (pending) {
      pending.resolve(message);
    } else {
      this.inbox.push(message);
    }
  }

  private fail(error: Error): void {
    this.closedError ??= error;
    for (const pending of this.pendingReads.splice(0)) {
      pending.reject(this.closedError);
    }
  }

  private readMessage(): Promise<string> {
    const message = this.inbox.shift();
    if (message !== undefined) {
      return Promise.resolve(message);
    }
    if (this.closedError) {
      return Promise.reject(this.closedError);
    }
    return new Promise<string>((resolve, reject) => {
      this.pendingReads.push({ resolve, reject });
    });
  }

  private writeMessage(message: string): Promise<void> {
    const socket = this.socket;
    if (!socket || this.closedError) {
      return Promise.reject(new InterfaceError("Not connected"));
    }
    return new Promise<void>((resolve, reject) => {
      socket.write(serializeMessage(message), (error) => {
        if (error) {
          reject(new OperationalError(`Failed to send: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  private requireParams(): ConnectParams {
    if (!this.params) {
      throw new InterfaceError("Not connected");
    }
    return this.params;
  }

  private async login(redirects: number): Promise<void> {
    const params = this.requireParams();
    const challenge = parseChallenge(await this.readMessage());
    this.logger.debug(`Login as ${params.username} to ${params.database} (${params.language}), protocol ${challenge.protocol}`);

    await this.writeMessage(
      buildChallengeResponse(challenge, {
        username: params.username,
        password: params.password ?? "",
        language: params.language,
        database: params.database,
      }),
    );

    const reply = await this.readMessage();
    const lines = reply.split("\n").filter((line) => line.length > 0);

    for (const line of lines) {
      if (line === Message.OK) {
        continue;
      }
      if (line.startsWith(Message.INFO)) {
        this.logger.info(line.slice(1));
        continue;
      }
      if (line.startsWith(Message.ERROR)) {
        throw errorFromServer(line.slice(1));
      }
      if (line.startsWith(Message.REDIRECT)) {
        await this.followRedirect(line, redirects);
        return;
      }
      throw new ProgrammingError(`unknown state: ${reply}`);
    }
  }

  private async followRedirect(line: string, redirects: number): Promise<void> {
    if (redirects >= MAX_REDIRECTS) {
      throw new OperationalError(`maximal number of redirects reached (${MAX_REDIRECTS})`);
    }

    if (line.startsWith(REDIRECT_PREFIX.proxy)) {
      // the daemon proxies the connection, a fresh challenge follows on this socket
      this.logger.debug("Proxied by the daemon, logging in again");
      await this.login(redirects + 1);
      return;
    }

    const match = line.startsWith(REDIRECT_PREFIX.monetdb) ? MONETDB_REDIRECT.exec(line) : null;
    if (!match) {
      throw new ProgrammingError(`unknown redirect: ${line}`);
    }
    const [, hostname, port, database] = match;
    this.logger.debug(`Redirected to ${hostname}:${port}/${database}`);
    await this.connectWithRedirects(
      { ...this.requireParams(), hostname, port: Number(port), database },
      redirects + 1,
    );
  }

  /**
   * Sends one message and interprets the reply
   */
  async cmd(operation: string): Promise<string> {
    await this.writeMessage(operation);
    return this.interpret(await this.readMessage());
  }

  /**
   * Runs an SQL statement and returns the raw reply
   */
  query(sql: string): Promise<string> {
    return this.cmd(`s${sql}\n;`);
  }

  private async interpret(response: string): Promise<string> {
    if (response.length === 0) {
      return "";
    }
    if (response.startsWith(Message.OK)) {
      return response.slice(Message.OK.length).trim();
    }
    if (response === Message.MORE) {
      return this.cmd("");
    }

    switch (response[0]) {
      case Message.QUERY:
      case Message.HEADER:
      case Message.TUPLE:
        return response;
      case Message.ERROR:
        throw errorFromServer(response.slice(1));
      case Message.INFO: {
        const lines = response.split("\n");
        const firstData = lines.findIndex((line) => line.length > 0 && !line.startsWith(Message.INFO));
        for (const line of firstData === -1 ? lines : lines.slice(0, firstData)) {
          if (line.length > 0) {
            this.logger.info(line.slice(1));
          }
        }
        return firstData === -1 ? "" : this.interpret(lines.slice(firstData).join("\n"));
      }
    }

    const params = this.requireParams();
    if (params.language === "control" && !params.hostname) {
      return response.startsWith("OK") ? response.slice(2).trim() : response;
    }
    throw new ProgrammingError(`unknown state: ${response}`);
  }

  /**
   * Closes the socket. Safe to call when not connected.
   */
  async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = null;
    this.fail(new InterfaceError("Connection closed"));
    if (socket.destroyed) {
      return;
    }
    const closed = new Promise<void>((resolve) => socket.once("close", () => resolve()));
    socket.destroy();
    await closed;
  }
}

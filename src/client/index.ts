export { MapiConnection } from "./core/connection";
export type { ConnectParams, Language, MapiConnectionOptions } from "./core/connection";
export { Control, isEmpty, parseProperties } from "./core/control";
export type { ControlOptions } from "./core/control";
export { DatabaseState, parseStatusLine } from "./core/status";
export type { DatabaseStatus } from "./core/status";
export { BlockDecoder, parseBlock, serializeMessage } from "./core/blocks";
export { buildChallengeResponse, parseChallenge } from "./core/auth";
export type { Challenge, Credentials } from "./core/auth";
export {
  DatabaseError,
  errorFromServer,
  IntegrityError,
  InterfaceError,
  MonetDBError,
  NotSupportedError,
  OperationalError,
  ProgrammingError,
} from "./core/errors";
export { createLogger, LogLevel } from "./core/logger";
export type { ILogger, LoggerOptions } from "./core/logger";
export { DEFAULT_PORT } from "./core/constants";

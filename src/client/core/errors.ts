/**
 * Error hierarchy for the MAPI client.
 *
 * InterfaceError covers misuse of the client itself (no connection, bad
 * protocol data); DatabaseError and its subclasses carry problems the server
 * reported or that happened while talking to it.
 */

export class MonetDBError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InterfaceError extends MonetDBError {}

export class DatabaseError extends MonetDBError {}

export class OperationalError extends DatabaseError {}

export class IntegrityError extends DatabaseError {}

export class ProgrammingError extends DatabaseError {}

export class NotSupportedError extends DatabaseError {}

type ErrorClass = new (message: string) => MonetDBError;

/**
 * SQLSTATE prefixes with a more specific class than OperationalError
 */
const SQLSTATE_ERRORS: Record<string, ErrorClass> = {
  "42S02": OperationalError, // no such table
  "M0M29": IntegrityError, // UNIQUE constraint violated
  "2D000": IntegrityError, // COMMIT failed
  "40000": IntegrityError, // FOREIGN KEY constraint violated
  "42000": OperationalError, // identifier not found, syntax error
};

const SQL_EXCEPTION_PREFIX = "SQLException:";

/**
 * Builds the error for a server reply with its leading "!" removed,
 * e.g. "42S02!SELECT: no such table 'x'".
 */
export function errorFromServer(reply: string): MonetDBError {
  let text = reply.trim();

  if (text.startsWith(SQL_EXCEPTION_PREFIX)) {
    // SQLException:<context>:<rest>
    const contextEnd = text.indexOf(":", SQL_EXCEPTION_PREFIX.length);
    if (contextEnd !== -1) {
      text = text.slice(contextEnd + 1);
    }
  }

  const code = text.slice(0, 5);
  const ErrorType = text.length > 5 && text[5] === "!" ? SQLSTATE_ERRORS[code] : undefined;
  if (ErrorType) {
    return new ErrorType(text.slice(6));
  }
  return new OperationalError(text);
}

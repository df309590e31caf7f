/**
 * Parsing of the daemon's `sabdb` status lines
 */
import { InterfaceError, OperationalError } from "./errors";

/**
 * Database states as reported by the daemon
 */
export enum DatabaseState {
  ILLEGAL = 0,
  RUNNING = 1,
  CRASHED = 2,
  INACTIVE = 3,
  STARTING = 4,
}

export interface DatabaseStatus {
  name: string;
  path: string;
  locked: boolean;
  state: DatabaseState | number;
  scenarios: string[];
  startCounter: number;
  stopCounter: number;
  crashCounter: number;
  /** Uptimes in seconds */
  avgUptime: number;
  maxUptime: number;
  minUptime: number;
  lastCrash: Date | null;
  lastStart: Date;
  /** Always null for protocol v1 lines */
  lastStop: Date | null;
  /** Whether the database crashed on its last start */
  crashAvg1: boolean;
  crashAvg10: number;
  crashAvg30: number;
}

const STATUS_PREFIX = "sabdb:";

class FieldReader {
  private index = 0;

  constructor(private readonly fields: string[]) {}

  next(name: string): string {
    if (this.index >= this.fields.length) {
      throw new OperationalError(`Status line ends before field ${name}`);
    }
    return this.fields[this.index++];
  }

  integer(name: string): number {
    const raw = this.next(name);
    const value = Number(raw);
    if (raw.trim() === "" || !Number.isInteger(value)) {
      throw new OperationalError(`Invalid ${name} in status line: ${raw}`);
    }
    return value;
  }

  float(name: string): number {
    const raw = this.next(name);
    const value = Number(raw);
    if (raw.trim() === "" || Number.isNaN(value)) {
      throw new OperationalError(`Invalid ${name} in status line: ${raw}`);
    }
    return value;
  }

  flag(name: string): boolean {
    return this.next(name) === "1";
  }

  timestamp(name: string): Date {
    return new Date(this.integer(name) * 1000);
  }

  optionalTimestamp(name: string): Date | null {
    const seconds = this.integer(name);
    return seconds >= 0 ? new Date(seconds * 1000) : null;
  }
}

/**
 * Parses one status line in sabdb protocol v1 or v2, e.g.
 * `=sabdb:2:demo,/var/dbfarm/demo,0,1,sql'mal,3,2,0,120,300,60,-1,1700000000,1700000100,0,0.0,0.0`
 */
export function parseStatusLine(line: string): DatabaseStatus {
  const text = line.startsWith("=") ? line.slice(1) : line;
  if (!text.startsWith(STATUS_PREFIX)) {
    throw new OperationalError("wrong result received");
  }

  const versionEnd = text.indexOf(":", STATUS_PREFIX.length);
  const version = versionEnd === -1 ? "" : text.slice(STATUS_PREFIX.length, versionEnd);
  if (version !== "1" && version !== "2") {
    throw new InterfaceError("unsupported sabdb protocol");
  }

  const fields = new FieldReader(text.slice(versionEnd + 1).split(","));

  const name = fields.next("name");
  const path = fields.next("path");
  const locked = fields.flag("locked");
  const state = fields.integer("state");
  const scenarios = fields.next("scenarios").split("'");
  if (version === "1") {
    fields.next("connections");
  }
  const startCounter = fields.integer("start_counter");
  const stopCounter = fields.integer("stop_counter");
  const crashCounter = fields.integer("crash_counter");
  const avgUptime = fields.integer("avg_uptime");
  const maxUptime = fields.integer("max_uptime");
  const minUptime = fields.integer("min_uptime");
  const lastCrash = fields.optionalTimestamp("last_crash");
  const lastStart = fields.timestamp("last_start");
  const lastStop = version === "2" ? fields.optionalTimestamp("last_stop") : null;

  return {
    name,
    path,
    locked,
    state,
    scenarios,
    startCounter,
    stopCounter,
    crashCounter,
    avgUptime,
    maxUptime,
    minUptime,
    lastCrash,
    lastStart,
    lastStop,
    crashAvg1: fields.flag("crash_avg1"),
    crashAvg10: fields.float("crash_avg10"),
    crashAvg30: fields.float("crash_avg30"),
  };
}

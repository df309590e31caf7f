import { describe, expect, it } from "vitest";
import { InterfaceError, OperationalError } from "./errors";
import { DatabaseState, parseStatusLine } from "./status";

const V2_LINE = "=sabdb:2:demo,/var/dbfarm/demo,0,1,sql'mal,3,2,0,120,300,60,-1,1700000000,1700000100,0,0.0,0.5";
const V1_LINE = "sabdb:1:legacy,/var/dbfarm/legacy,1,3,sql,7,4,4,1,90,600,30,1690000000,1690000500,1,0.25,0.1";

describe("parseStatusLine", () => {
  it("parses a protocol v2 line", () => {
    expect(parseStatusLine(V2_LINE)).toEqual({
      name: "demo",
      path: "/var/dbfarm/demo",
      locked: false,
      state: DatabaseState.RUNNING,
      scenarios: ["sql", "mal"],
      startCounter: 3,
      stopCounter: 2,
      crashCounter: 0,
      avgUptime: 120,
      maxUptime: 300,
      minUptime: 60,
      lastCrash: null,
      lastStart: new Date(1700000000 * 1000),
      lastStop: new Date(1700000100 * 1000),
      crashAvg1: false,
      crashAvg10: 0,
      crashAvg30: 0.5,
    });
  });

  it("skips the connections field and has no last stop in v1", () => {
    expect(parseStatusLine(V1_LINE)).toEqual({
      name: "legacy",
      path: "/var/dbfarm/legacy",
      locked: true,
      state: DatabaseState.INACTIVE,
      scenarios: ["sql"],
      startCounter: 4,
      stopCounter: 4,
      crashCounter: 1,
      avgUptime: 90,
      maxUptime: 600,
      minUptime: 30,
      lastCrash: new Date(1690000000 * 1000),
      lastStart: new Date(1690000500 * 1000),
      lastStop: null,
      crashAvg1: true,
      crashAvg10: 0.25,
      crashAvg30: 0.1,
    });
  });

  it("reports a stop time of -1 as null", () => {
    const line = V2_LINE.replace("1700000100", "-1");
    expect(parseStatusLine(line).lastStop).toBeNull();
  });

  it("rejects lines without the sabdb prefix", () => {
    expect(() => parseStatusLine("=OK")).toThrow(new OperationalError("wrong result received"));
  });

  it("rejects unknown protocol versions", () => {
    expect(() => parseStatusLine("sabdb:3:demo")).toThrow(new InterfaceError("unsupported sabdb protocol"));
  });

  it("rejects truncated lines", () => {
    expect(() => parseStatusLine("sabdb:2:demo,/var/dbfarm/demo,0,1")).toThrow(
      new OperationalError("Status line ends before field scenarios"),
    );
  });

  it("rejects non-numeric counters", () => {
    const line = V2_LINE.replace(",3,2,0,", ",three,2,0,");
    expect(() => parseStatusLine(line)).toThrow(new OperationalError("Invalid start_counter in status line: three"));
  });
});

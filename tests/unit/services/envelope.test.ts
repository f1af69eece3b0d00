import { describe, expect, test } from "vitest";
import { SessionStateData, createData } from "../../../src/services/envelope";
import type { TelemetryData } from "../../../src/types";

describe("createData", () => {
  test("tags a session-state payload with its type and schema name", () => {
    const payload = new SessionStateData("Start");

    const data = createData(payload);

    expect(data.baseData).toBe(payload);
    expect(data.baseType).toBe("SessionStateData");
    expect(data.qualifiedName).toBe("Telemetry.SessionState");
  });

  test("uses whatever names a payload declares", () => {
    const payload: TelemetryData & { name: string } = {
      baseType: "EventData",
      envelopeName: "Telemetry.Event",
      name: "checkout",
    };

    const data = createData(payload);

    expect(data).toEqual({
      baseData: payload,
      baseType: "EventData",
      qualifiedName: "Telemetry.Event",
    });
  });

  test("session-state payload serializes its version and state", () => {
    expect(JSON.parse(JSON.stringify(new SessionStateData("Start")))).toEqual({
      ver: 2,
      baseType: "SessionStateData",
      envelopeName: "Telemetry.SessionState",
      state: "Start",
    });
  });
});

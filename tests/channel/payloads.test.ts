import { describe, expect, it } from "vitest";
import {
  costValue,
  decodeCostReport,
  decodeParameters,
  encodeCostReport,
  encodeParameters
} from "../../src/channel/payloads.js";

const RUN = "run-a";

describe("round payloads", () => {
  it("carries parameters with their run and round tags", () => {
    const raw = encodeParameters({ runId: RUN, round: 3, attempt: 1, beta: [0.1, 0.2], objective: "sum" });
    expect(raw).toBe('{"runId":"run-a","round":3,"attempt":1,"beta":[0.1,0.2],"objective":"sum"}');
    expect(decodeParameters(raw)).toEqual({ runId: RUN, round: 3, attempt: 1, beta: [0.1, 0.2], objective: "sum" });
  });

  it("defaults a missing attempt to zero", () => {
    expect(decodeParameters('{"runId":"run-a","round":1,"beta":[1],"objective":"sum"}')).toEqual({
      runId: RUN,
      round: 1,
      attempt: 0,
      beta: [1],
      objective: "sum"
    });
    expect(decodeCostReport('{"runId":"run-a","round":1,"cost":2}')).toEqual({ runId: RUN, round: 1, attempt: 0, cost: 2 });
  });

  it("rejects malformed payloads", () => {
    expect(decodeParameters("not json")).toBeUndefined();
    expect(decodeParameters('{"runId":"run-a","round":1,"beta":[],"objective":"sum"}')).toBeUndefined();
    expect(decodeCostReport('{"runId":"run-a","cost":1}')).toBeUndefined();
  });

  it("rejects payloads without a run id", () => {
    expect(decodeParameters('{"round":1,"beta":[1],"objective":"sum"}')).toBeUndefined();
    expect(decodeCostReport('{"round":1,"cost":2}')).toBeUndefined();
    expect(decodeCostReport('{"runId":"","round":1,"cost":2}')).toBeUndefined();
  });

  it("parses numeric costs from numbers and strings", () => {
    const report = { runId: RUN, round: 1, attempt: 0 };
    expect(costValue({ ...report, cost: -4.25 })).toBe(-4.25);
    expect(costValue({ ...report, cost: " 12.5 " })).toBe(12.5);
    expect(costValue({ ...report, cost: "" })).toBeNull();
    expect(costValue({ ...report, cost: "abc" })).toBeNull();
    expect(costValue({ ...report, error: "boom" })).toBeNull();
    expect(decodeCostReport(encodeCostReport({ runId: RUN, round: 2, attempt: 0, error: "boom" }))).toEqual({
      runId: RUN,
      round: 2,
      attempt: 0,
      error: "boom"
    });
  });
});

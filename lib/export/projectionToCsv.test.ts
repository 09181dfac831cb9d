import { describe, it, expect } from "vitest";
import { simulatePolicy } from "@/lib/model/engine";
import { getTableRows, projectionToCsv, rowToCells } from "./projectionToCsv";
import {
  getDefaultScenario,
  getEscalationScenario,
} from "@/fixtures/golden-scenarios";

const HEADER =
  "Month,Age,Policy year,Month in year,Phase,Primary monthly income,Primary cumulative income," +
  "Benefit received,SIP investment,SIP corpus (end of month),SWP payout,SWP corpus (end of month)," +
  "Hybrid monthly income,Hybrid cumulative income,SWP year,Target SWP payout";

describe("projectionToCsv", () => {
  const projection = simulatePolicy(getEscalationScenario());

  it("writes a header and one line per month", () => {
    const lines = projectionToCsv(projection).split("\n");
    expect(lines[0]).toBe(HEADER);
    expect(lines).toHaveLength(37);
  });

  it("formats accumulation and withdrawal rows", () => {
    const lines = projectionToCsv(projection).split("\n");
    expect(lines[1]).toBe(
      "0,40.00,1,1,accumulation,1000.00,1000.00,1000.00,1000.00,1000.00,0.00,0.00,1000.00,1000.00,0,0.00"
    );
    expect(lines[13]).toBe(
      "12,41.00,2,1,withdrawal,1000.00,13000.00,1000.00,0.00,12000.00,120.00,11880.00,1120.00,13120.00,1,120.00"
    );
  });

  it("exports only the given rows", () => {
    const csv = projectionToCsv(projection, projection.monthRows.slice(35));
    expect(csv).toBe(
      `${HEADER}\n35,42.92,3,12,withdrawal,1000.00,36000.00,1000.00,0.00,12000.00,180.00,8400.00,1180.00,39600.00,2,180.00`
    );
  });
});

describe("rowToCells", () => {
  it("returns one cell per column", () => {
    const projection = simulatePolicy(getEscalationScenario());
    expect(rowToCells(projection.monthRows[24]!)).toHaveLength(16);
  });
});

describe("getTableRows", () => {
  const projection = simulatePolicy(getDefaultScenario());

  it("previews the first two policy years by default", () => {
    const rows = getTableRows(projection, { showFullTable: false });
    expect(rows).toHaveLength(24);
    expect(rows[23]!.monthIndex).toBe(23);
  });

  it("returns every month when the full table is requested", () => {
    expect(getTableRows(projection, { showFullTable: true })).toHaveLength(540);
  });
});

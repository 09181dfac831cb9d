/**
 * Engine unit tests: invariants over the month sequence, phase transition,
 * payout escalation and terminal depletion.
 */

import { describe, it, expect } from "vitest";
import { simulatePolicy, toMonthlyRate } from "./engine";
import { InvalidParametersError } from "./validation";
import {
  getAccumulationOnlyScenario,
  getDefaultScenario,
  getDepletionScenario,
  getEscalationScenario,
  getNoAccumulationScenario,
} from "@/fixtures/golden-scenarios";

describe("Engine", () => {
  describe("toMonthlyRate", () => {
    it("divides the annual rate by 12 (no compounding conversion)", () => {
      expect(toMonthlyRate(0.12)).toBe(0.01);
      expect(toMonthlyRate(0)).toBe(0);
    });
  });

  describe("invariants over the default scenario", () => {
    const params = getDefaultScenario();
    const result = simulatePolicy(params);
    const rows = result.monthRows;

    it("emits one row per month of the policy term", () => {
      expect(result.totalMonths).toBe(540);
      expect(result.accumulationMonths).toBe(144);
      expect(rows).toHaveLength(540);
      rows.forEach((row, i) => expect(row.monthIndex).toBe(i));
    });

    it("accumulates the primary benefit linearly", () => {
      rows.forEach((row, i) => {
        expect(row.primaryMonthlyIncome).toBe(10_000);
        expect(row.primaryCumulativeIncome).toBe(10_000 * (i + 1));
      });
    });

    it("never decreases cumulative income in either scenario", () => {
      for (let i = 1; i < rows.length; i++) {
        expect(rows[i]!.primaryCumulativeIncome).toBeGreaterThanOrEqual(
          rows[i - 1]!.primaryCumulativeIncome
        );
        expect(rows[i]!.hybridCumulativeIncome).toBeGreaterThanOrEqual(
          rows[i - 1]!.hybridCumulativeIncome
        );
      }
    });

    it("never lets the withdrawal balance go negative", () => {
      for (const row of rows) {
        expect(row.withdrawalBalance).toBeGreaterThanOrEqual(0);
      }
    });

    it("pays nothing from the corpus during accumulation", () => {
      const accumulation = rows.filter((r) => r.monthIndex < 144);
      expect(accumulation).toHaveLength(144);
      for (const row of accumulation) {
        expect(row.phase).toBe("accumulation");
        expect(row.withdrawalPayout).toBe(0);
        expect(row.withdrawalBalance).toBe(0);
        expect(row.withdrawalYear).toBe(0);
        expect(row.targetPayout).toBe(0);
        expect(row.contribution).toBe(10_000);
        expect(row.hybridMonthlyIncome).toBe(10_000);
      }
    });

    it("transfers the final accumulation balance at the transition month", () => {
      const before = rows[143]!;
      const transition = rows[144]!;
      expect(result.transitionMonthIndex).toBe(144);
      expect(transition.phase).toBe("withdrawal");
      expect(transition.openingWithdrawalBalance).toBe(before.accumulationBalance);
      expect(transition.accumulationBalance).toBe(before.accumulationBalance);
      expect(transition.contribution).toBe(0);
      expect(transition.withdrawalYear).toBe(1);
      expect(transition.targetPayout).toBeCloseTo(
        (before.accumulationBalance * 0.12) / 12,
        6
      );
    });

    it("matches the reference totals", () => {
      expect(rows[143]!.accumulationBalance).toBeCloseTo(3_986_020.766459991, 4);
      expect(rows[144]!.targetPayout).toBeCloseTo(39_860.20766459991, 6);
      expect(result.depletionMonthIndex).toBe(380);
      const last = rows[539]!;
      expect(last.primaryCumulativeIncome).toBe(5_400_000);
      expect(last.hybridCumulativeIncome).toBeCloseTo(20_838_478.22904864, 2);
      expect(last.withdrawalYear).toBe(33);
      expect(last.withdrawalBalance).toBe(0);
    });

    it("is idempotent for identical parameters", () => {
      const again = simulatePolicy(getDefaultScenario());
      expect(again).toEqual(result);
    });
  });

  describe("no accumulation years", () => {
    const result = simulatePolicy(getNoAccumulationScenario());

    it("transitions at month 0 with an empty corpus", () => {
      expect(result.totalMonths).toBe(12);
      expect(result.accumulationMonths).toBe(0);
      expect(result.transitionMonthIndex).toBe(0);
      expect(result.depletionMonthIndex).toBeNull();
    });

    it("pays no SWP and matches the primary income", () => {
      result.monthRows.forEach((row, i) => {
        expect(row.phase).toBe("withdrawal");
        expect(row.targetPayout).toBe(0);
        expect(row.withdrawalPayout).toBe(0);
        expect(row.withdrawalBalance).toBe(0);
        expect(row.withdrawalYear).toBe(1);
        expect(row.hybridMonthlyIncome).toBe(10_000);
        expect(row.hybridCumulativeIncome).toBe(row.primaryCumulativeIncome);
        expect(row.hybridCumulativeIncome).toBe(10_000 * (i + 1));
      });
    });
  });

  describe("accumulation spanning the whole term", () => {
    const result = simulatePolicy(getAccumulationOnlyScenario());
    const rows = result.monthRows;

    it("never enters the withdrawal phase", () => {
      expect(result.transitionMonthIndex).toBeNull();
      for (const row of rows) {
        expect(row.phase).toBe("accumulation");
        expect(row.withdrawalPayout).toBe(0);
      }
    });

    it("credits interest before the contribution", () => {
      expect(rows[0]!.accumulationBalance).toBe(100);
      expect(rows[1]!.accumulationBalance).toBeCloseTo(201, 10);
      expect(rows[2]!.accumulationBalance).toBeCloseTo(303.01, 10);
      expect(rows[11]!.accumulationBalance).toBeCloseTo(1_268.2503013196972, 8);
    });

    it("grows the accumulation balance strictly every month", () => {
      for (let i = 1; i < rows.length; i++) {
        expect(rows[i]!.accumulationBalance).toBeGreaterThan(
          rows[i - 1]!.accumulationBalance
        );
      }
    });
  });

  describe("payout escalation", () => {
    const result = simulatePolicy(getEscalationScenario());
    const rows = result.monthRows;

    it("sets the year-1 target at the transition without escalating it", () => {
      const transition = rows[12]!;
      expect(transition.openingWithdrawalBalance).toBe(12_000);
      expect(transition.targetPayout).toBe(120);
      expect(transition.withdrawalPayout).toBe(120);
      expect(transition.withdrawalBalance).toBe(11_880);
      expect(transition.hybridMonthlyIncome).toBe(1_120);
      expect(transition.hybridCumulativeIncome).toBe(13_120);
    });

    it("keeps the target fixed within the first withdrawal year", () => {
      for (const row of rows.slice(12, 24)) {
        expect(row.withdrawalYear).toBe(1);
        expect(row.withdrawalPayout).toBe(120);
      }
      expect(rows[23]!.withdrawalBalance).toBe(10_560);
    });

    it("escalates on the first anniversary", () => {
      for (const row of rows.slice(24)) {
        expect(row.withdrawalYear).toBe(2);
        expect(row.targetPayout).toBe(180);
        expect(row.withdrawalPayout).toBe(180);
      }
      expect(rows[35]!.withdrawalBalance).toBe(8_400);
      expect(rows[35]!.hybridCumulativeIncome).toBe(39_600);
      expect(result.depletionMonthIndex).toBeNull();
    });
  });

  describe("depletion", () => {
    const result = simulatePolicy(getDepletionScenario());
    const rows = result.monthRows;

    it("truncates the payout to the remaining corpus", () => {
      expect(rows[23]!.withdrawalBalance).toBe(1_200);
      const month = rows[24]!;
      expect(month.targetPayout).toBe(1_350);
      expect(month.openingWithdrawalBalance).toBe(1_200);
      expect(month.withdrawalPayout).toBe(1_200);
      expect(month.withdrawalBalance).toBe(0);
      expect(result.depletionMonthIndex).toBe(24);
    });

    it("stays depleted for the rest of the term", () => {
      for (const row of rows.slice(25)) {
        expect(row.withdrawalBalance).toBe(0);
        expect(row.withdrawalPayout).toBe(0);
        expect(row.targetPayout).toBe(1_350);
        expect(row.hybridMonthlyIncome).toBe(1_000);
      }
      expect(rows[35]!.hybridCumulativeIncome).toBe(48_000);
    });

    it("keeps escalating the target after depletion", () => {
      const longer = simulatePolicy({ ...getDepletionScenario(), policyEndAge: 44 });
      const year3 = longer.monthRows[36]!;
      expect(year3.withdrawalYear).toBe(3);
      expect(year3.targetPayout).toBe(2_025);
      expect(year3.withdrawalPayout).toBe(0);
      expect(year3.withdrawalBalance).toBe(0);
    });
  });

  describe("record labelling", () => {
    it("derives age, policy year and month in year from the month index", () => {
      const rows = simulatePolicy(getEscalationScenario()).monthRows;
      expect(rows[0]).toMatchObject({ age: 40, policyYear: 1, monthInPolicyYear: 1 });
      expect(rows[11]).toMatchObject({ policyYear: 1, monthInPolicyYear: 12 });
      expect(rows[12]).toMatchObject({ age: 41, policyYear: 2, monthInPolicyYear: 1 });
      expect(rows[18]!.age).toBeCloseTo(41.5, 10);
    });
  });

  describe("invalid parameters", () => {
    it("rejects a policy that ends before it starts", () => {
      expect(() =>
        simulatePolicy({ ...getDefaultScenario(), policyEndAge: 40 })
      ).toThrow(InvalidParametersError);
    });

    it("rejects accumulation longer than the term", () => {
      try {
        simulatePolicy({ ...getNoAccumulationScenario(), accumulationYears: 2 });
        expect.unreachable("expected InvalidParametersError");
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidParametersError);
        if (err instanceof InvalidParametersError) {
          expect(err.errors.map((e) => e.code)).toEqual(["ACCUMULATION_EXCEEDS_TERM"]);
        }
      }
    });

    it("rejects runaway terms before simulating", () => {
      expect(() =>
        simulatePolicy({ ...getDefaultScenario(), currentAge: 1, policyEndAge: 120 })
      ).toThrow(/exceeds the 100-year limit/);
    });
  });

  it("passes soft warnings through with the projection", () => {
    const result = simulatePolicy(getNoAccumulationScenario());
    expect(result.warnings.map((w) => w.code)).toEqual([
      "NO_ACCUMULATION_PHASE",
      "WITHDRAWAL_EXCEEDS_GROWTH",
    ]);
  });
});

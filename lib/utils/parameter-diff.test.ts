import { describe, it, expect } from "vitest";
import { diffParameters } from "./parameter-diff";
import { getDefaultScenario } from "@/fixtures/golden-scenarios";

describe("diffParameters", () => {
  it("returns nothing for identical parameters", () => {
    expect(diffParameters(getDefaultScenario(), getDefaultScenario())).toEqual([]);
  });

  it("labels and formats each changed input in layout order", () => {
    const prev = getDefaultScenario();
    const next = {
      ...prev,
      payoutGrowthRate: 0.075,
      monthlyBenefit: 12_500,
      accumulationYears: 15,
    };
    expect(diffParameters(prev, next)).toEqual([
      {
        key: "monthlyBenefit",
        label: "Monthly survival benefit",
        from: "10,000",
        to: "12,500",
      },
      {
        key: "accumulationYears",
        label: "SIP duration",
        from: "12 years",
        to: "15 years",
      },
      {
        key: "payoutGrowthRate",
        label: "Annual payout growth",
        from: "5.0%",
        to: "7.5%",
      },
    ]);
  });
});

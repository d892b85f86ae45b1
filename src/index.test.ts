import { bucketPlannedDates, classifyEntries, reconcile, summarizeComparison } from "./index";

describe("package entry point", () => {
  it("runs a full reconciliation through the public API", () => {
    const comparison = reconcile(
      bucketPlannedDates(["2024-05-06T10:00:00Z", "2024-05-07T10:00:00Z"]),
      classifyEntries([{ entryDate: "2024-05-06T10:00:00Z", lessons: 1, entryType: "SISSEKANNE_T" }])
    );

    expect(summarizeComparison(comparison).completionRate).toBe(50);
  });
});

import { bucketPlannedDates } from "./dateBucketer";
import { ParseError } from "./lessonDate";

describe("bucketPlannedDates", () => {
  it("groups planned lessons by date with times sorted", () => {
    const result = bucketPlannedDates([
      "2024-01-10T09:00:00Z",
      "2024-01-10T08:00:00Z",
      "2024-01-09T12:30:00Z",
    ]);

    expect(Array.from(result.keys())).toEqual(["2024-01-09", "2024-01-10"]);
    expect(result.get("2024-01-09")).toEqual(["12:30:00"]);
    expect(result.get("2024-01-10")).toEqual(["08:00:00", "09:00:00"]);
  });

  it("treats a trailing Z the same as +00:00", () => {
    const result = bucketPlannedDates([
      "2024-01-10T08:00:00Z",
      "2024-01-10T08:00:00+00:00",
    ]);

    expect(result.get("2024-01-10")).toEqual(["08:00:00", "08:00:00"]);
  });

  it("keeps the date and time in the offset the timestamp carries", () => {
    const result = bucketPlannedDates([
      "2024-01-10T23:30:00-05:00",
      "2024-01-11T00:15:00+02:00",
    ]);

    expect(Array.from(result.keys())).toEqual(["2024-01-10", "2024-01-11"]);
    expect(result.get("2024-01-10")).toEqual(["23:30:00"]);
    expect(result.get("2024-01-11")).toEqual(["00:15:00"]);
  });

  it("drops fractional seconds from the time of day", () => {
    const result = bucketPlannedDates(["2024-01-10T08:05:09.123Z"]);

    expect(result.get("2024-01-10")).toEqual(["08:05:09"]);
  });

  it("returns an empty map for no planned dates", () => {
    expect(bucketPlannedDates([]).size).toBe(0);
  });

  it("throws a ParseError for a malformed timestamp", () => {
    expect(() => bucketPlannedDates(["2024-01-10T08:00:00Z", "not-a-date"])).toThrow(ParseError);
  });

  it("throws a ParseError for an impossible date", () => {
    expect(() => bucketPlannedDates(["2024-13-01T08:00:00Z"])).toThrow(ParseError);
  });

  it("gives the same result when run twice on the same input", () => {
    const input = ["2024-03-02T10:00:00Z", "2024-03-01T09:00:00Z", "2024-03-02T08:00:00Z"];

    const first = bucketPlannedDates(input);
    const second = bucketPlannedDates(input);

    expect(Array.from(second.entries())).toEqual(Array.from(first.entries()));
  });
});

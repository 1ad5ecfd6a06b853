import { describe, it, expect } from "vitest";
import { isComplete, withDefaults } from "../src/ui/form.js";

describe("withDefaults", () => {
  it("fills team size and hours only when missing", () => {
    expect(withDefaults({ idea: "x" })).toEqual({ idea: "x", teamSize: 3, hoursAvailable: 48 });
    expect(withDefaults({ teamSize: 5, hoursAvailable: 24 })).toEqual({ teamSize: 5, hoursAvailable: 24 });
  });
});

describe("isComplete", () => {
  it("requires every field", () => {
    expect(isComplete({ idea: "x", targetUsers: "y", goals: "z", teamSize: 2 })).toBe(false);
    expect(isComplete({ idea: "x", targetUsers: "y", goals: "z", teamSize: 2, hoursAvailable: 36 })).toBe(true);
  });
});

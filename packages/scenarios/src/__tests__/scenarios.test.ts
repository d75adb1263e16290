import { describe, expect, it } from "vitest";
import {
  createCustomGoal,
  createCustomPersona,
  getGoal,
  getPersona,
  loadGoals,
  loadPersonas,
} from "../index.js";

describe("scenario catalogs", () => {
  it("loads the bundled personas", () => {
    const personas = loadPersonas();
    expect(Object.keys(personas)).toEqual([
      "average_user",
      "curious_beginner",
      "hurried_operator",
      "meticulous_expert",
    ]);
    expect(personas["hurried_operator"]?.patience).toBe(0.25);
  });

  it("loads the bundled goals", () => {
    const goals = loadGoals();
    expect(goals["ambiguous_request"]?.expected_turns).toBe(4);
    expect(goals["learn_basic_concept"]?.domain).toBe("educational");
  });

  it("resolves the default persona and goal", () => {
    expect(getPersona("average_user").id).toBe("average-user");
    expect(getGoal("learn_basic_concept").id).toBe("learn-basic-concept");
  });

  it("lists available keys for unknown ids", () => {
    expect(() => getPersona("nobody")).toThrow(
      "Unknown persona: nobody\nAvailable personas: average_user, curious_beginner, hurried_operator, meticulous_expert",
    );
    expect(() => getGoal("nothing")).toThrow(/Available goals: learn_basic_concept, precise_lookup/);
  });

  it("does not resolve inherited object members", () => {
    expect(() => getPersona("constructor")).toThrow("Unknown persona: constructor");
    expect(() => getPersona("toString")).toThrow("Unknown persona: toString");
    expect(() => getGoal("constructor")).toThrow("Unknown goal: constructor");
    expect(() => getGoal("hasOwnProperty")).toThrow("Unknown goal: hasOwnProperty");
  });
});

describe("custom scenarios", () => {
  it("overrides traits and generates an id", () => {
    const base = getPersona("average_user");
    const custom = createCustomPersona(base, { patience: 0.1 });
    expect(custom.patience).toBe(0.1);
    expect(custom.expertise).toBe(0.5);
    expect(custom.id).toMatch(/^custom-\d+$/);
  });

  it("keeps an explicit id", () => {
    const base = getGoal("learn_basic_concept");
    const custom = createCustomGoal(base, { id: "my-goal", expected_turns: 6 });
    expect(custom.id).toBe("my-goal");
    expect(custom.expected_turns).toBe(6);
  });

  it("rejects out-of-range traits", () => {
    const base = getPersona("average_user");
    expect(() => createCustomPersona(base, { patience: 1.5 })).toThrow();
  });
});

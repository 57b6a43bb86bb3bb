import { describe, it, expect } from "vitest";
import { loadSimulationConfig } from "../config/loader.js";
import { parseLenientJson, readLenientJson } from "../config/lenient-json.js";
import { ConfigurationError } from "../errors.js";
import { defaultConfig } from "./fixtures.js";

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

const relationshipAxes = {
  friendship: { scope: "relationship", min: -100, max: 100 },
  respect: { scope: "relationship", min: -100, max: 100 },
  romance: { scope: "relationship", min: -100, max: 100 },
};

describe("parseLenientJson", () => {
  it("accepts comments and trailing commas", () => {
    const text = `{
      // line comment
      "a": [1, 2,],
      /* block */ "b": "http://example.test/x",
    }`;
    expect(parseLenientJson(text, "x.json")).toEqual({ a: [1, 2], b: "http://example.test/x" });
  });

  it("names the file on a parse failure", () => {
    const err = configError(() => parseLenientJson("{ nope", "broken.json"));
    expect(err.file).toBe("broken.json");
    expect(err.code).toBe("CONFIGURATION");
  });

  it("reports an unreadable file", () => {
    const err = configError(() => readLenientJson("/nonexistent/axes.json", "axes.json"));
    expect(err.message).toMatch(/^cannot read configuration/);
    expect(err.file).toBe("axes.json");
  });
});

describe("loadSimulationConfig", () => {
  it("loads the shipped configuration", () => {
    const config = loadSimulationConfig();
    expect(Object.keys(config.events.events)).toHaveLength(8);
    expect(config.triggers.triggers.TIME_SKIP.allowed_sources).toEqual(["calendar", "host"]);
    expect(config.resolution.base_target).toBe(8);
  });

  it("fails for a missing directory", () => {
    expect(() => loadSimulationConfig("/nonexistent/config")).toThrow(ConfigurationError);
  });
});

describe("buildSimulationConfig", () => {
  it("reports schema issues with file and key", () => {
    const err = configError(() =>
      defaultConfig({ axes: { axes: { ...relationshipAxes, bad: { scope: "character", min: 5, max: 1 } } } }),
    );
    expect(err.file).toBe("axes.json");
    expect(err.key).toBe("axes.bad");
  });

  it("requires effect keys to map to character axes", () => {
    const err = configError(() =>
      defaultConfig({ axes: { axes: relationshipAxes, effect_axes: { xp_delta: "friendship" } } }),
    );
    expect(err.message).toBe("'xp_delta' must map to a character axis, got 'friendship' (axes.json @ effect_axes.xp_delta)");
  });

  it("rejects an interaction declared in two domains", () => {
    const err = configError(() =>
      defaultConfig({
        interactions: {
          domains: {
            social: { interactions: { drill: {} } },
            operational: { interactions: { drill: {} } },
          },
        },
      }),
    );
    expect(err.key).toBe("domains.operational.interactions.drill");
  });

  it("rejects an unknown difficulty label", () => {
    const err = configError(() =>
      defaultConfig({
        resolution: {
          interaction_resolutions: { small_talk: { stages: [{ id: "open", skill: "Protocol", difficulty: "brutal" }] } },
        },
      }),
    );
    expect(err.message).toMatch(/^unknown difficulty label 'brutal'/);
    expect(err.key).toBe("interaction_resolutions.small_talk.stages.0.difficulty");
  });

  it("requires the built-in triggers", () => {
    const err = configError(() =>
      defaultConfig({
        triggers: { triggers: { CONFLICT_STARTED: { payload_schema: {}, allowed_sources: ["host"] } } },
        relationshipRules: { rules: {} },
      }),
    );
    expect(err.key).toBe("triggers.TIME_SKIP");
  });

  it("rejects rules for unregistered triggers", () => {
    const err = configError(() =>
      defaultConfig({ relationshipRules: { rules: { SURPRISE_PARTY: { pair: ["a", "b"], effects: {} } } } }),
    );
    expect(err.file).toBe("relationship_rules.json");
    expect(err.key).toBe("rules.SURPRISE_PARTY");
  });

  it("rejects rules writing character axes", () => {
    const err = configError(() =>
      defaultConfig({
        relationshipRules: {
          rules: { CONFLICT_STARTED: { pair: ["a", "b"], effects: { axis_delta: { fatigue: 5 } } } },
        },
      }),
    );
    expect(err.key).toBe("rules.CONFLICT_STARTED.effects.axis_delta.fatigue");
  });

  it("checks rule parameters against the trigger payload", () => {
    const err = configError(() =>
      defaultConfig({
        relationshipRules: { rules: { HEROIC_ACTION: { fan_out: { from: "actor", to: "actor" }, effects: {} } } },
      }),
    );
    expect(err.message).toMatch(/^'actor' must be a required character_id\[\] field of 'HEROIC_ACTION'/);
    expect(err.key).toBe("rules.HEROIC_ACTION.fan_out.to");
  });

  it("keeps unknown predicate types for runtime reporting", () => {
    const config = defaultConfig({
      resolverMaps: { pair_predicates: { vibing: { type: "shared_playlist" } } },
    });
    expect(config.resolverMaps.pair_predicates.vibing).toEqual({ type: "unsupported", token: "shared_playlist" });
  });

  it("rejects a known predicate type with missing fields", () => {
    expect(() => defaultConfig({ resolverMaps: { pair_predicates: { odd: { type: "has_flag" } } } })).toThrow(
      "malformed 'has_flag' predicate",
    );
  });
});

import { describe, it, expect } from "vitest";
import { QueryPayloadError } from "../../src/core/errors.js";
import { includeOrderOf, parseQueryPayload } from "../../src/core/query-schema.js";

type Payload = { any_of?: Payload[]; all_of?: Array<{ category: string; values: string[] }> };

function nested(wraps: number): Payload {
  let payload: Payload = { all_of: [{ category: "mood", values: ["calm"] }] };
  for (let i = 0; i < wraps; i++) {
    payload = { any_of: [payload] };
  }
  return payload;
}

describe("parseQueryPayload", () => {
  it("normalizes filters and accepts both key styles", () => {
    const group = parseQueryPayload({
      all_of: [{ category: "Mood", values: ["Calme", "calme", " "] }],
      anyOf: [{ allOf: [{ category: "owner", values: "Enfants, papa" }] }],
      none_of: [{ category: "genre", values: ["Metal"] }]
    });

    expect(group).toEqual({
      allOf: [{ category: "mood", values: ["calme"] }],
      anyOf: [{ allOf: [{ category: "owner", values: ["enfants", "papa"] }], anyOf: [], noneOf: [] }],
      noneOf: [{ category: "genre", values: ["metal"] }]
    });
  });

  it("drops filters with no usable values", () => {
    const group = parseQueryPayload({ all_of: [{ category: "mood", values: [] }, { category: " ", values: ["x"] }] });

    expect(group.allOf).toEqual([]);
  });

  it("reports every shape problem with its path", () => {
    try {
      parseQueryPayload({ all_of: [{ category: 3, values: ["a"] }], extra: true });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(QueryPayloadError);
      if (!(error instanceof QueryPayloadError)) return;
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^all_of\.0\.category: /);
      expect(error.exitCode).toBe(9);
    }
  });

  it("accepts nesting up to the depth limit", () => {
    expect(() => parseQueryPayload(nested(15))).not.toThrow();
  });

  it("rejects nesting beyond the depth limit", () => {
    expect(() => parseQueryPayload(nested(16))).toThrow("query nesting exceeds 16 levels");
  });

  it("rejects very deep nesting as a payload error", () => {
    expect(() => parseQueryPayload(nested(20000))).toThrow(QueryPayloadError);
  });
});

describe("includeOrderOf", () => {
  it("lists top-level allOf categories once each", () => {
    const group = parseQueryPayload({
      all_of: [
        { category: "owner", values: ["papa"] },
        { category: "mood", values: ["calm"] },
        { category: "owner", values: ["maman"] }
      ],
      any_of: [{ all_of: [{ category: "genre", values: ["jazz"] }] }]
    });

    expect(includeOrderOf(group)).toEqual(["owner", "mood"]);
  });
});

import { describe, expect, it } from "vitest";
import { parsePipelineRequest } from "../../parsers/request-schema";
import { RequestValidationError } from "../../errors";

function fieldsOf(body: unknown): string[] {
  try {
    parsePipelineRequest(body);
  } catch (error) {
    if (error instanceof RequestValidationError) {
      return error.fields.map((issue) => issue.field);
    }
    throw error;
  }
  return [];
}

describe("parsePipelineRequest", () => {
  it("accepts a plain-string dietary profile", () => {
    const request = parsePipelineRequest({ location: " Chicago ", dietary_profile: "Gluten-Free", mission: "pizza" });

    expect(request).toEqual({
      location: "Chicago",
      mission: "pizza",
      dietaryProfile: { restrictions: ["gluten-free"], severity: "intolerance" }
    });
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.dietaryProfile.restrictions)).toBe(true);
  });

  it("merges restrictions and type tags without duplicates", () => {
    const request = parsePipelineRequest({
      location: "Austin, TX",
      mission: "granola",
      dietary_profile: { restrictions: ["peanut"], type: ["Peanut", "sesame"], severity: "Allergy" }
    });

    expect(request.dietaryProfile).toEqual({ restrictions: ["peanut", "sesame"], severity: "allergy" });
  });

  it("splits comma separated form values", () => {
    const request = parsePipelineRequest({ location: "Denver", dietary_profile: "vegan, soy", mission: "tacos" });

    expect(request.dietaryProfile.restrictions).toEqual(["vegan", "soy"]);
  });

  it("reads a top-level severity sent beside a plain-string profile", () => {
    const request = parsePipelineRequest({
      location: "Chicago",
      dietary_profile: "peanut",
      severity: "Anaphylactic",
      mission: "bakery"
    });

    expect(request.dietaryProfile).toEqual({ restrictions: ["peanut"], severity: "anaphylactic" });
  });

  it("keeps the severity inside a structured profile over a top-level one", () => {
    const request = parsePipelineRequest({
      location: "Chicago",
      dietary_profile: { type: "peanut", severity: "allergy" },
      severity: "preference",
      mission: "bakery"
    });

    expect(request.dietaryProfile.severity).toBe("allergy");
  });

  it("reports a missing location by field", () => {
    expect(() => parsePipelineRequest({ dietary_profile: "vegan", mission: "tacos" })).toThrow(RequestValidationError);
    try {
      parsePipelineRequest({ dietary_profile: "vegan", mission: "tacos" });
    } catch (error) {
      expect(error).toMatchObject({ fields: [{ field: "location", message: "location is required" }] });
    }
  });

  it("requires at least one restriction tag", () => {
    expect(fieldsOf({ location: "Chicago", mission: "pizza", dietary_profile: {} })).toEqual(["dietary_profile.type"]);
  });

  it("rejects unknown severities", () => {
    expect(
      fieldsOf({ location: "Chicago", mission: "pizza", dietary_profile: { type: "peanut", severity: "extreme" } })
    ).toEqual(["dietary_profile.severity"]);
  });

  it("lists every missing field for an empty body", () => {
    expect(fieldsOf(null)).toEqual(["location", "dietary_profile", "mission"]);
  });
});

import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../../app";
import { CHICAGO_HITS, buildDeps, scriptedModel, staticSearch, vetterReply } from "../helpers/fakes";

const BODY = { location: "Chicago", dietary_profile: { type: "gluten-free" }, mission: "pizza" };

const VETTER_REPLY = vetterReply([
  { name: "Dough Bros", evidence: "Dedicated oven.", source: "https://example.test/dough-bros", location: "Chicago, IL" }
]);

function buildApp(replies: Parameters<typeof scriptedModel>[0]) {
  const { model } = scriptedModel(replies);
  const { provider } = staticSearch(CHICAGO_HITS);
  return createApp(buildDeps(model, provider));
}

describe("POST /search", () => {
  it("returns the pipeline payload", async () => {
    const app = buildApp({
      router: "RESTAURANT",
      vetter: VETTER_REPLY,
      auditor: JSON.stringify({ score: 61, annotations: [{ name: "Dough Bros", status: "verified", note: "Certified." }] })
    });

    const response = await request(app).post("/search").send(BODY);

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      status: "ok",
      track: "RESTAURANT",
      candidates: [
        {
          name: "Dough Bros",
          evidence: "Dedicated oven.",
          source: "https://example.test/dough-bros",
          location: "210 W Kinzie St, Chicago, IL",
          flagged: false
        }
      ],
      audit: {
        score: 61,
        verdict: "yellow",
        annotations: [{ candidate: "Dough Bros", status: "verified", note: "Certified." }]
      }
    });
  });

  it("accepts form-encoded submissions", async () => {
    const app = buildApp({ router: "GROCERY", vetter: vetterReply([]) });

    const response = await request(app)
      .post("/search")
      .type("form")
      .send({ location: "Chicago", dietary_profile: "gluten-free", mission: "crackers" });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      status: "empty",
      track: "GROCERY",
      candidates: [],
      audit: { score: null, verdict: null, annotations: [] },
      note: "No options in Chicago met the gluten-free profile."
    });
  });

  it("rejects malformed input with field-level messages", async () => {
    const app = buildApp({});

    const response = await request(app).post("/search").send({ dietary_profile: "vegan", mission: "tacos" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: {
        kind: "validation_error",
        message: "Request body is invalid.",
        fields: [{ field: "location", message: "location is required" }]
      }
    });
  });

  it("rejects a body that is not valid JSON", async () => {
    const app = buildApp({});

    const response = await request(app)
      .post("/search")
      .set("Content-Type", "application/json")
      .send('{"location":');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: { kind: "validation_error", message: "Request body is not valid JSON." }
    });
  });

  it("answers 422 when the request cannot be classified", async () => {
    const app = buildApp({ router: "unsure" });

    const response = await request(app).post("/search").send(BODY);

    expect(response.status).toBe(422);
    expect(response.body.error.kind).toBe("classification_error");
  });

  it("answers 502 when a stage returns unreadable output", async () => {
    const app = buildApp({ router: "RESTAURANT", vetter: "no json here" });

    const response = await request(app).post("/search").send(BODY);

    expect(response.status).toBe(502);
    expect(response.body).toEqual({
      error: { kind: "parse_error", message: "The vetter stage returned a response that could not be read." }
    });
  });

  it("answers 503 with a generic message when the provider fails", async () => {
    const app = buildApp({ router: "RESTAURANT", vetter: VETTER_REPLY, auditor: new Error("ECONNRESET") });

    const response = await request(app).post("/search").send(BODY);

    expect(response.status).toBe(503);
    expect(response.body).toEqual({
      error: { kind: "upstream_dependency_error", message: "Service unavailable. Please try again later." }
    });
  });
});

describe("GET /health", () => {
  it("reports liveness", async () => {
    const response = await request(buildApp({})).get("/health");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
  });
});

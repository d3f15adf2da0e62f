import { describe, expect, it } from "vitest";
import { alignAnnotations, auditCandidates, deriveVerdict } from "../../agent/auditor";
import { ParseError, UpstreamDependencyError } from "../../errors";
import { CHICAGO_REQUEST, buildCandidate, buildDeps, scriptedModel, staticSearch } from "../helpers/fakes";

const CANDIDATES = [buildCandidate("Dough Bros"), buildCandidate("Crust Lab"), buildCandidate("Slice Society")];

function auditDeps(reply: string | Error) {
  const { model, complete } = scriptedModel({ auditor: reply });
  const { provider } = staticSearch([]);
  return { deps: buildDeps(model, provider), complete };
}

describe("deriveVerdict", () => {
  const thresholds = { greenThreshold: 75, redThreshold: 50 };

  it("maps scores onto the traffic light", () => {
    expect(deriveVerdict(75, thresholds)).toBe("green");
    expect(deriveVerdict(74, thresholds)).toBe("yellow");
    expect(deriveVerdict(50, thresholds)).toBe("yellow");
    expect(deriveVerdict(49, thresholds)).toBe("red");
  });
});

describe("auditCandidates", () => {
  it("scores, annotates every candidate and moves flagged entries last", async () => {
    const { deps } = auditDeps(
      JSON.stringify({
        score: "82%",
        annotations: [
          { name: "crust lab", status: "Insufficient Evidence", note: "No allergen statement found." },
          { name: "Dough Bros", status: "verified", note: "Dedicated gluten-free oven." },
          { name: "Mystery Pizza", status: "unsafe", note: "Shared fryer." }
        ]
      })
    );

    const { report, candidates } = await auditCandidates(deps, CHICAGO_REQUEST, CANDIDATES);

    expect(report.score).toBe(82);
    expect(report.verdict).toBe("green");
    expect(candidates.map((candidate) => [candidate.name, candidate.flagged])).toEqual([
      ["Dough Bros", false],
      ["Crust Lab", true],
      ["Slice Society", true]
    ]);
    expect(report.annotations).toEqual([
      { candidate: "Dough Bros", status: "verified", note: "Dedicated gluten-free oven." },
      { candidate: "Crust Lab", status: "insufficient_evidence", note: "No allergen statement found." },
      { candidate: "Slice Society", status: "unsafe", note: "Shared fryer." }
    ]);
  });

  it("marks candidates the auditor skipped as unreviewed", async () => {
    const { deps } = auditDeps(
      JSON.stringify({ score: 40, annotations: [{ name: "Dough Bros", status: "verified", note: "Certified." }] })
    );

    const { report, candidates } = await auditCandidates(deps, CHICAGO_REQUEST, CANDIDATES);

    expect(report.verdict).toBe("red");
    expect(report.annotations).toHaveLength(CANDIDATES.length);
    expect(report.annotations.map((annotation) => annotation.status)).toEqual(["verified", "unreviewed", "unreviewed"]);
    expect(candidates.map((candidate) => candidate.name)).toEqual(["Dough Bros", "Crust Lab", "Slice Society"]);
  });

  it("clamps out-of-range scores", async () => {
    const { deps } = auditDeps(JSON.stringify({ score: 140, annotations: [] }));

    const { report } = await auditCandidates(deps, CHICAGO_REQUEST, CANDIDATES);

    expect(report.score).toBe(100);
  });

  it("raises a ParseError when the score is missing", async () => {
    const { deps } = auditDeps(JSON.stringify({ annotations: [] }));

    const error = await auditCandidates(deps, CHICAGO_REQUEST, CANDIDATES).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ stage: "auditor" });
  });

  it("surfaces provider failures without fabricating a report", async () => {
    const { deps, complete } = auditDeps(new Error("socket hang up"));

    const error = await auditCandidates(deps, CHICAGO_REQUEST, CANDIDATES).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamDependencyError);
    expect(error).toMatchObject({ stage: "auditor", message: "auditor stage upstream call failed: socket hang up" });
    expect(complete).toHaveBeenCalledTimes(1);
  });
});

describe("alignAnnotations", () => {
  it("never returns more annotations than candidates", () => {
    const annotations = alignAnnotations(
      [buildCandidate("Dough Bros")],
      [
        { name: "Dough Bros", status: "verified", note: "" },
        { name: "Extra Place", status: "unsafe", note: "" }
      ]
    );

    expect(annotations).toEqual([{ candidate: "Dough Bros", status: "verified", note: "" }]);
  });

  it("falls back to position for annotations with unfamiliar names", () => {
    const annotations = alignAnnotations(
      [buildCandidate("Dough Bros"), buildCandidate("Crust Lab")],
      [
        { name: "Dough Bros", status: "verified", note: "" },
        { name: "Crust Laboratory", status: "unsafe", note: "Flour on every surface." }
      ]
    );

    expect(annotations[1]).toEqual({ candidate: "Crust Lab", status: "unsafe", note: "Flour on every surface." });
  });
});

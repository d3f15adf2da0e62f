import { z } from "zod";
import { RequestValidationError } from "../errors";
import { SEVERITIES, type PipelineRequest } from "../types";

const restrictionTag = z
  .string()
  .trim()
  .min(1, "restriction tags must be non-empty")
  .max(60)
  .transform((value) => value.toLowerCase());

const restrictionList = z.preprocess(
  (value) =>
    typeof value === "string"
      ? value
          .split(",")
          .map((part) => part.trim())
          .filter((part) => part.length > 0)
      : value,
  z.array(restrictionTag).min(1, "at least one restriction is required").max(10)
);

const severity = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
  z.enum(SEVERITIES).default("intolerance")
);

const StructuredProfileSchema = z
  .object({
    type: restrictionList.optional(),
    restrictions: restrictionList.optional(),
    severity
  })
  .superRefine((profile, ctx) => {
    if (!profile.type && !profile.restrictions) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["type"],
        message: "type or restrictions is required"
      });
    }
  })
  .transform((profile) => ({
    restrictions: dedupe([...(profile.restrictions ?? []), ...(profile.type ?? [])]),
    severity: profile.severity
  }));

const DietaryProfileSchema = z.preprocess(
  (value) => (typeof value === "string" || Array.isArray(value) ? { type: value } : value),
  StructuredProfileSchema
);

/** Form posts carry severity beside a plain-string profile; fold it into the profile. */
function foldTopLevelSeverity(body: unknown): unknown {
  if (typeof body !== "object" || body === null || !("dietary_profile" in body) || !("severity" in body)) {
    return body;
  }
  const { dietary_profile: profile, severity: topLevel } = body;
  if (topLevel === undefined || !(typeof profile === "string" || Array.isArray(profile))) {
    return body;
  }
  return { ...body, dietary_profile: { type: profile, severity: topLevel } };
}

const SearchRequestSchema = z.object({
  location: z.string({ required_error: "location is required" }).trim().min(2, "location is too short").max(120),
  dietary_profile: DietaryProfileSchema,
  mission: z.string({ required_error: "mission is required" }).trim().min(1, "mission is required").max(500)
});

const SearchBodySchema = z.preprocess(foldTopLevelSeverity, SearchRequestSchema);

export function parsePipelineRequest(body: unknown): PipelineRequest {
  const result = SearchBodySchema.safeParse(body ?? {});
  if (!result.success) {
    const fields = result.error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join(".") : "body",
      message: issue.message
    }));
    throw new RequestValidationError(fields);
  }

  const { location, dietary_profile: profile, mission } = result.data;
  return Object.freeze({
    location,
    mission,
    dietaryProfile: Object.freeze({
      restrictions: Object.freeze([...profile.restrictions]),
      severity: profile.severity
    })
  });
}

function dedupe(values: string[]): string[] {
  return Array.from(new Set(values));
}

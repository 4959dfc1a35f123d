import type { ZodError } from "zod";
import {
  DirectiveDocumentSchema,
  FlatDocumentSchema,
  type DesignDocument,
} from "./schemas.js";

export type SchemaIssue = { path: string; message: string };

export type ShapeResult =
  | { success: true; data: DesignDocument }
  | { success: false; issues: SchemaIssue[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `["preview_directive", "events", 2, "stage"]` -> `preview_directive.events[2].stage` */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  if (!path.length) return "(document)";
  return path.reduce<string>((acc, seg) => {
    if (typeof seg === "number") return `${acc}[${seg}]`;
    return acc ? `${acc}.${seg}` : seg;
  }, "");
}

export function describeIssues(error: ZodError): SchemaIssue[] {
  return error.issues.map((issue) => ({
    path: formatIssuePath(issue.path),
    message: issue.message,
  }));
}

/**
 * Picks the document shape and validates it.
 * - `preview_directive` marks the directive form; a top-level `status` next to it is a mixed document.
 * - otherwise `status`/`headline` mark the flat form.
 */
export function parseDesignDocument(raw: unknown): ShapeResult {
  if (!isRecord(raw)) {
    return {
      success: false,
      issues: [{ path: "(document)", message: "expected a JSON object at the document root" }],
    };
  }

  if ("preview_directive" in raw) {
    if ("status" in raw) {
      return {
        success: false,
        issues: [
          {
            path: "status",
            message:
              "status cannot be combined with preview_directive; directive documents derive status from their events",
          },
        ],
      };
    }
    const parsed = DirectiveDocumentSchema.safeParse(raw);
    return parsed.success
      ? { success: true, data: { kind: "directive", document: parsed.data } }
      : { success: false, issues: describeIssues(parsed.error) };
  }

  if ("status" in raw || "headline" in raw) {
    const parsed = FlatDocumentSchema.safeParse(raw);
    return parsed.success
      ? { success: true, data: { kind: "flat", document: parsed.data } }
      : { success: false, issues: describeIssues(parsed.error) };
  }

  return {
    success: false,
    issues: [
      {
        path: "(document)",
        message:
          "expected a flat document ({status, headline, signals, history, reasoning}) or a directive document ({system_name, preview_directive: {scenario, events}})",
      },
    ],
  };
}

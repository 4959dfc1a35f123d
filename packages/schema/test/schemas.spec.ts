import { describe, it, expect } from "vitest";
import {
  EventSchema,
  SignalSchema,
  StatusCodeEnum,
  parseDesignDocument,
  formatIssuePath,
} from "../src/index.js";

describe("StatusCodeEnum", () => {
  it("accepts the three status codes", () => {
    for (const code of ["OK", "Warning", "Action"]) {
      expect(StatusCodeEnum.safeParse(code).success).toBe(true);
    }
  });

  it("rejects other strings instead of coercing them", () => {
    const parsed = StatusCodeEnum.safeParse("Unknown");
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0].message).toBe("expected one of OK, Warning, Action");
    }
    expect(StatusCodeEnum.safeParse("ok").success).toBe(false);
  });
});

describe("EventSchema", () => {
  const base = { title: "Morning check", description: "Review overnight alerts", stage: 3, type: "check" };

  it("defaults both flags to false", () => {
    const parsed = EventSchema.parse(base);
    expect(parsed.human_gate).toBe(false);
    expect(parsed.safety_trigger).toBe(false);
    expect(parsed.input).toBeUndefined();
  });

  it("keeps surrounding whitespace but rejects blank text", () => {
    const parsed = EventSchema.parse({ ...base, title: "  Morning check  ", type: " check " });
    expect(parsed.title).toBe("  Morning check  ");
    expect(parsed.type).toBe(" check ");

    const blank = EventSchema.safeParse({ ...base, title: "   " });
    expect(blank.success).toBe(false);
    if (!blank.success) {
      expect(blank.error.issues[0].message).toBe("expected title to be a non-empty string");
    }
  });

  it("accepts display hints and bounds progress to 0..100", () => {
    const parsed = EventSchema.parse({ ...base, icon: "🧯", progress: 40, action_label: "Open" });
    expect(parsed.icon).toBe("🧯");
    expect(parsed.progress).toBe(40);
    expect(parsed.action_label).toBe("Open");
    for (const progress of [-1, 101, "50"]) {
      expect(EventSchema.safeParse({ ...base, progress }).success).toBe(false);
    }
  });

  it("rejects stages outside 1..10 and fractional stages", () => {
    for (const stage of [0, 11, 2.5, -1]) {
      expect(EventSchema.safeParse({ ...base, stage }).success).toBe(false);
    }
    expect(EventSchema.safeParse({ ...base, stage: 1 }).success).toBe(true);
    expect(EventSchema.safeParse({ ...base, stage: 10 }).success).toBe(true);
  });

  it("rejects a stage given as a string", () => {
    const parsed = EventSchema.safeParse({ ...base, stage: "3" });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0].message).toBe("expected an integer stage between 1 and 10");
    }
  });

  it("requires title, description, stage and type", () => {
    const parsed = EventSchema.safeParse({});
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      const paths = parsed.error.issues.map((i) => i.path.join("."));
      expect(paths).toEqual(["title", "description", "stage", "type"]);
    }
  });
});

describe("SignalSchema", () => {
  it("keeps numeric and string values as given", () => {
    expect(SignalSchema.parse({ title: "Uptime", value: 99.5, state: "OK" }).value).toBe(99.5);
    expect(SignalSchema.parse({ title: "Queue", value: "12 open", state: "Warning" }).value).toBe("12 open");
  });
});

describe("parseDesignDocument", () => {
  it("recognizes the flat form", () => {
    const result = parseDesignDocument({ status: "OK", headline: "All quiet" });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.kind).toBe("flat");
    }
  });

  it("recognizes the directive form", () => {
    const result = parseDesignDocument({
      system_name: "Line Ops",
      preview_directive: { scenario: "Night shift", events: [] },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.kind).toBe("directive");
    }
  });

  it("rejects a document mixing status with preview_directive", () => {
    const result = parseDesignDocument({
      status: "OK",
      headline: "H",
      system_name: "Line Ops",
      preview_directive: { events: [] },
    });
    expect(result).toEqual({
      success: false,
      issues: [
        {
          path: "status",
          message:
            "status cannot be combined with preview_directive; directive documents derive status from their events",
        },
      ],
    });
  });

  it("rejects documents matching neither shape", () => {
    const result = parseDesignDocument({ signals: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0].path).toBe("(document)");
    }
  });

  it("rejects non-object roots", () => {
    for (const raw of [null, [], "text", 42]) {
      const result = parseDesignDocument(raw);
      expect(result.success).toBe(false);
    }
  });

  it("reports the nested path of a bad event stage", () => {
    const result = parseDesignDocument({
      system_name: "Line Ops",
      preview_directive: {
        events: [
          { title: "A", description: "a", stage: 1, type: "t" },
          { title: "B", description: "b", stage: 11, type: "t" },
        ],
      },
    });
    expect(result).toEqual({
      success: false,
      issues: [{ path: "preview_directive.events[1].stage", message: "expected an integer stage between 1 and 10" }],
    });
  });
});

describe("formatIssuePath", () => {
  it("joins keys with dots and indexes with brackets", () => {
    expect(formatIssuePath(["signals", 0, "state"])).toBe("signals[0].state");
    expect(formatIssuePath([])).toBe("(document)");
  });
});

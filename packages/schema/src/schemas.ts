import { z } from "zod";

const STAGE_MESSAGE = "expected an integer stage between 1 and 10";
const STATUS_MESSAGE = "expected one of OK, Warning, Action";

const requiredText = (label: string) =>
  z
    .string({
      required_error: `${label} is required (string)`,
      invalid_type_error: `expected ${label} to be a string`,
    })
    .refine((value) => value.trim().length > 0, `expected ${label} to be a non-empty string`);

const optionalText = (label: string) =>
  z.string({ invalid_type_error: `expected ${label} to be a string` }).optional();

const optionalFlag = (label: string) =>
  z.boolean({ invalid_type_error: `expected ${label} to be true or false` }).default(false);

/** Shared enums */
export const StatusCodeEnum = z.enum(["OK", "Warning", "Action"], {
  errorMap: (issue, ctx) =>
    ctx.data === undefined
      ? { message: `required: ${STATUS_MESSAGE}` }
      : { message: STATUS_MESSAGE },
});
export type StatusCode = z.infer<typeof StatusCodeEnum>;

export const StageSchema = z
  .number({ required_error: `stage is required (${STAGE_MESSAGE})`, invalid_type_error: STAGE_MESSAGE })
  .int(STAGE_MESSAGE)
  .min(1, STAGE_MESSAGE)
  .max(10, STAGE_MESSAGE);
export type Stage = z.infer<typeof StageSchema>;

const DisplayValueSchema = z.union([z.number().finite(), z.string()], {
  errorMap: () => ({ message: "expected a number or a string" }),
});

const ProgressSchema = z
  .number({ invalid_type_error: "expected progress to be a number between 0 and 100" })
  .min(0, "expected progress to be a number between 0 and 100")
  .max(100, "expected progress to be a number between 0 and 100")
  .optional();

/** One status tile in the Signal Cards section. */
export const SignalSchema = z.object({
  title: requiredText("title"),
  value: DisplayValueSchema,
  state: StatusCodeEnum,
  icon: optionalText("icon"),
  progress: ProgressSchema,
});
export type Signal = z.infer<typeof SignalSchema>;

export const HistoryEntrySchema = z.object({
  time: requiredText("time"),
  event: requiredText("event"),
  state: StatusCodeEnum,
});
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export const ReasoningSchema = z.object({
  coverage: optionalText("coverage"),
  notes: optionalText("notes"),
});
export type Reasoning = z.infer<typeof ReasoningSchema>;

/**
 * A scenario step from `preview_directive.events`.
 * `time`, `value`, `icon` and `progress` are display hints used when history and
 * signals are synthesized from events; `action_label` captions the One Thing button.
 */
export const EventSchema = z.object({
  title: requiredText("title"),
  description: z.string({
    required_error: "description is required (string)",
    invalid_type_error: "expected description to be a string",
  }),
  stage: StageSchema,
  type: requiredText("type"),
  input: optionalText("input"),
  output: optionalText("output"),
  reasoning: optionalText("reasoning"),
  constraint: optionalText("constraint"),
  human_gate: optionalFlag("human_gate"),
  safety_trigger: optionalFlag("safety_trigger"),
  time: optionalText("time"),
  value: DisplayValueSchema.optional(),
  icon: optionalText("icon"),
  progress: ProgressSchema,
  action_label: optionalText("action_label"),
});
export type DesignEvent = z.infer<typeof EventSchema>;

const VersionSchema = z
  .union([z.string(), z.number()], { errorMap: () => ({ message: "expected version to be a string or number" }) })
  .optional();

/** Presentation fields a directive document may carry to override derived content. */
const PresentationOverrides = {
  one_thing: optionalText("one_thing"),
  signals: z.array(SignalSchema, { invalid_type_error: "expected signals to be an array" }).optional(),
  history: z.array(HistoryEntrySchema, { invalid_type_error: "expected history to be an array" }).optional(),
  reasoning: ReasoningSchema.optional(),
};

export const FlatDocumentSchema = z.object({
  status: StatusCodeEnum,
  headline: requiredText("headline"),
  system_name: optionalText("system_name"),
  version: VersionSchema,
  ...PresentationOverrides,
});
export type FlatDocument = z.infer<typeof FlatDocumentSchema>;

export const PreviewDirectiveSchema = z.object(
  {
    scenario: optionalText("scenario"),
    events: z.array(EventSchema, {
      required_error: "events is required (array of events)",
      invalid_type_error: "expected events to be an array of events",
    }),
  },
  {
    required_error: "preview_directive is required",
    invalid_type_error: "expected preview_directive to be an object with scenario and events",
  }
);
export type PreviewDirective = z.infer<typeof PreviewDirectiveSchema>;

export const DirectiveDocumentSchema = z.object({
  system_name: requiredText("system_name"),
  version: VersionSchema,
  preview_directive: PreviewDirectiveSchema,
  headline: requiredText("headline").optional(),
  ...PresentationOverrides,
});
export type DirectiveDocument = z.infer<typeof DirectiveDocumentSchema>;

/** Resolved once at the boundary; nothing downstream branches on raw shapes again. */
export type DesignDocument =
  | { kind: "flat"; document: FlatDocument }
  | { kind: "directive"; document: DirectiveDocument };

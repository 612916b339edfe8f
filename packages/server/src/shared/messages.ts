import { z } from "zod";

// ---------------------------------------------------------------------------
// Client → server
// ---------------------------------------------------------------------------

export const ChatRoleSchema = z.enum(["user", "assistant"]);

export const ChatHistoryEntrySchema = z.object({
  role: ChatRoleSchema,
  content: z.string(),
});

export const FilePayloadSchema = z.object({
  name: z.string(),
  content: z.string(),
  contentType: z.string().default(""),
  fileType: z.string().default(""),
  size: z.number().int().nonnegative().default(0),
  isBase64: z.boolean().default(false),
});

const listOf = <T extends z.ZodTypeAny>(schema: T) =>
  z
    .array(schema)
    .nullish()
    .transform((value) => value ?? []);

export const WSPingMessageSchema = z.object({
  type: z.literal("ping"),
});

export const WSPongMessageSchema = z.object({
  type: z.literal("pong"),
  status: z.string().optional(),
});

export const ChatMessageRequestSchema = z.object({
  type: z.literal("message"),
  provider: z.string().default(""),
  model: z.string().default(""),
  prompt: z.string().default(""),
  history: listOf(ChatHistoryEntrySchema),
  files: listOf(FilePayloadSchema),
});

/**
 * Frames without a `type` are chat messages; older clients omit it.
 */
function defaultEnvelopeType(value: unknown): unknown {
  if (value && typeof value === "object" && !Array.isArray(value) && !("type" in value)) {
    return { ...value, type: "message" };
  }
  return value;
}

export const WSInboundMessageSchema = z.preprocess(
  defaultEnvelopeType,
  z.discriminatedUnion("type", [
    WSPingMessageSchema,
    WSPongMessageSchema,
    ChatMessageRequestSchema,
  ])
);

export type ChatRole = z.infer<typeof ChatRoleSchema>;
export type ChatHistoryEntry = z.infer<typeof ChatHistoryEntrySchema>;
export type FilePayload = z.infer<typeof FilePayloadSchema>;
export type ChatMessageRequest = z.infer<typeof ChatMessageRequestSchema>;
export type WSInboundMessage = z.infer<typeof WSInboundMessageSchema>;

/** What a client hands to `sendMessage`; the envelope type is added for it. */
export type ChatMessageInput = Omit<z.input<typeof ChatMessageRequestSchema>, "type">;

// ---------------------------------------------------------------------------
// Server → client
// ---------------------------------------------------------------------------

export const PongResponseSchema = z.object({
  type: z.literal("pong"),
  status: z.literal("ok"),
});

export const CompletedResponseSchema = z.object({
  type: z.literal("message"),
  status: z.literal("completed"),
  response: z.string(),
  isMarkdown: z.boolean(),
  provider: z.string(),
});

export const ErrorResponseSchema = z.object({
  type: z.literal("error"),
  status: z.literal("error"),
  response: z.string(),
});

export const ProgressResponseSchema = z.object({
  type: z.literal("progress"),
  status: z.literal("processing"),
  message: z.string(),
  current: z.number().int(),
  total: z.number().int(),
  percentage: z.number().int(),
});

export const WSOutboundMessageSchema = z.discriminatedUnion("type", [
  PongResponseSchema,
  CompletedResponseSchema,
  ErrorResponseSchema,
  ProgressResponseSchema,
]);

export type PongResponse = z.infer<typeof PongResponseSchema>;
export type CompletedResponse = z.infer<typeof CompletedResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
export type ProgressResponse = z.infer<typeof ProgressResponseSchema>;
export type WSOutboundMessage = z.infer<typeof WSOutboundMessageSchema>;

export function completedResponse(
  response: string,
  provider: string,
  isMarkdown: boolean
): CompletedResponse {
  return { type: "message", status: "completed", response, isMarkdown, provider };
}

export function errorResponse(response: string): ErrorResponse {
  return { type: "error", status: "error", response };
}

export function progressResponse(
  message: string,
  current: number,
  total: number,
  percentage: number
): ProgressResponse {
  return { type: "progress", status: "processing", message, current, total, percentage };
}

export const PONG_RESPONSE: PongResponse = { type: "pong", status: "ok" };

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * A chat message that names no provider can never be delivered, so it is
 * rejected instead of being queued for replay.
 */
export function hasRoutingField(payload: unknown): boolean {
  if (!payload || typeof payload !== "object") {
    return false;
  }
  if ("type" in payload && payload.type !== undefined && payload.type !== "message") {
    return true;
  }
  return (
    "provider" in payload &&
    typeof payload.provider === "string" &&
    payload.provider.trim().length > 0
  );
}

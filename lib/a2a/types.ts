import { z } from "zod";

export const textPartSchema = z.object({
  kind: z.literal("text"),
  text: z.string(),
});

export const partSchema = z.union([
  textPartSchema,
  z.object({ kind: z.string() }).passthrough(),
]);

export const messageSchema = z.object({
  kind: z.literal("message"),
  role: z.enum(["user", "agent"]),
  parts: z.array(partSchema),
  messageId: z.string(),
  contextId: z.string().optional(),
  taskId: z.string().optional(),
});

export const taskStateSchema = z.enum([
  "submitted",
  "working",
  "input-required",
  "completed",
  "canceled",
  "failed",
  "rejected",
  "auth-required",
  "unknown",
]);

export const artifactSchema = z.object({
  artifactId: z.string(),
  name: z.string().optional(),
  parts: z.array(partSchema),
});

export const taskSchema = z.object({
  kind: z.literal("task"),
  id: z.string(),
  contextId: z.string(),
  status: z.object({
    state: taskStateSchema,
    message: messageSchema.optional(),
    timestamp: z.string().optional(),
  }),
  artifacts: z.array(artifactSchema).optional(),
  history: z.array(messageSchema).optional(),
});

export const jsonRpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const sendMessageResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]),
  result: z.union([messageSchema, taskSchema]).optional(),
  error: jsonRpcErrorSchema.optional(),
});

export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number()]).nullable().default(null),
  method: z.string(),
  params: z.unknown().optional(),
});

export const sendMessageParamsSchema = z.object({
  message: messageSchema,
});

export const getTaskParamsSchema = z.object({
  id: z.string().min(1),
});

export type A2APart = z.infer<typeof partSchema>;
export type A2AMessage = z.infer<typeof messageSchema>;
export type A2ATask = z.infer<typeof taskSchema>;
export type JsonRpcError = z.infer<typeof jsonRpcErrorSchema>;

export interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: string | number | null;
  result?: unknown;
  error?: JsonRpcError;
}

export const JSON_RPC_ERRORS = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
  taskNotFound: -32001,
} as const;

export interface AgentSkill {
  id: string;
  name: string;
  description: string;
  tags: string[];
  examples?: string[];
}

export interface AgentCard {
  name: string;
  description: string;
  url: string;
  version: string;
  protocolVersion: string;
  defaultInputModes: string[];
  defaultOutputModes: string[];
  capabilities: { streaming: boolean };
  skills: AgentSkill[];
}

export function collectText(parts: A2APart[]): string {
  return parts
    .map((part) => (part.kind === "text" && "text" in part && typeof part.text === "string" ? part.text : ""))
    .filter(Boolean)
    .join("\n");
}

export function textMessage(
  role: A2AMessage["role"],
  text: string,
  ids: { messageId: string; contextId?: string; taskId?: string },
): A2AMessage {
  return {
    kind: "message",
    role,
    parts: [{ kind: "text", text }],
    messageId: ids.messageId,
    ...(ids.contextId ? { contextId: ids.contextId } : {}),
    ...(ids.taskId ? { taskId: ids.taskId } : {}),
  };
}

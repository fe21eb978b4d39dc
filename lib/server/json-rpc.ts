import { nanoid } from "nanoid";
import {
  JSON_RPC_ERRORS,
  collectText,
  getTaskParamsSchema,
  jsonRpcRequestSchema,
  sendMessageParamsSchema,
  type A2AMessage,
  type A2ATask,
  type JsonRpcResponse,
} from "@/lib/a2a/types";
import { InvalidSpecError, asErrorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logging/logger";
import type { TaskStore } from "@/lib/server/task-store";

const logger = createLogger("json-rpc");

export interface IncomingMessage {
  text: string;
  message: A2AMessage;
  contextId: string;
  taskId: string;
}

export type MessageHandler = (incoming: IncomingMessage) => Promise<A2ATask | A2AMessage>;

export interface JsonRpcHandlers {
  onMessage: MessageHandler;
  tasks: TaskStore;
}

type RequestId = string | number | null;

export function rpcResult(id: RequestId, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

export function rpcError(id: RequestId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return {
    jsonrpc: "2.0",
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  };
}

async function handleSendMessage(
  id: RequestId,
  params: unknown,
  handlers: JsonRpcHandlers,
): Promise<JsonRpcResponse> {
  const parsed = sendMessageParamsSchema.safeParse(params);
  if (!parsed.success) {
    return rpcError(id, JSON_RPC_ERRORS.invalidParams, "Invalid message/send params", parsed.error.issues);
  }

  const { message } = parsed.data;
  const incoming: IncomingMessage = {
    text: collectText(message.parts),
    message,
    contextId: message.contextId ?? nanoid(),
    taskId: message.taskId ?? nanoid(),
  };

  try {
    const result = await handlers.onMessage(incoming);
    if (result.kind === "task") {
      handlers.tasks.save(result);
    }
    return rpcResult(id, result);
  } catch (error) {
    if (error instanceof InvalidSpecError) {
      return rpcError(id, JSON_RPC_ERRORS.invalidParams, error.message, { issues: error.issues });
    }

    logger.error("message/send failed", { error: asErrorMessage(error) });
    return rpcError(id, JSON_RPC_ERRORS.internalError, asErrorMessage(error));
  }
}

export async function handleJsonRpc(body: unknown, handlers: JsonRpcHandlers): Promise<JsonRpcResponse> {
  const request = jsonRpcRequestSchema.safeParse(body);
  if (!request.success) {
    return rpcError(null, JSON_RPC_ERRORS.invalidRequest, "Invalid JSON-RPC request");
  }

  const { id, method, params } = request.data;

  switch (method) {
    case "message/send":
      return handleSendMessage(id, params, handlers);
    case "tasks/get": {
      const taskParams = getTaskParamsSchema.safeParse(params);
      if (!taskParams.success) {
        return rpcError(id, JSON_RPC_ERRORS.invalidParams, "Invalid tasks/get params");
      }

      const task = handlers.tasks.get(taskParams.data.id);
      return task
        ? rpcResult(id, task)
        : rpcError(id, JSON_RPC_ERRORS.taskNotFound, `Task not found: ${taskParams.data.id}`);
    }
    default:
      return rpcError(id, JSON_RPC_ERRORS.methodNotFound, `Method not found: ${method}`);
  }
}

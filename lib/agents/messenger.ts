import { nanoid } from "nanoid";
import {
  collectText,
  sendMessageResponseSchema,
  textMessage,
  type A2AMessage,
  type A2ATask,
} from "@/lib/a2a/types";
import { TransportError, asErrorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logging/logger";

const logger = createLogger("messenger");

export interface SendOptions {
  timeoutMs: number;
  contextId?: string;
}

export interface AgentReply {
  text: string;
  contextId: string | null;
  latencyMs: number;
}

export interface Messenger {
  send(url: string, text: string, options: SendOptions): Promise<AgentReply>;
}

function replyText(result: A2AMessage | A2ATask): string {
  if (result.kind === "message") {
    return collectText(result.parts);
  }

  const artifactText = (result.artifacts ?? []).map((artifact) => collectText(artifact.parts)).filter(Boolean);
  if (artifactText.length > 0) {
    return artifactText.join("\n");
  }

  if (result.status.message) {
    return collectText(result.status.message.parts);
  }

  const lastAgentMessage = (result.history ?? []).filter((message) => message.role === "agent").at(-1);
  return lastAgentMessage ? collectText(lastAgentMessage.parts) : "";
}

export function createMessenger(): Messenger {
  return {
    async send(url, text, options) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
      const startedAt = Date.now();
      const requestId = nanoid();

      const payload = {
        jsonrpc: "2.0",
        id: requestId,
        method: "message/send",
        params: {
          message: textMessage("user", text, {
            messageId: nanoid(),
            contextId: options.contextId,
          }),
        },
      };

      logger.info("Sending message to agent", { url, requestId, length: text.length });

      try {
        const response = await fetch(url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(payload),
          signal: controller.signal,
        });

        if (!response.ok) {
          throw new TransportError(url, `Agent responded with status ${response.status}`, response.status);
        }

        const parsed = sendMessageResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new TransportError(url, `Malformed agent response: ${parsed.error.message}`, response.status);
        }

        if (parsed.data.error) {
          throw new TransportError(
            url,
            `Agent returned error ${parsed.data.error.code}: ${parsed.data.error.message}`,
            response.status,
          );
        }

        const result = parsed.data.result;
        if (!result) {
          throw new TransportError(url, "Agent response carried no result", response.status);
        }

        return {
          text: replyText(result),
          contextId: result.contextId ?? null,
          latencyMs: Date.now() - startedAt,
        };
      } catch (error) {
        if (error instanceof TransportError) {
          throw error;
        }

        const message = controller.signal.aborted
          ? `Agent did not respond within ${options.timeoutMs}ms`
          : `Failed to reach agent: ${asErrorMessage(error)}`;
        throw new TransportError(url, message, null, { cause: error });
      } finally {
        clearTimeout(timeout);
      }
    },
  };
}

import { Hono } from "hono";
import { nanoid } from "nanoid";
import { JSON_RPC_ERRORS, textMessage, type A2AMessage, type A2ATask } from "@/lib/a2a/types";
import type { GroundtruthAgent } from "@/lib/agents/groundtruth";
import type { Messenger } from "@/lib/agents/messenger";
import { getAssessmentEventsAfter } from "@/lib/assessments/events";
import { runPersistedAssessment, startAssessmentInBackground } from "@/lib/assessments/orchestrator";
import { parseAssessmentRequest, parseAssessmentRequestText } from "@/lib/assessments/request";
import { createAssessment, getAssessment, listAssessments } from "@/lib/assessments/service";
import { InvalidSpecError, asErrorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logging/logger";
import { buildAssessorCard, buildGroundtruthCard } from "@/lib/server/agent-card";
import { handleJsonRpc, rpcError, type JsonRpcHandlers } from "@/lib/server/json-rpc";
import { TaskStore } from "@/lib/server/task-store";
import type { TaskGenerationOptions } from "@/lib/tasks/types";
import type { ExploitValidator } from "@/lib/validation/validator";

const logger = createLogger("server");

export const AGENT_CARD_PATH = "/.well-known/agent-card.json";

export interface AssessorAppDeps {
  cardUrl: string;
  messenger: Messenger;
  validator: ExploitValidator;
  agentTimeoutMs: number;
  taskOptions?: TaskGenerationOptions;
  tasks?: TaskStore;
}

export interface GroundtruthAppDeps {
  cardUrl: string;
  agent: GroundtruthAgent;
  tasks?: TaskStore;
}

function mountJsonRpc(app: Hono, handlers: JsonRpcHandlers): void {
  app.post("/", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json<unknown>();
    } catch (error) {
      logger.debug("Rejected malformed JSON-RPC body", { error: asErrorMessage(error) });
      return c.json(rpcError(null, JSON_RPC_ERRORS.parseError, "Parse error"));
    }

    return c.json(await handleJsonRpc(body, handlers));
  });
}

export function createAssessorApp(deps: AssessorAppDeps): Hono {
  const app = new Hono();
  const tasks = deps.tasks ?? new TaskStore();
  const card = buildAssessorCard(deps.cardUrl);
  const assessmentDeps = {
    messenger: deps.messenger,
    validator: deps.validator,
    agentTimeoutMs: deps.agentTimeoutMs,
    taskOptions: deps.taskOptions,
  };

  app.get("/health", (c) => c.json({ status: "ok" }));
  app.get(AGENT_CARD_PATH, (c) => c.json(card));

  mountJsonRpc(app, {
    tasks,
    async onMessage({ text, message, contextId, taskId }): Promise<A2ATask> {
      const { request, payload } = parseAssessmentRequestText(text);
      const history: A2AMessage[] = [message];
      const { assessmentId } = await createAssessment(request, payload);

      const run = await runPersistedAssessment(assessmentId, request, {
        ...assessmentDeps,
        onStatus: (update) => {
          history.push(textMessage("agent", update.message, { messageId: nanoid(), contextId, taskId }));
        },
      });

      const summary = `Winner: ${run.outcome.winner} (task ${run.outcome.detail.task_id}, ${run.outcome.detail.status})`;

      return {
        kind: "task",
        id: taskId,
        contextId,
        status: {
          state: run.failed ? "failed" : "completed",
          message: textMessage("agent", summary, { messageId: nanoid(), contextId, taskId }),
          timestamp: new Date().toISOString(),
        },
        artifacts: [
          {
            artifactId: nanoid(),
            name: "Result",
            parts: [{ kind: "text", text: JSON.stringify(run.outcome, null, 2) }],
          },
        ],
        history,
      };
    },
  });

  app.post("/api/assessments", async (c) => {
    let payload: unknown;
    try {
      payload = await c.req.json<unknown>();
    } catch {
      return c.json({ error: "Request body must be JSON" }, 400);
    }

    try {
      const request = parseAssessmentRequest(payload);
      const { assessmentId } = await createAssessment(request, payload);
      void startAssessmentInBackground(assessmentId, request, assessmentDeps);

      return c.json({ assessmentId }, 201);
    } catch (error) {
      if (error instanceof InvalidSpecError) {
        return c.json({ error: error.message, issues: error.issues }, 400);
      }
      throw error;
    }
  });

  app.get("/api/assessments", async (c) => {
    const assessments = await listAssessments(30);
    return c.json({ assessments });
  });

  app.get("/api/assessments/:id", async (c) => {
    const assessment = await getAssessment(c.req.param("id"));
    if (!assessment) {
      return c.json({ error: "Assessment not found" }, 404);
    }
    return c.json({ assessment });
  });

  app.get("/api/assessments/:id/events", async (c) => {
    const assessmentId = c.req.param("id");
    const after = Number(c.req.query("after") ?? "0");
    if (!Number.isInteger(after) || after < 0) {
      return c.json({ error: "after must be a non-negative integer" }, 400);
    }

    const events = await getAssessmentEventsAfter(assessmentId, after);
    return c.json({ events, nextCursor: events.at(-1)?.id ?? after });
  });

  app.onError((error, c) => {
    logger.error("Unhandled request error", { path: c.req.path, error: asErrorMessage(error) });
    return c.json({ error: asErrorMessage(error) }, 500);
  });

  return app;
}

export function createGroundtruthApp(deps: GroundtruthAppDeps): Hono {
  const app = new Hono();
  const card = buildGroundtruthCard(deps.cardUrl);

  app.get("/health", (c) => c.json({ status: "ok" }));
  app.get(AGENT_CARD_PATH, (c) => c.json(card));

  mountJsonRpc(app, {
    tasks: deps.tasks ?? new TaskStore(),
    async onMessage({ text, contextId, taskId }): Promise<A2AMessage> {
      const reply = await deps.agent.respond(text);
      return textMessage("agent", reply, { messageId: nanoid(), contextId, taskId });
    },
  });

  return app;
}

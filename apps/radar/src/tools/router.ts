import type { ToolLimits } from "@/config/env";
import { logger } from "@/lib/logger";
import { AnalysisService } from "@/services/analysis.service";
import {
  InvalidInputError,
  RadarError,
  RadarErrorPayload,
} from "@/utils/errors";
import * as Joi from "joi";
import {
  createToolDefinitions,
  RegisteredTool,
  ToolName,
  ToolResult,
} from "./definitions";

export type ToolOutcome =
  | { ok: true; tool: string; result: ToolResult }
  | { ok: false; tool: string; error: RadarErrorPayload };

export interface ToolDescription {
  name: ToolName;
  description: string;
  parameters: Joi.Description;
}

/**
 * Maps a tool name and raw arguments onto an analysis operation. Known
 * failures come back as `{ ok: false }` outcomes; anything else is a bug and
 * is rethrown.
 */
export class ToolRouter {
  private readonly tools: Map<string, RegisteredTool>;
  private readonly log = logger.child("tools");

  constructor(
    private readonly service: AnalysisService,
    limits: ToolLimits
  ) {
    this.tools = new Map(
      createToolDefinitions(limits).map((tool) => [tool.name, tool])
    );
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDescription[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.schema.describe(),
    }));
  }

  async run(name: string, args: unknown): Promise<ToolOutcome> {
    const start = Date.now();
    try {
      const tool = this.tools.get(name);
      if (!tool) {
        throw new InvalidInputError(`Unknown tool: ${name}`);
      }
      const result = await tool.invoke(this.service, args);
      this.log.info(`Tool ${name} completed`, {
        tool: name,
        durationMs: Date.now() - start,
      });
      return { ok: true, tool: name, result };
    } catch (err) {
      if (!(err instanceof RadarError)) throw err;

      const payload = err.toPayload();
      const context = {
        tool: name,
        durationMs: Date.now() - start,
        reason: payload.reason,
      };
      if (payload.type === "InvalidInput") {
        this.log.warn(`Tool ${name} rejected: ${payload.message}`, context);
      } else {
        this.log.error(`Tool ${name} failed: ${payload.message}`, {
          ...context,
          error: err,
        });
      }
      return { ok: false, tool: name, error: payload };
    }
  }
}

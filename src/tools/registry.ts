import { toJSONSchema, type z } from "zod";
import { InvalidArgumentsError, UnknownOperationError } from "../errors.js";
import type { TextResult, Tool, ToolDefinition, ToolInputSchema } from "./types.js";

interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: z.ZodType;
  run: (args: unknown) => Promise<unknown>;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

// Input side of the schema, so defaulted fields are advertised as optional
function toInputSchema(schema: z.ZodType): ToolInputSchema {
  const json = toJSONSchema(schema, { io: "input" });
  return {
    type: "object",
    ...(json.properties ? { properties: json.properties } : {}),
    ...(json.required ? { required: json.required } : {}),
  };
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  register<TInput, TOutput>(tool: Tool<TInput, TOutput>): this {
    this.tools.set(tool.name, {
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      run: async (args) => {
        const parsed = tool.inputSchema.safeParse(args);
        if (!parsed.success) {
          throw new InvalidArgumentsError(tool.name, formatIssues(parsed.error));
        }
        return tool.execute(parsed.data);
      },
    });
    return this;
  }

  /** Validates `args` against the tool's schema, then runs it. */
  async execute(name: string, args: unknown): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownOperationError(name);
    }
    return tool.run(args);
  }

  /**
   * Runs a tool and wraps its result as a single text item. Strings pass
   * through; any other result is serialized as compact JSON.
   */
  async invoke(name: string, args: unknown): Promise<TextResult> {
    const result = await this.execute(name, args);
    const text = typeof result === "string" ? result : JSON.stringify(result);
    return { content: [{ type: "text", text }] };
  }

  toDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool.inputSchema),
    }));
  }

  list(): string[] {
    return Array.from(this.tools.keys());
  }
}

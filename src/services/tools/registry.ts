// Tool Registry - Central registry for all available tools
// Tools are registered on startup; descriptors are frozen and read thereafter

import type { z } from 'zod';
import { createChildLogger } from '../../utils/logger.js';
import { objectSchema } from './schema.js';
import type {
  ObjectJsonSchema,
  OutputShape,
  PreparedCall,
  ToolDefinition,
  ToolDescriptor,
  ToolListing,
  ToolPayload,
} from './types.js';

const log = createChildLogger('registry');

export interface FunctionDefinition {
  name: string;
  description: string;
  parameters: ObjectJsonSchema;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(arguments)';
    return `${path}: ${issue.message}`;
  });
}

export class ToolRegistry {
  private tools: Map<string, ToolDescriptor> = new Map();

  /**
   * Register a tool. Re-registering a name replaces the prior descriptor;
   * there is no collision detection.
   */
  register<Shape extends z.ZodRawShape>(definition: ToolDefinition<Shape>): ToolDescriptor {
    if (this.tools.has(definition.name)) {
      log.warn({ tool: definition.name }, 'Tool already registered, overwriting');
    }

    const parameters = definition.parameters;
    const knownKeys = new Set(Object.keys(parameters.shape));
    const outputShape: OutputShape = definition.returns ?? {
      type: 'object',
      description: `Result from ${definition.name}`,
    };

    const descriptor: ToolDescriptor = Object.freeze({
      name: definition.name,
      description: definition.description,
      kind: definition.kind ?? 'utility',
      inputSchema: objectSchema(parameters),
      outputShape,
      timeoutMs: definition.timeoutMs,
      implementation: Object.freeze({
        prepare(raw: ToolPayload): PreparedCall {
          const unknownKeys = Object.keys(raw).filter(key => !knownKeys.has(key));
          if (unknownKeys.length > 0) {
            return { ok: false, issues: unknownKeys.map(key => `${key}: unexpected argument`) };
          }

          const parsed = parameters.safeParse(raw);
          if (!parsed.success) {
            return { ok: false, issues: formatIssues(parsed.error) };
          }

          const args = parsed.data;
          return {
            ok: true,
            // Sync and async handlers (and sync throws) all surface as a promise
            run: () => Promise.resolve().then(() => definition.execute(args)),
          };
        },
      }),
    });

    this.tools.set(definition.name, descriptor);
    return descriptor;
  }

  resolve(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDescriptor[] {
    return Array.from(this.tools.values());
  }

  toListing(): ToolListing[] {
    return this.list().map(tool => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema,
      output_shape: tool.outputShape,
    }));
  }

  // Function-calling format for the decision model, optionally limited to an allow-list
  toFunctionDefinitions(names?: readonly string[]): FunctionDefinition[] {
    const tools = names
      ? names.map(name => this.tools.get(name)).filter((tool): tool is ToolDescriptor => tool !== undefined)
      : this.list();

    return tools.map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    }));
  }
}

// Tool system types and interfaces
// A tool is declared once with a zod parameter schema; the registry derives its wire schema from it

import type { z } from 'zod';
import type { ErrorCode } from '../../utils/errors.js';

export type ToolPayload = Record<string, unknown>;

// discovery tools search, completion tools commit a user decision
export type ToolKind = 'discovery' | 'completion' | 'utility';

export type JsonSchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';

// `anyOf` nodes carry no `type` of their own
export type JsonSchema = {
  type?: JsonSchemaType;
  anyOf?: JsonSchema[];
  description?: string;
  enum?: string[];
  default?: unknown;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
};

export type ObjectJsonSchema = JsonSchema & {
  type: 'object';
  properties: Record<string, JsonSchema>;
  required: string[];
};

export type OutputShape = {
  type: JsonSchemaType;
  description: string;
};

export interface ToolDefinition<Shape extends z.ZodRawShape = z.ZodRawShape> {
  name: string;
  description: string;
  parameters: z.ZodObject<Shape>;
  returns?: OutputShape;
  kind?: ToolKind;
  timeoutMs?: number;
  execute(args: z.infer<z.ZodObject<Shape>>): ToolPayload | Promise<ToolPayload>;
}

export type PreparedCall =
  | { ok: true; run: () => Promise<ToolPayload> }
  | { ok: false; issues: string[] };

export interface ToolImplementation {
  prepare(raw: ToolPayload): PreparedCall;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly kind: ToolKind;
  readonly inputSchema: ObjectJsonSchema;
  readonly outputShape: OutputShape;
  readonly timeoutMs?: number;
  readonly implementation: ToolImplementation;
}

// Wire form of a descriptor (tool listing)
export interface ToolListing {
  name: string;
  description: string;
  input_schema: ObjectJsonSchema;
  output_shape: OutputShape;
}

export interface InvocationRequest {
  tool: string;
  arguments: ToolPayload;
}

export interface InvocationSuccess {
  success: true;
  tool: string;
  payload: ToolPayload;
  durationMs: number;
}

export interface InvocationFailure {
  success: false;
  tool: string;
  code: ErrorCode;
  message: string;
  retriable: boolean;
  suggestion: string;
  details?: Record<string, unknown>;
  durationMs: number;
}

export type InvocationResult = InvocationSuccess | InvocationFailure;

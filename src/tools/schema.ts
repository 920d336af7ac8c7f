/**
 * Tool schema emission for each provider kind.
 *
 * The three shapes differ only in field naming and nesting; name, description,
 * parameter types and the required set are carried over unchanged.
 */

import type { ProviderKind } from "../types/model.js";
import type { IToolParameter, IToolSpec, ToolParameterType } from "../types/tool.js";

// ── JSON Schema (OpenAI / Anthropic) ─────────────────────────────────────

export interface IJsonSchemaProperty {
  readonly type: ToolParameterType;
  readonly description: string;
  readonly enum?: readonly string[] | undefined;
  readonly default?: unknown;
  readonly items?: { readonly type: "string" } | undefined;
}

export interface IJsonSchemaObject {
  readonly type: "object";
  readonly properties: Readonly<Record<string, IJsonSchemaProperty>>;
  readonly required: readonly string[];
}

export interface IOpenAIToolDescriptor {
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly description: string;
    readonly parameters: IJsonSchemaObject;
  };
}

export interface IAnthropicToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly input_schema: IJsonSchemaObject;
}

// ── OpenAPI subset (Google) ──────────────────────────────────────────────

export type GoogleSchemaType = "STRING" | "NUMBER" | "INTEGER" | "BOOLEAN" | "ARRAY" | "OBJECT";

export interface IGoogleSchemaProperty {
  readonly type: GoogleSchemaType;
  readonly description: string;
  readonly enum?: readonly string[] | undefined;
  readonly default?: unknown;
  readonly items?: { readonly type: "STRING" } | undefined;
}

export interface IGoogleFunctionDeclaration {
  readonly name: string;
  readonly description: string;
  readonly parameters?: {
    readonly type: "OBJECT";
    readonly properties: Readonly<Record<string, IGoogleSchemaProperty>>;
    readonly required: readonly string[];
  } | undefined;
}

export interface IProviderToolSchemaMap {
  readonly openai: IOpenAIToolDescriptor;
  readonly anthropic: IAnthropicToolDescriptor;
  readonly google: IGoogleFunctionDeclaration;
}

export type ProviderToolDescriptor = IProviderToolSchemaMap[ProviderKind];

// ── Converters ───────────────────────────────────────────────────────────

function toJsonSchemaProperty(param: IToolParameter): IJsonSchemaProperty {
  return {
    type: param.type,
    description: param.description,
    ...(param.enum !== undefined ? { enum: param.enum } : {}),
    ...(param.default !== undefined ? { default: param.default } : {}),
    ...(param.type === "array" ? { items: { type: "string" as const } } : {}),
  };
}

export function toJsonSchema(parameters: readonly IToolParameter[]): IJsonSchemaObject {
  const properties: Record<string, IJsonSchemaProperty> = {};
  const required: string[] = [];

  for (const param of parameters) {
    properties[param.name] = toJsonSchemaProperty(param);
    if (param.required) {
      required.push(param.name);
    }
  }

  return { type: "object", properties, required };
}

const GOOGLE_TYPES: Readonly<Record<ToolParameterType, GoogleSchemaType>> = {
  string: "STRING",
  number: "NUMBER",
  integer: "INTEGER",
  boolean: "BOOLEAN",
  array: "ARRAY",
  object: "OBJECT",
};

function toGoogleType(type: ToolParameterType): GoogleSchemaType {
  return GOOGLE_TYPES[type];
}

function toGoogleDeclaration(spec: IToolSpec): IGoogleFunctionDeclaration {
  if (spec.parameters.length === 0) {
    return { name: spec.name, description: spec.description };
  }

  const properties: Record<string, IGoogleSchemaProperty> = {};
  const required: string[] = [];
  for (const param of spec.parameters) {
    properties[param.name] = {
      type: toGoogleType(param.type),
      description: param.description,
      ...(param.enum !== undefined ? { enum: param.enum } : {}),
      ...(param.default !== undefined ? { default: param.default } : {}),
      ...(param.type === "array" ? { items: { type: "STRING" as const } } : {}),
    };
    if (param.required) {
      required.push(param.name);
    }
  }

  return {
    name: spec.name,
    description: spec.description,
    parameters: { type: "OBJECT", properties, required },
  };
}

const CONVERTERS: { readonly [K in ProviderKind]: (spec: IToolSpec) => IProviderToolSchemaMap[K] } = {
  openai: (spec) => ({
    type: "function",
    function: {
      name: spec.name,
      description: spec.description,
      parameters: toJsonSchema(spec.parameters),
    },
  }),
  anthropic: (spec) => ({
    name: spec.name,
    description: spec.description,
    input_schema: toJsonSchema(spec.parameters),
  }),
  google: toGoogleDeclaration,
};

/**
 * Convert tool specs into the descriptor list a provider kind expects,
 * preserving registration order.
 */
export function toProviderSchema<K extends ProviderKind>(
  specs: readonly IToolSpec[],
  kind: K,
): Array<IProviderToolSchemaMap[K]> {
  const convert: (spec: IToolSpec) => IProviderToolSchemaMap[K] = CONVERTERS[kind];
  return specs.map((spec) => convert(spec));
}

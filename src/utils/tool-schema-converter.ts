import { Type, type FunctionDeclaration, type Schema } from '@google/genai';
import type { JsonSchemaObject, JsonSchemaProperty, ToolDescriptor } from '../core/types.js';

/** Chat Completions (Groq / OpenAI / LM Studio) のツール形式 */
export interface ChatCompletionToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, JsonSchemaProperty>;
      required: string[];
    };
  };
}

/** Anthropic のツール形式 */
export interface AnthropicToolSchema {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

function requiredOf(schema: JsonSchemaObject): string[] {
  return [...(schema.required ?? [])];
}

/**
 * ToolDescriptor を Chat Completions 形式に変換
 *
 * {
 *   type: 'function',
 *   function: { name, description, parameters: { type: 'object', properties, required } }
 * }
 */
export function convertToolSchemaForChatCompletions(descriptor: ToolDescriptor): ChatCompletionToolSchema {
  return {
    type: 'function',
    function: {
      name: descriptor.name,
      description: descriptor.description,
      parameters: {
        type: 'object',
        properties: descriptor.parameters.properties,
        required: requiredOf(descriptor.parameters)
      }
    }
  };
}

/**
 * ToolDescriptor を Anthropic 形式に変換
 *
 * { name, description, input_schema: { type: 'object', properties, required } }
 */
export function convertToolSchemaForAnthropic(descriptor: ToolDescriptor): AnthropicToolSchema {
  return {
    name: descriptor.name,
    description: descriptor.description,
    input_schema: {
      type: 'object',
      properties: descriptor.parameters.properties,
      required: requiredOf(descriptor.parameters)
    }
  };
}

export function convertAllToolSchemasForAnthropic(descriptors: readonly ToolDescriptor[]): AnthropicToolSchema[] {
  return descriptors.map(convertToolSchemaForAnthropic);
}

const GEMINI_TYPES: Record<NonNullable<JsonSchemaProperty['type']>, Type> = {
  string: Type.STRING,
  number: Type.NUMBER,
  integer: Type.INTEGER,
  boolean: Type.BOOLEAN,
  array: Type.ARRAY,
  object: Type.OBJECT,
  null: Type.NULL
};

/** Gemini は型名を大文字の enum で受け取る。型指定がなければ STRING 扱い */
function convertPropertyForGemini(prop: JsonSchemaProperty): Schema {
  const converted: Schema = {
    type: prop.type ? GEMINI_TYPES[prop.type] : Type.STRING
  };
  if (prop.description) {
    converted.description = prop.description;
  }
  if (prop.enum) {
    converted.enum = prop.enum.map(String);
  }
  if (prop.items) {
    converted.items = convertPropertyForGemini(prop.items);
  }
  if (prop.properties) {
    converted.properties = convertPropertiesForGemini(prop.properties);
    if (prop.required) {
      converted.required = [...prop.required];
    }
  }
  if (prop.minimum !== undefined) {
    converted.minimum = prop.minimum;
  }
  if (prop.maximum !== undefined) {
    converted.maximum = prop.maximum;
  }
  return converted;
}

function convertPropertiesForGemini(properties: Record<string, JsonSchemaProperty>): Record<string, Schema> {
  const converted: Record<string, Schema> = {};
  for (const [key, value] of Object.entries(properties)) {
    converted[key] = convertPropertyForGemini(value);
  }
  return converted;
}

/**
 * ToolDescriptor を Gemini の functionDeclaration に変換
 */
export function convertToolSchemaForGemini(descriptor: ToolDescriptor): FunctionDeclaration {
  const properties = convertPropertiesForGemini(descriptor.parameters.properties);
  const declaration: FunctionDeclaration = {
    name: descriptor.name,
    description: descriptor.description
  };
  // パラメータなしのツールは parameters を省略する
  if (Object.keys(properties).length > 0) {
    declaration.parameters = {
      type: Type.OBJECT,
      properties,
      required: requiredOf(descriptor.parameters)
    };
  }
  return declaration;
}

export function convertAllToolSchemasForGemini(descriptors: readonly ToolDescriptor[]): FunctionDeclaration[] {
  return descriptors.map(convertToolSchemaForGemini);
}

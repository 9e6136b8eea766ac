/**
 * Argument validation against the JSON Schema subset tools declare.
 * Returns a list of problems; an empty list means the arguments are valid.
 */

import type {JsonSchemaObject, JsonSchemaProperty} from '../core/types.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typeOfValue(value: unknown): string {
	if (value === null) return 'null';
	if (Array.isArray(value)) return 'array';
	if (typeof value === 'number') {
		return Number.isInteger(value) ? 'integer' : 'number';
	}
	return typeof value;
}

function matchesType(
	value: unknown,
	expected: NonNullable<JsonSchemaProperty['type']>,
): boolean {
	const actual = typeOfValue(value);
	if (expected === 'number') {
		return actual === 'number' || actual === 'integer';
	}
	return actual === expected;
}

function validateValue(
	value: unknown,
	schema: JsonSchemaProperty,
	pointer: string,
	problems: string[],
): void {
	if (schema.type && !matchesType(value, schema.type)) {
		problems.push(`${pointer} must be ${schema.type}, got ${typeOfValue(value)}`);
		return;
	}

	if (schema.enum && !schema.enum.some(option => option === value)) {
		problems.push(`${pointer} must be one of: ${schema.enum.join(', ')}`);
	}

	if (typeof value === 'number') {
		if (schema.minimum !== undefined && value < schema.minimum) {
			problems.push(`${pointer} must be >= ${schema.minimum}`);
		}
		if (schema.maximum !== undefined && value > schema.maximum) {
			problems.push(`${pointer} must be <= ${schema.maximum}`);
		}
	}

	if (Array.isArray(value) && schema.items) {
		const itemSchema = schema.items;
		value.forEach((item, index) =>
			validateValue(item, itemSchema, `${pointer}[${index}]`, problems),
		);
	}

	if (isPlainObject(value) && schema.properties) {
		validateProperties(value, schema.properties, schema.required ?? [], pointer, problems);
	}
}

function validateProperties(
	value: Record<string, unknown>,
	properties: Record<string, JsonSchemaProperty>,
	required: readonly string[],
	prefix: string,
	problems: string[],
): void {
	for (const key of required) {
		if (value[key] === undefined) {
			problems.push(`${prefix ? `${prefix}.` : ''}${key} is required`);
		}
	}
	for (const [key, propertySchema] of Object.entries(properties)) {
		const propertyValue = value[key];
		if (propertyValue === undefined) continue;
		validateValue(propertyValue, propertySchema, prefix ? `${prefix}.${key}` : key, problems);
	}
}

export function validateArguments(
	schema: JsonSchemaObject,
	args: unknown,
): string[] {
	if (!isPlainObject(args)) {
		return [`arguments must be an object, got ${typeOfValue(args)}`];
	}

	const problems: string[] = [];
	validateProperties(args, schema.properties, schema.required ?? [], '', problems);

	if (schema.additionalProperties === false) {
		for (const key of Object.keys(args)) {
			if (!(key in schema.properties)) {
				problems.push(`${key} is not allowed`);
			}
		}
	}

	return problems;
}

// Typed readers for handlers; arguments have already been validated.

export function readString(args: Record<string, unknown>, key: string): string {
	const value = args[key];
	return typeof value === 'string' ? value : '';
}

export function readOptionalString(
	args: Record<string, unknown>,
	key: string,
): string | undefined {
	const value = args[key];
	return typeof value === 'string' ? value : undefined;
}

export function readOptionalNumber(
	args: Record<string, unknown>,
	key: string,
): number | undefined {
	const value = args[key];
	return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readBoolean(
	args: Record<string, unknown>,
	key: string,
	fallback = false,
): boolean {
	const value = args[key];
	return typeof value === 'boolean' ? value : fallback;
}

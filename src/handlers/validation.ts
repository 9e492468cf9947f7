/**
 * @internal
 * Runtime argument validation for MCP tool handlers.
 *
 * Arguments are checked against a tool's parameter specs before the
 * handler runs.  Values are coerced where the declared type allows it:
 * numeric strings become numbers, numbers become strings.
 */

import { type ArgsOf, type ParamSpec, type ParamSpecs } from '../types';
import { invalidParamsError, missingRequiredError } from '../errors';

type ArgValue = string | number | string[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbsent(spec: ParamSpec, value: unknown): boolean {
  if (value === undefined || value === null) return true;
  // A blank required string carries no identifier
  return spec.type === 'string' && spec.required && typeof value === 'string' && !value.trim();
}

function toStringValue(key: string, value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  throw invalidParamsError(`Argument '${key}' must be a string`);
}

function toNumberValue(key: string, value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  throw invalidParamsError(`Argument '${key}' must be a number`);
}

function coerce(key: string, spec: ParamSpec, value: unknown): ArgValue {
  switch (spec.type) {
    case 'string': {
      const str = toStringValue(key, value);
      if (spec.enum && !spec.enum.includes(str)) {
        throw invalidParamsError(`Argument '${key}' must be one of: ${spec.enum.join(', ')}`);
      }
      return str;
    }
    case 'number': {
      const num = toNumberValue(key, value);
      if (spec.exclusiveMinimum !== undefined && num <= spec.exclusiveMinimum) {
        throw invalidParamsError(
          `Argument '${key}' must be greater than ${spec.exclusiveMinimum}`
        );
      }
      return num;
    }
    case 'array': {
      if (!Array.isArray(value)) {
        throw invalidParamsError(`Argument '${key}' must be an array of strings`);
      }
      const items = value.map((item) => {
        if (typeof item === 'string' && item.trim()) return item;
        if (typeof item === 'number' && Number.isFinite(item)) return String(item);
        throw invalidParamsError(`Argument '${key}' must be an array of strings`);
      });
      if (spec.minItems !== undefined && items.length < spec.minItems) {
        throw invalidParamsError(
          `Argument '${key}' must contain at least ${spec.minItems} items`
        );
      }
      return items;
    }
  }
}

/**
 * Validate `raw` against `params` and return the typed argument object.
 * Missing required arguments are reported together; undeclared keys are
 * dropped.
 */
export function parseArgs<P extends ParamSpecs>(params: P, raw: unknown): ArgsOf<P> {
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    throw invalidParamsError('Tool arguments must be an object');
  }
  const input = isRecord(raw) ? raw : {};

  const missing = Object.entries(params)
    .filter(([key, spec]) => spec.required && isAbsent(spec, input[key]))
    .map(([key]) => key);
  if (missing.length > 0) {
    throw missingRequiredError(missing);
  }

  const parsed: Record<string, ArgValue> = {};
  for (const [key, spec] of Object.entries(params)) {
    const value = input[key];
    if (isAbsent(spec, value)) continue;
    parsed[key] = coerce(key, spec, value);
  }
  // Every required key is present and every value matches its descriptor
  return parsed as ArgsOf<P>;
}

import { inspect } from 'node:util';

type NumericOption = number | undefined;

export interface ConsoleFormatOptions {
  maxLength?: number;
  maxDepth?: number;
  maxArrayLength?: number;
  maxStringLength?: number;
}

const DEFAULT_MAX_LENGTH = 1600;
const DEFAULT_INSPECT_DEPTH = 4;
const DEFAULT_INSPECT_ARRAY_LENGTH = 20;
const DEFAULT_INSPECT_STRING_LENGTH = 512;

function clampStringLength(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  const visible = Math.max(0, maxLength - 32);
  const head = value.slice(0, visible);
  const omitted = value.length - visible;
  return `${head}...[truncated ${omitted} chars]`;
}

function resolveNumber(value: NumericOption, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function formatValueForConsole(value: unknown, options: ConsoleFormatOptions = {}): string {
  const maxLength = resolveNumber(options.maxLength, DEFAULT_MAX_LENGTH);
  const asString =
    typeof value === 'string'
      ? value
      : inspect(value, {
          depth: resolveNumber(options.maxDepth, DEFAULT_INSPECT_DEPTH),
          maxArrayLength: resolveNumber(options.maxArrayLength, DEFAULT_INSPECT_ARRAY_LENGTH),
          maxStringLength: resolveNumber(options.maxStringLength, DEFAULT_INSPECT_STRING_LENGTH),
          breakLength: 100,
          compact: 3
        });
  return clampStringLength(asString, maxLength);
}

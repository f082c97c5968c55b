/**
 * Engine configuration: a closed TypeBox schema plus defaults.
 */

import { Type } from '@sinclair/typebox';
import type { ObjectOptions, Static, TObject, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { ValueError } from '@sinclair/typebox/errors';

type StrictObjectOptions = Omit<ObjectOptions, 'additionalProperties'>;

/** Object schema that rejects unknown keys. */
const StrictObject = <TProps extends Record<string, TSchema>>(
  properties: TProps,
  options?: StrictObjectOptions,
): TObject<TProps> =>
  Type.Object(properties, {
    additionalProperties: false,
    ...options,
  });

export const EngineConfigSchema = StrictObject({
  /** Maximum number of entries held by the kill ring. */
  killRingCapacity: Type.Integer({ minimum: 1 }),
  /** Maximum number of saved marks per buffer. */
  markRingCapacity: Type.Integer({ minimum: 1 }),
  /** Maximum number of undo entries kept per buffer. */
  undoLimit: Type.Integer({ minimum: 16 }),
  /** Characters that count as word constituents besides letters and digits. */
  wordChars: Type.String(),
});

export type EngineConfig = Static<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  killRingCapacity: 60,
  markRingCapacity: 16,
  undoLimit: 10000,
  wordChars: '_',
});

export class ConfigValidationError extends Error {
  readonly data: unknown;
  readonly issues: ValueError[];

  constructor(data: unknown, issues: Iterable<ValueError>) {
    const normalizedIssues = Array.from(issues);
    const issueSummary = normalizedIssues
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('\n');
    super(`Invalid engine configuration\n${issueSummary}`);
    this.name = 'ConfigValidationError';
    this.data = data;
    this.issues = normalizedIssues;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge a partial configuration over the defaults and validate the result.
 * `undefined` yields the defaults.
 */
export function resolveEngineConfig(input: unknown = {}): EngineConfig {
  const merged: unknown = isRecord(input) ? { ...DEFAULT_ENGINE_CONFIG, ...input } : input;
  const issues = Array.from(Value.Errors(EngineConfigSchema, merged));
  if (issues.length > 0 || !Value.Check(EngineConfigSchema, merged)) {
    throw new ConfigValidationError(input, issues);
  }
  return merged;
}

/**
 * Type definitions for the field type registry.
 *
 * @packageDocumentation
 */

import type { CompiledTemplate, Context, Value, ValueObject } from '../expression/index.js';

/**
 * A field declaration as written in a definition document, keyed by setting
 * name (`type`, `label`, `min`, `options`, ...).
 */
export type FieldDeclaration = Readonly<Record<string, unknown>>;

/**
 * Outcome of validating one raw answer.
 */
export type FieldResult =
  | { readonly valid: true; readonly value: Value }
  | { readonly valid: false; readonly reason: string };

/**
 * A field-scoped validation failure, returned with a re-presented question.
 */
export interface FieldError {
  readonly path: string;
  readonly reason: string;
}

/**
 * Settings every field type produces from `configure`.
 */
export interface FieldSettings {
  /** Whether a missing answer is accepted (normalized to null). */
  readonly optional: boolean;
}

/**
 * A configured field as seen by its field type.
 */
export interface Field<C extends FieldSettings = FieldSettings> {
  /** Dotted target path in the context. */
  readonly path: string;
  /** The path split into segments. */
  readonly segments: readonly string[];
  /** Registered type name. */
  readonly type: string;
  readonly label: CompiledTemplate;
  /** Presentation hint, e.g. `checkbox` or `dropdown`. */
  readonly component: string | undefined;
  /** Declared default, offered to the presentation layer. */
  readonly defaultValue: Value | undefined;
  readonly settings: C;
}

/**
 * Presentation-layer description of a field.
 */
export interface FieldDescriptor {
  readonly path: string;
  readonly type: string;
  readonly label: string;
  readonly optional: boolean;
  readonly component?: string;
  readonly default?: Value;
  /** Type-specific constraints such as `max_length` or `options`. */
  readonly constraints: ValueObject;
}

/**
 * A field type: how declarations are checked, answers normalized and fields
 * described.
 *
 * @typeParam C - Settings produced by `configure`.
 */
export interface FieldType<C extends FieldSettings> {
  /** Name used in `type = "..."`. */
  readonly name: string;
  /** Setting keys accepted besides `type`, `label`, `default` and `component`. */
  readonly settingKeys: readonly string[];

  /**
   * Checks a declaration at load time.
   *
   * @throws DefinitionError located at the offending setting key.
   */
  configure(declaration: FieldDeclaration): C;

  /**
   * Validates and normalizes a raw answer.
   */
  validate(raw: unknown, field: Field<C>): FieldResult;

  /**
   * Describes the field for the presentation layer.
   */
  describe(field: Field<C>, context: Context): FieldDescriptor;

  /**
   * Templates inside the settings, other than the label.
   */
  templates?(settings: C): readonly CompiledTemplate[];
}

/**
 * A field bound to its type, ready to validate and describe.
 */
export interface ConfiguredField {
  readonly path: string;
  readonly segments: readonly string[];
  readonly type: string;
  readonly optional: boolean;
  validate(raw: unknown): FieldResult;
  describe(context: Context): FieldDescriptor;
  /** Every template the field renders, label included. */
  templates(): readonly CompiledTemplate[];
}

/**
 * Message for a missing answer to a required field.
 */
export const REQUIRED_MESSAGE = 'This field is required';

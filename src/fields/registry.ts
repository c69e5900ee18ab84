/**
 * Field type registry.
 *
 * Built once through {@link FieldTypeRegistry.builder} and immutable
 * afterwards. Configuring a declaration binds it to its field type, so the
 * resolver validates answers without knowing the type's settings shape.
 *
 * @packageDocumentation
 */

import {
  ContextValueError,
  ExpressionSyntaxError,
  PathError,
  compileTemplate,
  parsePath,
  toValue,
  type CompiledTemplate,
  type Value,
} from '../expression/index.js';
import { DefinitionError } from '../definition/errors.js';
import { dateField } from './date.js';
import { numberField } from './number.js';
import { selectField } from './select.js';
import { textField } from './text.js';
import type {
  ConfiguredField,
  Field,
  FieldDeclaration,
  FieldResult,
  FieldSettings,
  FieldType,
} from './types.js';

/** Keys every field accepts. */
const COMMON_KEYS: readonly string[] = ['type', 'label', 'default', 'component'];

/** @internal */
export type Binder = (
  path: string,
  segments: readonly string[],
  declaration: FieldDeclaration,
  common: CommonSettings
) => ConfiguredField;

/** @internal */
export interface CommonSettings {
  readonly label: CompiledTemplate;
  readonly component: string | undefined;
  readonly defaultValue: Value | undefined;
}

/** @internal */
export interface RegistryEntry {
  readonly settingKeys: readonly string[];
  readonly bind: Binder;
}

function createBinder<C extends FieldSettings>(type: FieldType<C>): Binder {
  return (path, segments, declaration, common) => {
    const field: Field<C> = {
      path,
      segments,
      type: type.name,
      label: common.label,
      component: common.component,
      defaultValue: common.defaultValue,
      settings: type.configure(declaration),
    };
    const extra = type.templates?.(field.settings) ?? [];
    return {
      path,
      segments,
      type: type.name,
      optional: field.settings.optional,
      validate: (raw) => type.validate(raw, field),
      describe: (context) => type.describe(field, context),
      templates: () => [field.label, ...extra],
    };
  };
}

function readCommon(declaration: FieldDeclaration): CommonSettings {
  const label = declaration['label'] ?? '';
  if (typeof label !== 'string') {
    throw new DefinitionError(`Expected a string, got ${typeof label}`, 'label');
  }
  const component = declaration['component'];
  if (component !== undefined && typeof component !== 'string') {
    throw new DefinitionError(`Expected a string, got ${typeof component}`, 'component');
  }

  let compiled: CompiledTemplate;
  try {
    compiled = compileTemplate(label);
  } catch (error) {
    if (error instanceof ExpressionSyntaxError) {
      throw new DefinitionError(error.message, 'label', error);
    }
    throw error;
  }

  let defaultValue: Value | undefined;
  if (declaration['default'] !== undefined) {
    try {
      defaultValue = toValue(declaration['default'], 'default');
    } catch (error) {
      if (error instanceof ContextValueError) {
        throw new DefinitionError(error.message, 'default', error);
      }
      throw error;
    }
  }

  return { label: compiled, component, defaultValue };
}

/**
 * Immutable lookup of field types.
 */
export class FieldTypeRegistry {
  private readonly entries: ReadonlyMap<string, RegistryEntry>;

  private constructor(entries: ReadonlyMap<string, RegistryEntry>) {
    this.entries = entries;
  }

  /**
   * Starts building a registry. The builder starts empty; call
   * {@link FieldTypeRegistryBuilder.withBuiltins} for text, number, date and select.
   */
  static builder(): FieldTypeRegistryBuilder {
    return new FieldTypeRegistryBuilder((entries) => new FieldTypeRegistry(entries));
  }

  /**
   * Checks whether a type name is registered.
   */
  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Lists registered type names in registration order.
   */
  names(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Configures a field declaration.
   *
   * @param path - Dotted target path.
   * @param declaration - The declaration from the definition document.
   * @returns The configured field.
   * @throws DefinitionError located relative to the field, e.g. `min` or `options[1].value`.
   */
  configure(path: string, declaration: FieldDeclaration): ConfiguredField {
    let segments: readonly string[];
    try {
      segments = parsePath(path);
    } catch (error) {
      if (error instanceof PathError) {
        throw new DefinitionError(error.message, undefined, error);
      }
      throw error;
    }

    const typeName = declaration['type'];
    if (typeof typeName !== 'string') {
      throw new DefinitionError('Field type is required', 'type');
    }
    const entry = this.entries.get(typeName);
    if (entry === undefined) {
      throw new DefinitionError(
        `Unknown field type '${typeName}' (known: ${this.names().join(', ')})`,
        'type'
      );
    }

    for (const key of Object.keys(declaration)) {
      if (!COMMON_KEYS.includes(key) && !entry.settingKeys.includes(key)) {
        throw new DefinitionError(`Unknown setting for a ${typeName} field`, key);
      }
    }

    return entry.bind(path, segments, declaration, readCommon(declaration));
  }

  /**
   * Validates a raw answer for a configured field.
   */
  validate(field: ConfiguredField, raw: unknown): FieldResult {
    return field.validate(raw);
  }
}

/**
 * Collects field types for a {@link FieldTypeRegistry}.
 */
export class FieldTypeRegistryBuilder {
  private readonly entries = new Map<string, RegistryEntry>();

  /** @internal */
  constructor(
    private readonly create: (entries: ReadonlyMap<string, RegistryEntry>) => FieldTypeRegistry
  ) {}

  /**
   * Registers a field type under its name.
   *
   * @throws Error if the name is already registered.
   */
  register<C extends FieldSettings>(type: FieldType<C>): this {
    if (this.entries.has(type.name)) {
      throw new Error(`Field type '${type.name}' is already registered`);
    }
    this.entries.set(type.name, { settingKeys: type.settingKeys, bind: createBinder(type) });
    return this;
  }

  /**
   * Registers the built-in text, number, date and select types.
   */
  withBuiltins(): this {
    return this.register(textField).register(numberField).register(dateField).register(selectField);
  }

  /**
   * Builds the immutable registry.
   */
  build(): FieldTypeRegistry {
    return this.create(new Map(this.entries));
  }
}

/**
 * Creates a registry holding only the built-in field types.
 */
export function createDefaultFieldTypeRegistry(): FieldTypeRegistry {
  return FieldTypeRegistry.builder().withBuiltins().build();
}

/**
 * Field type registry: validates and normalizes raw answers, and describes
 * fields for the presentation layer.
 *
 * @packageDocumentation
 */

export type {
  ConfiguredField,
  Field,
  FieldDeclaration,
  FieldDescriptor,
  FieldError,
  FieldResult,
  FieldSettings,
  FieldType,
} from './types.js';
export { REQUIRED_MESSAGE } from './types.js';

export {
  FieldTypeRegistry,
  FieldTypeRegistryBuilder,
  createDefaultFieldTypeRegistry,
} from './registry.js';

export { DEFAULT_MAX_LENGTH, DEFAULT_MIN_LENGTH, textField } from './text.js';
export type { TextFormat, TextSettings } from './text.js';
export { numberField } from './number.js';
export type { NumberSettings } from './number.js';
export { dateField, isCalendarDate } from './date.js';
export type { DateSettings } from './date.js';
export { DEFAULT_SELECT_COMPONENT, selectField } from './select.js';
export type { SelectOption, SelectSettings } from './select.js';
export { describeCommon, missing, readBoolean, readCount, readNumber, readString } from './settings.js';
